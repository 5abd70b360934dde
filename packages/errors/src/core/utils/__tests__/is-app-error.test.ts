import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class CustomError extends BaseError<"custom"> {}

    expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    expect(isAppError(new CustomError("test", { code: "custom" }))).toBe(true)
  })

  it("accepts foreign errors carrying the same fields", () => {
    const err = Object.assign(new Error("foreign"), {
      code: "foreign",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(0),
    })

    expect(isAppError(err)).toBe(true)
  })

  it("rejects plain errors and non-errors", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError(null)).toBe(false)
    expect(isAppError("error")).toBe(false)
    expect(
      isAppError({
        name: "Duck",
        message: "quack",
        code: "duck",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date(0),
      }),
    ).toBe(false)
  })

  it("rejects an invalid timestamp", () => {
    const err = Object.assign(new Error("bad"), {
      code: "bad",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(Number.NaN),
    })

    expect(isAppError(err)).toBe(false)
  })
})
