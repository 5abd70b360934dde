import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("excludes the stack unless requested", () => {
    const err = new BaseError("test", { code: "test" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("serializes the cause chain", () => {
    const root = new Error("socket closed")
    const outer = new BaseError("backend get failed", { code: "backend", cause: root })

    expect(serializeError(outer).cause).toEqual({
      name: "Error",
      code: "unknown",
      message: "socket closed",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("wraps plain errors with the unknown code", () => {
    const serialized = serializeError(new TypeError("not a function"))

    expect(serialized.name).toBe("TypeError")
    expect(serialized.code).toBe("unknown")
    expect(serialized.isOperational).toBe(false)
  })

  it("wraps thrown strings", () => {
    expect(serializeError("boom")).toEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: { value: "boom" },
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("wraps other thrown values with a generic message", () => {
    const serialized = serializeError({ status: 500 })

    expect(serialized.message).toBe("Unknown error")
    expect(serialized.context).toEqual({ value: { status: 500 } })
  })
})
