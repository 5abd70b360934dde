import type { MemoTarget } from "../../../ports/key-function"
import { staticKey } from "../static-key"

const settings: MemoTarget = {
  identity: "config:settings:",
  parameters: [{ name: "cachekey", kind: "optional", default: "" }],
}

describe("staticKey", () => {
  it("is the bare identity without a bucket", () => {
    expect(staticKey(settings, { args: [] })).toBe("config:settings:")
  })

  it("appends the cachekey bucket", () => {
    expect(staticKey(settings, { args: [], kwargs: { cachekey: "eu" } })).toBe("config:settings:eu")
  })

  it("ignores positional arguments", () => {
    expect(staticKey(settings, { args: ["ignored"] })).toBe("config:settings:")
  })
})
