import { VersionedKeyspace } from "../versioned-keyspace"

describe("VersionedKeyspace", () => {
  it("prefixes keys with <keyPrefix>:<version>:", () => {
    const keyspace = new VersionedKeyspace({ keyPrefix: "svc", version: 3 })

    expect(keyspace.fullKey("reports:total:[1]")).toBe("svc:3:reports:total:[1]")
  })

  it("keeps the separators when keyPrefix is empty", () => {
    const keyspace = new VersionedKeyspace({ keyPrefix: "", version: 1 })

    expect(keyspace.fullKey("k")).toBe(":1:k")
  })

  it("rejects versions that are not positive integers", () => {
    expect(() => new VersionedKeyspace({ keyPrefix: "svc", version: 0 })).toThrow(RangeError)
    expect(() => new VersionedKeyspace({ keyPrefix: "svc", version: 1.5 })).toThrow(RangeError)
  })
})
