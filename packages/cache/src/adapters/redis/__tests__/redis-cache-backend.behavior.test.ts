import { mock } from "vitest-mock-extended"
import type { Codec } from "../../../ports/codec"
import { FakeRedisClient } from "../../../tests/utils/fake-redis-client"
import { ManualClock } from "../../../tests/utils/manual-clock"
import { escapeGlob, RedisCacheBackend } from "../redis-cache-backend"

describe("RedisCacheBackend (behavior)", () => {
  let clock: ManualClock
  let client: FakeRedisClient

  beforeEach(async () => {
    clock = new ManualClock()
    client = new FakeRedisClient(clock)
    await client.connect()
  })

  afterEach(async () => {
    await client.quit()
  })

  describe("key layout", () => {
    it("writes keys under <keyPrefix>:<version>:", async () => {
      const backend = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 2, batchSize: 10 })

      await backend.set("reports:total:[1]", 1)

      expect(client.keys()).toStrictEqual(["svc:2:reports:total:[1]"])
    })

    it("two backends with different versions do not see each other's entries", async () => {
      const v1 = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 10 })
      const v2 = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 2, batchSize: 10 })

      await v1.set("k", "one")

      expect(await v2.get("k")).toStrictEqual({ kind: "miss" })
    })
  })

  describe("ttl", () => {
    it("sends EX in whole seconds, rounding fractions up", async () => {
      const backend = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 10 })
      const spy = vi.spyOn(client, "set")

      await backend.set("k", "v", { ttlSeconds: 1.2 })

      expect(spy).toHaveBeenCalledWith("svc:1:k", expect.any(String), { EX: 2 })
    })

    it("sends no expiry when ttlSeconds is absent", async () => {
      const backend = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 10 })
      const spy = vi.spyOn(client, "set")

      await backend.set("k", "v")

      expect(spy).toHaveBeenCalledWith("svc:1:k", expect.any(String))
    })
  })

  describe("codec", () => {
    it("round-trips values superjson keeps apart from JSON", async () => {
      const backend = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 10 })
      const value = { big: 10n, tags: new Set(["a", "b"]), missing: undefined }

      await backend.set("k", value)

      expect(await backend.get("k")).toStrictEqual({ kind: "hit", value })
    })

    it("uses an injected codec for both directions", async () => {
      const codec = mock<Codec>()
      codec.encode.mockReturnValue("encoded")
      codec.decode.mockReturnValue("decoded")

      const backend = new RedisCacheBackend({ client, codec }, { keyPrefix: "svc", version: 1, batchSize: 10 })

      await backend.set("k", "value")
      const res = await backend.get("k")

      expect(codec.encode).toHaveBeenCalledWith("value")
      expect(codec.decode).toHaveBeenCalledWith("encoded")
      expect(res).toStrictEqual({ kind: "hit", value: "decoded" })
    })
  })

  describe("deleteByPrefix batching", () => {
    it("scans with COUNT batchSize and unlinks only matching keys", async () => {
      const backend = new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 2 })

      for (let i = 0; i < 5; i++) await backend.set(`a:${i}`, i)
      await backend.set("b:0", 0)

      const scanSpy = vi.spyOn(client, "scan")
      const unlinkSpy = vi.spyOn(client, "unlink")

      await backend.deleteByPrefix("a:")

      expect(scanSpy).toHaveBeenCalledTimes(3)
      expect(scanSpy.mock.calls.map(([cursor]) => cursor)).toStrictEqual(["0", "2", "4"])
      expect(scanSpy.mock.calls[0]?.[1]).toStrictEqual({ MATCH: "svc:1:a:*", COUNT: 2 })
      expect(unlinkSpy.mock.calls.map(([keys]) => keys)).toStrictEqual([
        ["svc:1:a:0", "svc:1:a:1"],
        ["svc:1:a:2", "svc:1:a:3"],
        ["svc:1:a:4"],
      ])
      expect(client.keys()).toStrictEqual(["svc:1:b:0"])
    })
  })

  describe("construction", () => {
    it("rejects a non-positive batchSize", () => {
      expect(() => new RedisCacheBackend({ client }, { keyPrefix: "svc", version: 1, batchSize: 0 })).toThrow(
        RangeError,
      )
    })
  })
})

describe("escapeGlob", () => {
  it("escapes redis glob metacharacters", () => {
    expect(escapeGlob("a*b?c[d]e\\f")).toBe("a\\*b\\?c\\[d\\]e\\\\f")
  })

  it("leaves ordinary characters untouched", () => {
    expect(escapeGlob("app:Owner.fn:")).toBe("app:Owner.fn:")
  })
})
