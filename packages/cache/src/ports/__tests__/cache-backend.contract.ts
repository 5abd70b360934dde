import { beforeEach, describe, expect, it } from "vitest"
import type { ManualClock } from "../../tests/utils/manual-clock"
import type { CacheBackend } from "../cache-backend"

export type CacheBackendHarness = {
  backend: CacheBackend
  clock: ManualClock
}

type CreateHarness = () => CacheBackendHarness

export function describeCacheBackendContract(adapterName: string, createHarness: CreateHarness): void {
  describe(`CacheBackend Contract Tests - ${adapterName}`, () => {
    let backend: CacheBackend
    let clock: ManualClock

    beforeEach(() => {
      const harness = createHarness()
      backend = harness.backend
      clock = harness.clock
    })

    describe("get/set basic semantics", () => {
      it("returns miss when key is absent", async () => {
        expect(await backend.get("missing")).toStrictEqual({ kind: "miss" })
      })

      it("returns hit after set with an equal value", async () => {
        await backend.set("reports:total:[1,2]", { total: 3, tags: ["a"] })

        expect(await backend.get("reports:total:[1,2]")).toStrictEqual({
          kind: "hit",
          value: { total: 3, tags: ["a"] },
        })
      })

      it("overwriting an existing key updates the stored value", async () => {
        await backend.set("k", 1)
        await backend.set("k", 2)

        expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: 2 })
      })

      it("stores falsy values as hits", async () => {
        await backend.set("zero", 0)
        await backend.set("null", null)
        await backend.set("empty", "")

        expect(await backend.get("zero")).toStrictEqual({ kind: "hit", value: 0 })
        expect(await backend.get("null")).toStrictEqual({ kind: "hit", value: null })
        expect(await backend.get("empty")).toStrictEqual({ kind: "hit", value: "" })
      })

      it("keeps Date values as dates", async () => {
        const at = new Date("2024-03-01T10:00:00.000Z")

        await backend.set("at", at)

        const res = await backend.get("at")
        expect(res.kind).toBe("hit")
        if (res.kind === "hit") expect(res.value).toStrictEqual(at)
      })
    })

    describe("ttl semantics", () => {
      it("expires an entry once its ttl has elapsed", async () => {
        await backend.set("k", "v", { ttlSeconds: 10 })

        clock.advanceSeconds(9)
        expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: "v" })

        clock.advanceSeconds(1)
        expect(await backend.get("k")).toStrictEqual({ kind: "miss" })
      })

      it("treats ttlSeconds 0 as no expiry", async () => {
        await backend.set("k", "v", { ttlSeconds: 0 })

        clock.advanceSeconds(60 * 60 * 24 * 365)

        expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: "v" })
      })

      it("overwriting without ttl clears a previous ttl", async () => {
        await backend.set("k", "v1", { ttlSeconds: 5 })
        await backend.set("k", "v2")

        clock.advanceSeconds(10)

        expect(await backend.get("k")).toStrictEqual({ kind: "hit", value: "v2" })
      })
    })

    describe("delete semantics", () => {
      it("delete on absent key is a no-op", async () => {
        await expect(backend.delete("missing")).resolves.toBeUndefined()
      })

      it("delete removes only the given key", async () => {
        await backend.set("a", 1)
        await backend.set("b", 2)

        await backend.delete("a")

        expect(await backend.get("a")).toStrictEqual({ kind: "miss" })
        expect(await backend.get("b")).toStrictEqual({ kind: "hit", value: 2 })
      })
    })

    describe("deleteByPrefix semantics", () => {
      it("removes every key under the prefix and nothing else", async () => {
        for (let i = 0; i < 5; i++) {
          await backend.set(`app:first:[${i}]`, i)
          await backend.set(`app:second:[${i}]`, i)
        }

        await backend.deleteByPrefix?.("app:first:")

        for (let i = 0; i < 5; i++) {
          expect(await backend.get(`app:first:[${i}]`)).toStrictEqual({ kind: "miss" })
          expect(await backend.get(`app:second:[${i}]`)).toStrictEqual({ kind: "hit", value: i })
        }
      })

      it("does not treat glob characters in the prefix as patterns", async () => {
        await backend.set("app:Box.get*:[1]", 1)
        await backend.set("app:Box.getter:[1]", 2)

        await backend.deleteByPrefix?.("app:Box.get*:")

        expect(await backend.get("app:Box.get*:[1]")).toStrictEqual({ kind: "miss" })
        expect(await backend.get("app:Box.getter:[1]")).toStrictEqual({ kind: "hit", value: 2 })
      })

      it("is a no-op when nothing matches", async () => {
        await backend.set("a", 1)

        await backend.deleteByPrefix?.("zzz")

        expect(await backend.get("a")).toStrictEqual({ kind: "hit", value: 1 })
      })
    })
  })
}
