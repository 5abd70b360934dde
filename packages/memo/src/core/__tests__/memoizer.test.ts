import type { CacheBackend } from "@memento/cache"
import { mock } from "vitest-mock-extended"
import { WeakContextStore } from "../context/weak-context-store"
import { captureLogger } from "../../tests/utils/capture-logger"
import { memoryBackend } from "../../tests/utils/memory-backend"
import { createMemoizer } from "../memoizer"

describe("createMemoizer", () => {
  it("binds the backend and the default ttl", async () => {
    const backend = mock<CacheBackend>()
    backend.get.mockResolvedValue({ kind: "miss" })

    const memo = createMemoizer({ backend, ttlSeconds: 30 })
    const double = memo.memoize({ module: "math", name: "double" }, (n: number) => n * 2)

    await double.call(2)

    expect(memo.backend).toBe(backend)
    expect(backend.set).toHaveBeenCalledWith("math:double:[2]", 4, { ttlSeconds: 30 })
  })

  it("lets a wrapper override the ttl", async () => {
    const backend = mock<CacheBackend>()
    backend.get.mockResolvedValue({ kind: "miss" })

    const memo = createMemoizer({ backend, ttlSeconds: 30 })
    const double = memo.memoize({ module: "math", name: "double", ttlSeconds: 5 }, (n: number) => n * 2)

    await double.call(2)

    expect(backend.set).toHaveBeenCalledWith("math:double:[2]", 4, { ttlSeconds: 5 })
  })

  it("stores without expiry when no ttl is configured", async () => {
    const backend = mock<CacheBackend>()
    backend.get.mockResolvedValue({ kind: "miss" })

    const double = createMemoizer({ backend }).memoize({ module: "math", name: "double" }, (n: number) => n * 2)

    await double.call(2)

    expect(backend.set).toHaveBeenCalledWith("math:double:[2]", 4, { ttlSeconds: 0 })
  })

  it("logs only for modules listed in debugModules", async () => {
    const { logger, entries } = captureLogger()
    const memo = createMemoizer({ backend: memoryBackend(), logger, debugModules: ["reports"] })

    const total = memo.memoize({ module: "reports", name: "total" }, (n: number) => n)
    const quiet = memo.memoize({ module: "users", name: "count" }, (n: number) => n)

    await total.call(1)
    await quiet.call(1)

    expect(entries().map((e) => e.fn)).toStrictEqual(["reports:total:"])
  })

  it("uses its context store for context wrappers and the request cache", () => {
    const contextStore = new WeakContextStore()
    const memo = createMemoizer({ backend: memoryBackend(), contextStore })
    const request = {}

    const greeting = memo.memoizeInRequest(
      { module: "web", name: "greeting", parameters: ["request", "name"] },
      (_request: object, name: string) => `hello ${name}`,
    )
    const sized = memo.memoizeInContext(
      { module: "web", name: "sized", parameters: ["instance", "n"] },
      (_instance: object, n: number) => n * 2,
    )

    greeting.call(request, "ada")
    sized.call(request, 3)
    memo.requestCache(request, "theme", "dark")

    expect(memo.requestCache(request, "theme")).toBe("dark")
    expect(memo.requests.get(request, "theme")).toBe("dark")
    expect(contextStore.peek(request)?.size).toBe(3)
  })
})
