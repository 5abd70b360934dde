import type { CacheBackend, Seconds } from "@memento/cache"
import { createNullLogger, type Logger } from "@memento/logger"
import type { ContextStore } from "../ports/context-store"
import type { DoNotCache, Marker } from "../ports/marker"
import {
  type ContextMemoized,
  type MemoizeInContextOptions,
  memoizeInContext,
  memoizeInRequest,
} from "./context/context-memoized"
import { RequestCache } from "./context/request-cache"
import { defaultContextStore } from "./context/weak-context-store"
import { type MemoizeOptions, type Memoized, memoize } from "./memoized"

export type MemoizerOptions = {
  backend: CacheBackend

  /** @default 0, no expiry */
  ttlSeconds?: Seconds

  logger?: Logger

  /** @default defaultContextStore */
  contextStore?: ContextStore

  /**
   * Modules whose wrappers log hits, misses and bypasses at debug level.
   * Wrappers of other modules get a null logger.
   */
  debugModules?: readonly string[]
}

type GlobalDefaults = "backend" | "ttlSeconds" | "logger"

/**
 * {@link MemoizeOptions} with the memoizer's defaults made optional.
 */
export type BoundMemoizeOptions<M extends Marker = DoNotCache> = Omit<MemoizeOptions<M>, GlobalDefaults> &
  Partial<Pick<MemoizeOptions<M>, GlobalDefaults>>

export type Memoizer = {
  readonly backend: CacheBackend
  readonly requests: RequestCache

  memoize<A extends unknown[], R, M extends Marker = DoNotCache>(
    options: BoundMemoizeOptions<M>,
    fn: (...args: A) => R,
  ): Memoized<A, R, M>

  memoizeInContext<A extends unknown[], R, M extends Marker = DoNotCache>(
    options: MemoizeInContextOptions<M>,
    fn: (...args: A) => R,
  ): ContextMemoized<A, R, M>

  memoizeInRequest<A extends unknown[], R, M extends Marker = DoNotCache>(
    options: Omit<MemoizeInContextOptions<M>, "contextParam">,
    fn: (...args: A) => R,
  ): ContextMemoized<A, R, M>

  requestCache(request: object, key: string, value?: unknown): unknown
}

/**
 * Bind a backend, a default TTL, a logger and a context store once and hand
 * out wrappers that use them.
 *
 * @example
 * ```ts
 * const memo = createMemoizer({ backend, ttlSeconds: 900, logger, debugModules: ["reports"] })
 *
 * const total = memo.memoize({ module: "reports", name: "total" }, async (year: number) => sum(year))
 * await total.call(2024)
 * ```
 */
export function createMemoizer(opts: MemoizerOptions): Memoizer {
  const store = opts.contextStore ?? defaultContextStore
  const rootLogger = opts.logger ?? createNullLogger()
  const debugModules = new Set(opts.debugModules ?? [])
  const requests = new RequestCache(store)

  const loggerFor = (module: string): Logger =>
    debugModules.has(module) ? rootLogger : createNullLogger()

  const withContextDefaults = <M extends Marker>(
    options: MemoizeInContextOptions<M>,
  ): MemoizeInContextOptions<M> => ({
    ...options,
    store: options.store ?? store,
    logger: options.logger ?? loggerFor(options.module),
  })

  return {
    backend: opts.backend,
    requests,

    memoize<A extends unknown[], R, M extends Marker = DoNotCache>(
      options: BoundMemoizeOptions<M>,
      fn: (...args: A) => R,
    ): Memoized<A, R, M> {
      return memoize<A, R, M>(
        {
          ...options,
          backend: options.backend ?? opts.backend,
          ttlSeconds: options.ttlSeconds ?? opts.ttlSeconds ?? 0,
          logger: options.logger ?? loggerFor(options.module),
        },
        fn,
      )
    },

    memoizeInContext<A extends unknown[], R, M extends Marker = DoNotCache>(
      options: MemoizeInContextOptions<M>,
      fn: (...args: A) => R,
    ): ContextMemoized<A, R, M> {
      return memoizeInContext<A, R, M>(withContextDefaults(options), fn)
    },

    memoizeInRequest<A extends unknown[], R, M extends Marker = DoNotCache>(
      options: Omit<MemoizeInContextOptions<M>, "contextParam">,
      fn: (...args: A) => R,
    ): ContextMemoized<A, R, M> {
      return memoizeInRequest<A, R, M>(withContextDefaults(options), fn)
    },

    requestCache: (request, key, value) => {
      if (value !== undefined) return requests.set(request, key, value)

      return requests.get(request, key)
    },
  }
}
