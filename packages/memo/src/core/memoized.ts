import { type CacheBackend, type CacheKey, type Seconds, supportsPrefixDeletion } from "@memento/cache"
import { createNullLogger, type Logger } from "@memento/logger"
import type { CallArguments } from "../ports/call-arguments"
import type { CallableDescriptor } from "../ports/callable-descriptor"
import type { KeyFunction, MemoTarget } from "../ports/key-function"
import { DO_NOT_CACHE, type DoNotCache, isMarker, type Marker } from "../ports/marker"
import { KeyEncodingError } from "./errors/key-encoding-error"
import { argumentKey } from "./keys/argument-key"
import { createMemoTarget } from "./memo-target"
import { bindArguments } from "./signature/bind-arguments"

export type MemoizeOptions<M extends Marker = DoNotCache> = CallableDescriptor & {
  backend: CacheBackend

  /**
   * Lifetime of stored results. Absent or `0` stores without expiry.
   */
  ttlSeconds?: Seconds

  /** @default argumentKey */
  key?: KeyFunction<M>

  /** @default DO_NOT_CACHE */
  marker?: M

  logger?: Logger
}

/**
 * A function whose results are kept in a global TTL backend.
 *
 * @remarks
 * There is no locking: two concurrent misses on one key both compute, and the
 * later write wins. Backend, binding and computation errors reach the caller
 * unchanged.
 */
export class Memoized<A extends unknown[], R, M extends Marker = DoNotCache> {
  readonly target: MemoTarget

  private readonly backend: CacheBackend
  private readonly ttlSeconds: Seconds
  private readonly keyFn: KeyFunction<M>
  private readonly marker: Marker
  private readonly logger: Logger

  constructor(
    private readonly fn: (...args: A) => R,
    options: MemoizeOptions<M>,
  ) {
    this.target = createMemoTarget(fn, options)
    this.backend = options.backend
    this.ttlSeconds = options.ttlSeconds ?? 0
    this.keyFn = options.key ?? argumentKey
    this.marker = options.marker ?? DO_NOT_CACHE
    this.logger = (options.logger ?? createNullLogger()).child({
      module: options.module,
      fn: this.target.identity,
    })
  }

  get identity(): string {
    return this.target.identity
  }

  call(...args: A): Promise<Awaited<R>> {
    return this.run({ args }, () => this.fn(...args))
  }

  /**
   * Call with arguments supplied by parameter name as well as by position.
   */
  invoke(call: CallArguments): Promise<Awaited<R>> {
    return this.run(call, () => this.apply(call))
  }

  async delete(...args: A): Promise<void> {
    await this.deleteWith({ args })
  }

  async deleteWith(call: CallArguments): Promise<void> {
    const key = this.keyFor(call)
    if (key === undefined) return

    this.logger.debug("deleted cached value", { key })
    await this.backend.delete(key)
  }

  /**
   * Remove every entry of this callable. A no-op on backends without prefix
   * deletion.
   */
  async clear(): Promise<void> {
    if (!supportsPrefixDeletion(this.backend)) {
      this.logger.debug("backend cannot delete by prefix, clear skipped")
      return
    }

    await this.backend.deleteByPrefix(this.target.identity)
  }

  /**
   * Key a call would use, or `undefined` when the key function returns the
   * marker or the arguments cannot be encoded.
   */
  keyFor(call: CallArguments): CacheKey | undefined {
    let key: CacheKey | M
    try {
      key = this.keyFn(this.target, call)
    } catch (err) {
      if (!(err instanceof KeyEncodingError)) throw err

      this.logger.debug("arguments have no key, skipped cache", { err })
      return undefined
    }

    if (typeof key === "string") return key
    if (isMarker(key, this.marker)) return undefined

    throw new TypeError(`Key function of ${this.target.identity} returned neither a string nor the marker.`)
  }

  asFunction(): (...args: A) => Promise<Awaited<R>> {
    return (...args: A) => this.call(...args)
  }

  private async run(call: CallArguments, compute: () => R): Promise<Awaited<R>> {
    const key = this.keyFor(call)

    if (key === undefined) {
      this.logger.debug("skipped cache check")
      return await compute()
    }

    const cached = await this.backend.get(key)

    if (cached.kind === "hit") {
      this.logger.debug("obtained cached value", { key })
      // The backend holds what an earlier call of this function returned.
      return cached.value as Awaited<R>
    }

    this.logger.debug("calculated new value", { key })
    const result = await compute()

    if (!isMarker(result, this.marker)) {
      await this.backend.set(key, result, { ttlSeconds: this.ttlSeconds })
    }

    return result
  }

  private apply(call: CallArguments): R {
    if (call.kwargs === undefined || Object.keys(call.kwargs).length === 0) {
      return this.fn(...this.asArgs(call.args))
    }

    return this.fn(...this.asArgs(bindArguments(this.target.parameters, call, this.target.identity)))
  }

  private asArgs(values: readonly unknown[]): A {
    // Arity and names were checked against the declared parameters.
    return [...values] as A
  }
}

export function memoize<A extends unknown[], R, M extends Marker = DoNotCache>(
  options: MemoizeOptions<M>,
  fn: (...args: A) => R,
): Memoized<A, R, M> {
  return new Memoized(fn, options)
}
