import type { CacheKey } from "@memento/cache"
import { createNullLogger, type Logger } from "@memento/logger"
import type { CallArguments } from "../../ports/call-arguments"
import type { CallableDescriptor } from "../../ports/callable-descriptor"
import type { ContextStore } from "../../ports/context-store"
import type { KeyFunction, MemoTarget } from "../../ports/key-function"
import { DO_NOT_CACHE, type DoNotCache, isMarker, type Marker } from "../../ports/marker"
import { KeyEncodingError } from "../errors/key-encoding-error"
import { SignatureError } from "../errors/signature-error"
import { argumentKey } from "../keys/argument-key"
import { createMemoTarget } from "../memo-target"
import { bindArguments, locateParameter } from "../signature/bind-arguments"
import { defaultContextStore } from "./weak-context-store"

export type MemoizeInContextOptions<M extends Marker = DoNotCache> = CallableDescriptor & {
  /**
   * Name of the parameter holding the context object. When no parameter has
   * this name, the first parameter is the context.
   *
   * @default "instance"
   */
  contextParam?: string

  /** @default argumentKey */
  key?: KeyFunction<M>

  /** @default DO_NOT_CACHE */
  marker?: M

  /** @default defaultContextStore */
  store?: ContextStore

  logger?: Logger
}

/**
 * A function whose results live as long as one of its arguments, the
 * context object, and are shared by every call made with that object.
 *
 * @remarks
 * Calls stay synchronous. A computation that returns a promise has the
 * promise stored; if it rejects or resolves to the marker the entry is
 * dropped again, so the next call recomputes.
 */
export class ContextMemoized<A extends unknown[], R, M extends Marker = DoNotCache> {
  readonly target: MemoTarget

  private readonly keyFn: KeyFunction<M>
  private readonly marker: Marker
  private readonly store: ContextStore
  private readonly logger: Logger

  constructor(
    private readonly fn: (...args: A) => R,
    options: MemoizeInContextOptions<M>,
  ) {
    const base = createMemoTarget(fn, options)

    if (base.parameters.length === 0) {
      throw new SignatureError(`${base.identity} takes no parameters, so it has no context to cache in.`, {
        fn: base.identity,
      })
    }

    const contextIndex = locateParameter(base.parameters, options.contextParam ?? "instance") ?? 0

    this.target = Object.freeze({ ...base, contextIndex })
    this.keyFn = options.key ?? argumentKey
    this.marker = options.marker ?? DO_NOT_CACHE
    this.store = options.store ?? defaultContextStore
    this.logger = (options.logger ?? createNullLogger()).child({
      module: options.module,
      fn: this.target.identity,
    })
  }

  get identity(): string {
    return this.target.identity
  }

  get contextIndex(): number {
    return this.target.contextIndex ?? 0
  }

  call(...args: A): R {
    return this.run({ args }, () => this.fn(...args))
  }

  invoke(call: CallArguments): R {
    return this.run(call, () => this.apply(call))
  }

  /**
   * Drop the entry a call with these arguments would use.
   */
  delete(...args: A): void {
    this.deleteWith({ args })
  }

  deleteWith(call: CallArguments): void {
    const context = this.contextOf(call)
    if (context === undefined) return

    const key = this.keyFor(call)
    if (key === undefined) return

    this.logger.debug("deleted cached value", { key })
    this.store.peek(context)?.delete(key)
  }

  /**
   * Drop every entry this function stored on `context`. Entries of other
   * functions sharing the context stay.
   */
  clear(context: object): void {
    const entries = this.store.peek(context)
    if (entries === undefined) return

    for (const key of [...entries.keys()]) {
      if (key.startsWith(this.target.identity)) entries.delete(key)
    }
  }

  /**
   * The context's mapping, shared with other functions cached on it.
   */
  entries(context: object): ReadonlyMap<string, unknown> {
    return this.store.entriesFor(context)
  }

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

  asFunction(): (...args: A) => R {
    return (...args: A) => this.call(...args)
  }

  private run(call: CallArguments, compute: () => R): R {
    const context = this.contextOf(call)

    if (context === undefined) {
      this.logger.debug("no context object, computing uncached")
      bindArguments(this.target.parameters, call, this.target.identity)
      return compute()
    }

    const key = this.keyFor(call)

    if (key === undefined) {
      this.logger.debug("skipped cache check")
      return compute()
    }

    const entries = this.store.entriesFor(context)

    if (entries.has(key)) {
      this.logger.debug("obtained cached value", { key })
      // Entries under this identity prefix are only written by this wrapper.
      return entries.get(key) as R
    }

    this.logger.debug("calculated new value", { key })
    const result = compute()

    if (isMarker(result, this.marker)) return result

    entries.set(key, result)

    if (result instanceof Promise) this.forgetUnless(entries, key, result)

    return result
  }

  private forgetUnless(entries: Map<string, unknown>, key: CacheKey, pending: Promise<unknown>): void {
    const forget = (): void => {
      if (entries.get(key) === pending) entries.delete(key)
    }

    void pending.then(
      (value) => {
        if (isMarker(value, this.marker)) forget()
      },
      forget,
    )
  }

  private contextOf(call: CallArguments): object | undefined {
    const context = this.contextArgument(call)

    return isContextObject(context) ? context : undefined
  }

  private contextArgument(call: CallArguments): unknown {
    const index = this.contextIndex
    const parameter = this.target.parameters[index]
    if (parameter === undefined) return undefined

    let value: unknown
    if (index < call.args.length) value = call.args[index]
    else if (call.kwargs !== undefined && Object.hasOwn(call.kwargs, parameter.name)) {
      value = call.kwargs[parameter.name]
    }

    if (value === undefined && parameter.kind === "optional") return parameter.default

    return value
  }

  private apply(call: CallArguments): R {
    const values =
      call.kwargs === undefined || Object.keys(call.kwargs).length === 0
        ? call.args
        : bindArguments(this.target.parameters, call, this.target.identity)

    // Arity and names were checked against the declared parameters.
    return this.fn(...([...values] as A))
  }
}

export function memoizeInContext<A extends unknown[], R, M extends Marker = DoNotCache>(
  options: MemoizeInContextOptions<M>,
  fn: (...args: A) => R,
): ContextMemoized<A, R, M> {
  return new ContextMemoized(fn, options)
}

/**
 * {@link memoizeInContext} with the context parameter named `request`.
 */
export function memoizeInRequest<A extends unknown[], R, M extends Marker = DoNotCache>(
  options: Omit<MemoizeInContextOptions<M>, "contextParam">,
  fn: (...args: A) => R,
): ContextMemoized<A, R, M> {
  return new ContextMemoized(fn, { ...options, contextParam: "request" })
}

function isContextObject(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function"
}
