import type { CacheKey } from "@memento/cache"
import type { CallArguments } from "../../ports/call-arguments"
import type { MemoTarget } from "../../ports/key-function"
import { bindArguments, locateParameter } from "../signature/bind-arguments"
import { encodeArguments } from "./encode-arguments"

/**
 * The request fields this key function reads.
 */
export type RequestLike = {
  user?: { id?: unknown } | null
  ip?: string | null
}

/**
 * Key built from the request's user id and remote address only; every other
 * argument is ignored.
 *
 * The request is the first positional argument when that looks like a
 * request, otherwise the argument bound to the parameter named `request`.
 * A missing user id or address is encoded as `null`.
 *
 * @example
 * ```ts
 * requestUserIpKey(target, { args: [{ user: { id: 7 }, ip: "10.0.0.1" }] })
 * // 'web:profile:[7,"10.0.0.1"]'
 * ```
 */
export function requestUserIpKey(target: MemoTarget, call: CallArguments): CacheKey {
  const request = findRequest(target, call)

  const userId = request?.user?.id ?? null
  const ip = request?.ip ?? null

  return target.identity + encodeArguments([userId, ip])
}

function findRequest(target: MemoTarget, call: CallArguments): RequestLike | undefined {
  const first = call.args[0]
  if (isRequestLike(first)) return first

  const index = locateParameter(target.parameters, "request")
  if (index === undefined) return undefined

  const bound = bindArguments(target.parameters, call, target.identity)[index]

  return isRequestLike(bound) ? bound : undefined
}

function isRequestLike(value: unknown): value is RequestLike {
  return typeof value === "object" && value !== null && ("user" in value || "ip" in value)
}
