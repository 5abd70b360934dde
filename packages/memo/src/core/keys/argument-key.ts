import type { CacheKey } from "@memento/cache"
import type { CallArguments } from "../../ports/call-arguments"
import type { MemoTarget } from "../../ports/key-function"
import { bindArguments } from "../signature/bind-arguments"
import { encodeArguments } from "./encode-arguments"

/**
 * Default key function: identity prefix followed by the encoded argument
 * vector, with the context argument left out.
 *
 * @example
 * ```ts
 * // total(year, region) declared in module "reports"
 * argumentKey(target, { args: [2024, "eu"] }) // 'reports:total:[2024,"eu"]'
 * argumentKey(target, { args: [], kwargs: { year: 2024, region: "eu" } }) // same key
 * ```
 */
export function argumentKey(target: MemoTarget, call: CallArguments): CacheKey {
  const vector = bindArguments(target.parameters, call, target.identity)
  const { contextIndex } = target

  const values = contextIndex === undefined ? vector : vector.filter((_, i) => i !== contextIndex)

  return target.identity + encodeArguments(values)
}
