import type { CallableDescriptor } from "../ports/callable-descriptor"
import type { MemoTarget } from "../ports/key-function"
import { callableIdentity } from "./identity/callable-identity"
import { declaredParameters } from "./signature/declared-parameters"

/**
 * Identity and parameter list of `fn`, computed once at wrap time.
 */
export function createMemoTarget(
  fn: { readonly name: string; readonly length: number },
  descriptor: CallableDescriptor,
): MemoTarget {
  const parameters = declaredParameters(fn, descriptor.parameters)
  const identity = callableIdentity({
    module: descriptor.module,
    ...(descriptor.owner !== undefined && { owner: descriptor.owner }),
    name: descriptor.name ?? fn.name,
  })

  return Object.freeze({ identity, parameters })
}
