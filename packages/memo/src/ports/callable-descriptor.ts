import type { ParameterDeclaration } from "./parameter"

/**
 * What a wrapper knows about the callable it memoizes besides the function
 * value. Identity and parameter list are derived from it once, at wrap time.
 */
export type CallableDescriptor = {
  /**
   * Declaring module, e.g. `"billing/invoices"`. May not contain `:`.
   */
  module: string

  /**
   * Owning class or object for methods. May contain neither `:` nor `.`.
   */
  owner?: string

  /**
   * Defaults to the function's own `name`. May contain neither `:` nor `.`.
   */
  name?: string

  /**
   * Defaults to `arg0 … arg{length-1}`, all required.
   */
  parameters?: readonly ParameterDeclaration[]
}
