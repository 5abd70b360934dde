import { SignatureError } from "../errors/signature-error"

export type IdentityParts = {
  module: string
  owner?: string
  name: string
}

/**
 * Identity prefix of a callable: `<module>:<name>:` or
 * `<module>:<owner>.<name>:`.
 *
 * `module` may not contain `:`, `owner` and `name` neither `:` nor `.`, so
 * distinct parts never produce the same prefix.
 *
 * @example
 * ```ts
 * callableIdentity({ module: "billing", owner: "Invoice", name: "total" })
 * // "billing:Invoice.total:"
 * ```
 */
export function callableIdentity({ module, owner, name }: IdentityParts): string {
  assertPart("module", module, /:/)
  if (owner !== undefined) assertPart("owner", owner, /[:.]/)
  assertPart("name", name, /[:.]/)

  return owner === undefined ? `${module}:${name}:` : `${module}:${owner}.${name}:`
}

function assertPart(part: string, value: string, forbidden: RegExp): void {
  if (value.length === 0) {
    throw new SignatureError(`Callable ${part} must not be empty.`, { part })
  }

  if (forbidden.test(value)) {
    throw new SignatureError(`Callable ${part} ${JSON.stringify(value)} contains a reserved separator.`, {
      part,
      value,
    })
  }
}
