import type { Parameter, ParameterDeclaration } from "../../ports/parameter"
import { SignatureError } from "../errors/signature-error"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Validated parameter list of `fn`.
 *
 * Without declarations the list is `arg0 … arg{length-1}`. With them, the
 * leading run of required declarations has to match `fn.length`, which
 * counts parameters up to the first one with a default.
 */
export function declaredParameters(
  fn: { readonly name: string; readonly length: number },
  declarations?: readonly ParameterDeclaration[],
): readonly Parameter[] {
  if (declarations === undefined) {
    return Object.freeze(
      Array.from({ length: fn.length }, (_, i): Parameter => ({ name: `arg${i}`, kind: "required" })),
    )
  }

  const parameters = declarations.map(toParameter)
  const seen = new Set<string>()

  for (const { name } of parameters) {
    if (!IDENTIFIER.test(name)) {
      throw new SignatureError(`Parameter name ${JSON.stringify(name)} is not an identifier.`, {
        fn: fn.name,
        parameter: name,
      })
    }

    if (seen.has(name)) {
      throw new SignatureError(`Parameter ${name} is declared more than once.`, {
        fn: fn.name,
        parameter: name,
      })
    }

    seen.add(name)
  }

  const leadingRequired = countLeadingRequired(parameters)

  if (leadingRequired !== fn.length) {
    throw new SignatureError(
      `Declared parameters of ${fn.name || "<anonymous>"} start with ${leadingRequired} required ` +
        `parameter(s) but the function takes ${fn.length}.`,
      { fn: fn.name, declared: parameters.map((p) => p.name), length: fn.length },
    )
  }

  return Object.freeze(parameters)
}

function toParameter(declaration: ParameterDeclaration): Parameter {
  if (typeof declaration === "string") return { name: declaration, kind: "required" }

  return { name: declaration.name, kind: "optional", default: declaration.default }
}

function countLeadingRequired(parameters: readonly Parameter[]): number {
  const firstOptional = parameters.findIndex((p) => p.kind === "optional")

  return firstOptional === -1 ? parameters.length : firstOptional
}
