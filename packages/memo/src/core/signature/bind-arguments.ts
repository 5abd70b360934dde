import type { CallArguments } from "../../ports/call-arguments"
import type { Parameter } from "../../ports/parameter"
import { BindingError } from "../errors/binding-error"

/**
 * Align a call with the declared parameters: one value per parameter.
 *
 * Omitted parameters and parameters passed as `undefined` take their
 * declared default. A required parameter passed as `undefined` stays
 * `undefined`; only an omitted one is an error.
 *
 * When the call is purely positional and supplies every parameter, the
 * positional values are used as given. Name lookups only happen on the
 * slow path; both paths produce the same vector.
 *
 * @throws {BindingError} when the call does not fit the parameters.
 */
export function bindArguments(
  parameters: readonly Parameter[],
  call: CallArguments,
  identity = "<callable>",
): unknown[] {
  const { args } = call
  const kwargs = call.kwargs ?? {}
  const keywordNames = Object.keys(kwargs)

  if (args.length > parameters.length) {
    throw BindingError.tooManyPositional(identity, parameters.length, args.length)
  }

  if (keywordNames.length === 0 && args.length === parameters.length) {
    return parameters.map((p, i) => withDefault(p, args[i]))
  }

  const declared = new Set(parameters.map((p) => p.name))
  const unknown = keywordNames.filter((name) => !declared.has(name))
  if (unknown.length > 0) throw BindingError.unknownKeywords(identity, unknown)

  const duplicated = parameters.slice(0, args.length).filter((p) => Object.hasOwn(kwargs, p.name))
  if (duplicated.length > 0) {
    throw BindingError.multipleValues(identity, duplicated.map((p) => p.name))
  }

  const missing: string[] = []

  const vector = parameters.map((p, i) => {
    if (i < args.length) return withDefault(p, args[i])
    if (Object.hasOwn(kwargs, p.name)) return withDefault(p, kwargs[p.name])
    if (p.kind === "optional") return p.default

    missing.push(p.name)
    return undefined
  })

  if (missing.length > 0) throw BindingError.missingArguments(identity, missing)

  return vector
}

/**
 * Index of the parameter called `name`, or `undefined`.
 */
export function locateParameter(parameters: readonly Parameter[], name: string): number | undefined {
  const index = parameters.findIndex((p) => p.name === name)

  return index === -1 ? undefined : index
}

function withDefault(parameter: Parameter, value: unknown): unknown {
  if (value === undefined && parameter.kind === "optional") return parameter.default

  return value
}
