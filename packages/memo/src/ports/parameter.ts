/**
 * How a memoized callable declares one of its parameters: a bare name for a
 * required parameter, or a name with the default the function itself uses.
 */
export type ParameterDeclaration = string | Readonly<{ name: string; default: unknown }>

export type Parameter =
  | Readonly<{ name: string; kind: "required" }>
  | Readonly<{ name: string; kind: "optional"; default: unknown }>
