/**
 * One call's arguments. `kwargs` supplies parameters by declared name.
 */
export type CallArguments = Readonly<{
  args: readonly unknown[]
  kwargs?: Readonly<Record<string, unknown>>
}>
