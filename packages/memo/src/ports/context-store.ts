/**
 * Per-context key → value mappings.
 *
 * A mapping is created on first use and lives as long as its context object;
 * every wrapper that shares a store and a context object shares the mapping.
 */
export interface ContextStore {
  /**
   * The context's mapping, created empty if it does not exist yet.
   */
  entriesFor(context: object): Map<string, unknown>

  /**
   * The context's mapping if one was created, without creating it.
   */
  peek(context: object): Map<string, unknown> | undefined
}
