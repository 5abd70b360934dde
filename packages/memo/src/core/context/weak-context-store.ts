import type { ContextStore } from "../../ports/context-store"

/**
 * Context store backed by a `WeakMap`: nothing is written onto the context
 * object, and a mapping is collected together with its context.
 */
export class WeakContextStore implements ContextStore {
  private readonly mappings = new WeakMap<object, Map<string, unknown>>()

  entriesFor(context: object): Map<string, unknown> {
    let entries = this.mappings.get(context)

    if (entries === undefined) {
      entries = new Map()
      this.mappings.set(context, entries)
    }

    return entries
  }

  peek(context: object): Map<string, unknown> | undefined {
    return this.mappings.get(context)
  }
}

/**
 * Store shared by every context wrapper and request cache that is not given
 * one explicitly.
 */
export const defaultContextStore: ContextStore = new WeakContextStore()
