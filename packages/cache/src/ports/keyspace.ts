/**
 * Versioned namespace every backend key is written under:
 *
 * ```
 * <keyPrefix>:<version>:<key>
 * ```
 *
 * Bumping `version` orphans every entry written under the previous one
 * without touching them.
 */
export type KeyspaceOptions = {
  keyPrefix: string
  version: number
}
