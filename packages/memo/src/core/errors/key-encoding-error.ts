import { BaseError } from "@memento/errors"

export type KeyEncodingErrorCode = "key_encoding_error"

/**
 * An argument has no stable text form, so no key can tell its calls apart.
 * Wrappers treat such a call as uncacheable.
 */
export class KeyEncodingError extends BaseError<KeyEncodingErrorCode> {
  static unencodable(path: string, kind: string): KeyEncodingError {
    return new KeyEncodingError(`Argument at ${path} (${kind}) cannot be encoded into a cache key.`, { path, kind })
  }

  constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: "key_encoding_error", context })
  }
}
