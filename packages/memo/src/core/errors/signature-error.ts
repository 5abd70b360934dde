import { BaseError } from "@memento/errors"

export type SignatureErrorCode = "signature_error"

/**
 * A memoized callable was declared in a way the wrapper cannot work with.
 * Raised at wrap time, never during a call.
 */
export class SignatureError extends BaseError<SignatureErrorCode> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "signature_error", context, isOperational: false })
  }
}
