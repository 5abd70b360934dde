import { BaseError } from "@memento/errors"

export type BindingErrorCode = "binding_error"

/**
 * A call does not match the callable's declared parameters.
 */
export class BindingError extends BaseError<BindingErrorCode> {
  static tooManyPositional(identity: string, declared: number, given: number): BindingError {
    return new BindingError(
      `${identity} takes ${declared} positional argument(s) but ${given} were given.`,
      { identity, declared, given },
    )
  }

  static unknownKeywords(identity: string, names: readonly string[]): BindingError {
    return new BindingError(`${identity} got unexpected keyword argument(s): ${names.join(", ")}.`, {
      identity,
      names,
    })
  }

  static multipleValues(identity: string, names: readonly string[]): BindingError {
    return new BindingError(`${identity} got multiple values for argument(s): ${names.join(", ")}.`, {
      identity,
      names,
    })
  }

  static missingArguments(identity: string, names: readonly string[]): BindingError {
    return new BindingError(`${identity} is missing required argument(s): ${names.join(", ")}.`, {
      identity,
      names,
    })
  }

  constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: "binding_error", context, isOperational: false })
  }
}
