import { BaseError } from "@memento/errors"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, sources: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
    })
  }
}
