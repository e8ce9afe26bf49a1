import { BaseError } from "@tenantry/errors"

export class ConfigError extends BaseError<"invalid_config"> {
  static invalid(details: string, keys: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { keys },
      isOperational: false,
    })
  }
}
