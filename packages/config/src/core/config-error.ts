import { BaseError } from "@tablecache/errors"
import { z } from "zod"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(error: z.ZodError, sources: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${z.prettifyError(error)}`, {
      code: "config_invalid",
      context: { sources: [...sources], keys: error.issues.map((i) => i.path.map(String).join(".")) },
      cause: error,
      isOperational: false,
    })
  }
}
