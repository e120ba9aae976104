import { BaseError } from "@respkv/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(message: string, options: { sources: readonly string[]; cause?: unknown }) {
    super(message, {
      code: "config_invalid",
      context: { sources: options.sources },
      cause: options.cause,
      isOperational: false,
    })
  }
}
