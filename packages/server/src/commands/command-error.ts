import { BaseError } from "@respkv/errors"

/**
 * Bad arguments to a known command. The message is the reply text; the
 * connection stays open.
 */
export class CommandError extends BaseError<"command_error"> {
  constructor(message: string) {
    super(message, { code: "command_error" })
  }

  static wrongArity(command: string): CommandError {
    return new CommandError(`ERR wrong number of arguments for '${command}' command`)
  }

  static syntax(): CommandError {
    return new CommandError("ERR syntax error")
  }

  static notAnInteger(): CommandError {
    return new CommandError("ERR value is not an integer or out of range")
  }

  static invalidExpireTime(command: string): CommandError {
    return new CommandError(`ERR invalid expire time in '${command}' command`)
  }
}
