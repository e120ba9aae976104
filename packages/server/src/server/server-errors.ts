import { BaseError } from "@respkv/errors"
import type { HookFailure } from "../lifecycle/lifecycle-hook"

export class StartupError extends BaseError<"startup_failed"> {
  constructor(failures: readonly HookFailure[], timedOut: boolean) {
    super(timedOut ? "Startup timed out" : "Startup hook failed", {
      code: "startup_failed",
      context: { hooks: failures.map((f) => f.hook), timedOut },
      cause: failures[0]?.error,
      isOperational: false,
    })
  }
}
