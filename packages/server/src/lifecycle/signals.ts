import type { Milliseconds } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { StopResult } from "./shutdown"

export const DEFAULT_FATAL_TIMEOUT_MS: Milliseconds = 10_000

const GRACEFUL_SIGNALS = ["SIGINT", "SIGTERM"] as const

type FatalReason = "uncaughtException" | "unhandledRejection"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** Hard limit on a fatal shutdown before the process is killed. @default 10_000 */
  fatalTimeoutMs?: Milliseconds
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * Install process handlers:
 *
 * - SIGINT / SIGTERM run `stop()` once; later signals are only logged
 * - an uncaught exception or unhandled rejection runs `stop()` and exits 1,
 *   forcing the exit if `stop()` outlives `fatalTimeoutMs`
 * - a fatal event while already stopping exits 1 at once
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const { logger } = ctx
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? DEFAULT_FATAL_TIMEOUT_MS
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: FatalReason, err: unknown) => {
    if (stopping) {
      logger.fatal("Fatal error during shutdown", { reason, err })
      return process.exit(1)
    }

    stopping = true

    logger.fatal("Fatal error", { reason, err })
    void exitAfterStop(ctx, reason, fatalTimeoutMs)
  }

  const onUncaught = (err: Error) => onFatal("uncaughtException", err)
  const onRejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  for (const signal of GRACEFUL_SIGNALS) process.on(signal, onSignal)
  process.on("uncaughtException", onUncaught)
  process.on("unhandledRejection", onRejection)

  return {
    unregister: () => {
      for (const signal of GRACEFUL_SIGNALS) process.off(signal, onSignal)
      process.off("uncaughtException", onUncaught)
      process.off("unhandledRejection", onRejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function exitAfterStop(
  ctx: SignalHandlerContext,
  reason: FatalReason,
  timeoutMs: Milliseconds,
): Promise<void> {
  const forceExit = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    process.exit(1)
  }, timeoutMs)

  forceExit.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(forceExit)
  }

  process.exit(1)
}

/** Never rejects; outcomes are logged. */
async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
