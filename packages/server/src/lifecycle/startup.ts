import type { Clock, MonotonicMs } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: MonotonicMs
  startHooks: readonly LifecycleHook[]
}

export type StartResult = { ok: boolean; failures: HookFailure[]; timedOut: boolean }

/** Start hooks run fail-fast: the first failure ends startup. */
export async function startup({
  clock,
  logger,
  deadlineMs,
  startHooks,
}: StartupContext): Promise<StartResult> {
  logger.debug("Running startup hooks...")

  const result = await runHooks({ phase: "startup", clock, logger, deadlineMs }, startHooks, {
    failFast: true,
  })
  const ok = result.failures.length === 0 && !result.timedOut

  if (ok) logger.debug("Startup hooks complete")

  return { ok, ...result }
}

export type StartupFn = typeof startup
