import { type Clock, MAX_TIMER_MS, type Milliseconds, type MonotonicMs } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: MonotonicMs
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookOutcome =
  | { failed: false; timedOut: boolean }
  | { failed: true; error: unknown; timedOut: boolean }

/**
 * Run hooks one after another under a shared deadline. Each hook gets a
 * signal that aborts when the deadline passes; once it has passed, the
 * remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const budgetMs = ctx.deadlineMs - ctx.clock.nowMs()

    if (budgetMs <= 0) {
      ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
      return { failures, timedOut: true }
    }

    const outcome = await attempt(ctx, hook, budgetMs)

    if (outcome.failed) {
      failures.push({ hook: hook.name, error: outcome.error })
      if (policy.failFast) return { failures, timedOut: outcome.timedOut }
    }

    if (outcome.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function attempt(
  ctx: RunHooksContext,
  hook: LifecycleHook,
  budgetMs: Milliseconds,
): Promise<HookOutcome> {
  const phase = titleCase(ctx.phase)
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), Math.min(budgetMs, MAX_TIMER_MS))

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: budgetMs })

    const timedOut = pastDeadline(ctx, controller.signal)

    if (timedOut) ctx.logger.warn(`${phase} deadline exceeded during hook: ${hook.name}`)
    else ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { failed: false, timedOut }
  } catch (error) {
    ctx.logger.error(`${phase} hook failed: ${hook.name}`, { err: error })

    const timedOut = pastDeadline(ctx, controller.signal)

    if (timedOut) {
      ctx.logger.warn(`${phase} deadline exceeded during hook failure: ${hook.name}`)
    }

    return { failed: true, error, timedOut }
  } finally {
    clearTimeout(timer)
  }
}

function pastDeadline(ctx: RunHooksContext, signal: AbortSignal): boolean {
  return signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}

function titleCase(phase: HookPhase): string {
  return phase.charAt(0).toUpperCase() + phase.slice(1)
}
