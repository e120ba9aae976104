import type { Clock, MonotonicMs } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

/** `net.Server`-style close with a completion callback. */
export interface Closeable {
  close(callback?: (err?: Error | null) => void): void
}

/** Resource stopped last, after the consumer stop hooks. */
export interface AsyncCloseable {
  close(): Promise<void>
}

export type ShutdownContext = {
  listener: Closeable
  store: AsyncCloseable
  deps: { clock: Clock; logger: Logger }
  deadlineMs: MonotonicMs
  stopHooks: readonly LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout */
  ok: boolean
  failures: HookFailure[]
  /**
   * The deadline passed before every step finished. Connections that never
   * closed are left to the process exit.
   */
  timedOut: boolean
}

/** Budget for the store step when the shutdown deadline has already passed. */
export const STORE_CLOSE_GRACE_MS = 1_000

/**
 * Stop accepting and end open connections, run the consumer stop hooks, then
 * stop the store's reaper. Every hook runs even if an earlier one failed; the
 * store step also runs after a timeout, under its own short budget.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  const { logger, clock } = ctx.deps

  logger.warn("Shutting down gracefully...")

  const main = await runHooks(
    { phase: "shutdown", clock, logger, deadlineMs: ctx.deadlineMs },
    [createCloseListenerHook(ctx.listener), ...ctx.stopHooks],
    { failFast: false },
  )

  const final = await runHooks(
    {
      phase: "shutdown",
      clock,
      logger,
      deadlineMs: Math.max(ctx.deadlineMs, clock.nowMs() + STORE_CLOSE_GRACE_MS),
    },
    [createCloseStoreHook(ctx.store)],
  )

  const failures = [...main.failures, ...final.failures]
  const timedOut = main.timedOut || final.timedOut
  const ok = failures.length === 0 && !timedOut

  logger.info("Shutdown complete", { ok, failures: failures.length, timedOut })

  return { ok, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function createCloseStoreHook(store: AsyncCloseable): LifecycleHook {
  return {
    name: "store.close",
    fn: () => store.close(),
  }
}

function createCloseListenerHook(listener: Closeable): LifecycleHook {
  return {
    name: "listener.close",
    fn: ({ signal }) => closeUnlessAborted(listener, signal),
  }
}

/**
 * Settles when the listener reports closed, or quietly when `signal` aborts
 * first. A close error rejects.
 */
function closeUnlessAborted(listener: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve()
    signal.addEventListener("abort", onAbort, { once: true })

    listener.close((err) => {
      signal.removeEventListener("abort", onAbort)

      if (err) reject(err)
      else resolve()
    })
  })
}
