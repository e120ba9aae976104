import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Listener, ServerAddress } from "./listen"
import type { ShutdownFn, StopResult } from "./shutdown"

/** What `Server.start()` hands back. */
export interface ServerHandle {
  /** Graceful stop. Every call, concurrent or later, gets the same result. */
  stop(): Promise<StopResult>
  address: ServerAddress
}

export interface RunningServerContext {
  listener: Listener
  deps: ServerDependencies
  options: ResolvedServerOptions
  stopHooks: readonly LifecycleHook[]
  shutdown: ShutdownFn
  /** Called once shutdown settles, whether or not it succeeded. */
  onStop: () => void
}

export function createStopper(ctx: RunningServerContext): ServerHandle {
  const { listener, deps, options, stopHooks, shutdown, onStop } = ctx
  let result: Promise<StopResult> | undefined

  const stopOnce = async (): Promise<StopResult> => {
    try {
      return await shutdown({
        listener,
        store: deps.store,
        deps,
        deadlineMs: deps.clock.nowMs() + options.shutdownTimeoutMs,
        stopHooks,
      })
    } finally {
      onStop()
    }
  }

  return {
    stop: () => (result ??= stopOnce()),
    address: { ...listener.address },
  }
}

export type CreateStopperFn = typeof createStopper
