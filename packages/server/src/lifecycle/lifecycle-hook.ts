import type { Milliseconds } from "@respkv/clock"

export interface LifecycleHookContext {
  /** Aborts when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

/** A named async step run during startup or shutdown. */
export type LifecycleHook = {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

/** A hook that threw, with what it threw. */
export type HookFailure = {
  hook: string
  error: unknown
}
