import type { Milliseconds, MonotonicMs } from "./time"

export type TimeSource = {
  /** Current monotonic time. Use for deadlines and elapsed-time arithmetic. */
  nowMs(): MonotonicMs
}

export interface Sleeper {
  /** Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
