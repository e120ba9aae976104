import type { Clock } from "../ports/clock"
import { MAX_TIMER_MS, type Milliseconds, type MonotonicMs } from "../ports/time"

/** Monotonic time from `performance`, anchored at the process's wall-clock start. */
export class SystemClock implements Clock {
  nowMs(): MonotonicMs {
    return performance.timeOrigin + performance.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", done)
        resolve()
      }

      const timer = setTimeout(done, Math.min(ms, MAX_TIMER_MS))
      signal?.addEventListener("abort", done, { once: true })
    })
  }
}
