import type { Clock } from "../ports/clock"
import type { Milliseconds, MonotonicMs } from "../ports/time"

type Waiter = {
  wakeAtMs: MonotonicMs
  wake: () => void
}

/**
 * Clock for tests: time only moves through `advance()` and `set()`.
 *
 * Sleeps never touch real timers. One resolves when time reaches its wake
 * time or when its signal aborts, whichever comes first.
 */
export class FakeClock implements Clock {
  private current: MonotonicMs
  private readonly waiters = new Set<Waiter>()

  constructor(start: MonotonicMs = 0) {
    this.current = start
  }

  nowMs(): MonotonicMs {
    return this.current
  }

  advance(ms: Milliseconds): void {
    this.set(this.current + ms)
  }

  set(ms: MonotonicMs): void {
    this.current = ms

    for (const waiter of [...this.waiters]) {
      if (waiter.wakeAtMs <= ms) waiter.wake()
    }
  }

  get pendingSleeps(): number {
    return this.waiters.size
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const waiter: Waiter = {
        wakeAtMs: this.current + ms,
        wake: () => {
          this.waiters.delete(waiter)
          signal?.removeEventListener("abort", waiter.wake)
          resolve()
        },
      }

      this.waiters.add(waiter)
      signal?.addEventListener("abort", waiter.wake, { once: true })
    })
  }
}
