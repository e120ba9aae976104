import { MAX_TIMER_MS, type Milliseconds, type Sleeper } from "@respkv/clock"

/**
 * Single-waiter wake-up primitive.
 *
 * `notify()` interrupts a pending `wait()`. With no waiter, the notification
 * is kept and the next `wait()` returns at once, so a notify racing the
 * waiter going back to sleep is never lost.
 */
export class WakeSignal {
  private pending = false
  private waiter: AbortController | undefined

  constructor(private readonly sleeper: Sleeper) {}

  get isWaiting(): boolean {
    return this.waiter !== undefined
  }

  notify(): void {
    if (this.waiter) {
      this.waiter.abort()
      return
    }

    this.pending = true
  }

  /**
   * Wait for a notification, or at most `timeoutMs` when given. Without a
   * timeout no timer is armed.
   */
  async wait(timeoutMs?: Milliseconds): Promise<void> {
    if (this.pending) {
      this.pending = false
      return
    }

    const controller = new AbortController()
    this.waiter = controller

    try {
      if (timeoutMs === undefined) {
        await untilAborted(controller.signal)
      } else {
        await this.sleeper.sleep(Math.min(timeoutMs, MAX_TIMER_MS), controller.signal)
      }
    } finally {
      this.waiter = undefined
    }
  }
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}
