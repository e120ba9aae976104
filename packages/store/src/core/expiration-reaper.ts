import type { Clock, MonotonicMs } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { WakeSignal } from "./wake-signal"

export type ExpirationReaperDeps = {
  clock: Clock
  logger: Logger
  wake: WakeSignal
  /** Evict everything due at `nowMs`; returns the next deadline, if any. */
  purge: (nowMs: MonotonicMs) => MonotonicMs | undefined
}

/**
 * Background eviction loop: purge what is due, then sleep until the next
 * deadline or until woken.
 */
export class ExpirationReaper {
  private stopped = false
  private loop: Promise<void> | undefined

  constructor(private readonly deps: ExpirationReaperDeps) {}

  get isRunning(): boolean {
    return this.loop !== undefined && !this.stopped
  }

  start(): void {
    if (this.loop || this.stopped) return

    this.loop = this.run().catch((err: unknown) => {
      this.deps.logger.error("Expiration reaper stopped unexpectedly", { err })
    })
  }

  /** Resolves once the loop has exited. Idempotent. */
  async stop(): Promise<void> {
    this.stopped = true
    this.deps.wake.notify()

    await this.loop
  }

  private async run(): Promise<void> {
    const { clock, wake, purge, logger } = this.deps

    logger.debug("Expiration reaper started")

    while (!this.stopped) {
      const now = clock.nowMs()
      const next = purge(now)

      if (this.stopped) break

      await wake.wait(next === undefined ? undefined : Math.max(0, next - now))
    }

    logger.debug("Expiration reaper stopped")
  }
}
