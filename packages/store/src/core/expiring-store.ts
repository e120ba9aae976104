import type { Clock, Milliseconds, MonotonicMs } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { ExpiringStoreOptions, StoreSetOptions } from "../ports/store-options"
import type { StoreResult } from "../ports/store-result"
import { type ExpirationEntry, ExpirationIndex } from "./expiration-index"
import { ExpirationReaper } from "./expiration-reaper"
import { WakeSignal } from "./wake-signal"

export type ExpiringStoreDeps = {
  clock: Clock
  logger: Logger
}

export type StoredEntry = {
  readonly value: Uint8Array
  readonly deadlineMs?: MonotonicMs
}

/**
 * In-memory key/value map with per-key deadlines.
 *
 * Every operation touches the map and the expiration index inside one
 * synchronous block, so no other task observes one updated without the
 * other. The reaper is only ever notified after that block.
 *
 * One instance is shared by every connection.
 */
export class ExpiringStore {
  private readonly entries = new Map<string, StoredEntry>()
  private readonly index = new ExpirationIndex()
  private readonly wake: WakeSignal
  private readonly reaper: ExpirationReaper
  private closing: Promise<void> | undefined

  constructor(
    private readonly deps: ExpiringStoreDeps,
    opts: ExpiringStoreOptions = {},
  ) {
    this.wake = new WakeSignal(deps.clock)
    this.reaper = new ExpirationReaper({
      clock: deps.clock,
      logger: deps.logger,
      wake: this.wake,
      purge: (nowMs) => this.purgeExpired(nowMs),
    })

    if (opts.reaper ?? true) this.reaper.start()
  }

  /** Entries held, including expired ones not reclaimed yet. */
  get size(): number {
    return this.entries.size
  }

  get(key: string): StoreResult<Uint8Array> {
    const entry = this.liveEntry(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: entry.value }
  }

  has(key: string): boolean {
    return this.liveEntry(key) !== undefined
  }

  /**
   * Insert or overwrite. Without `ttlMs` the key has no deadline, even if the
   * previous value had one.
   */
  set(key: string, value: Uint8Array, opts: StoreSetOptions = {}): void {
    const { ttlMs } = opts

    if (ttlMs !== undefined && !isValidTtl(ttlMs)) {
      throw new RangeError(`ttlMs must be a positive finite number, got ${ttlMs}`)
    }

    const deadlineMs = ttlMs === undefined ? undefined : this.deps.clock.nowMs() + ttlMs
    let wakeReaper = false

    const previous = this.entries.get(key)
    if (previous) this.unindex(key, previous)

    this.entries.set(key, {
      value: new Uint8Array(value),
      ...(deadlineMs !== undefined && { deadlineMs }),
    })

    if (deadlineMs !== undefined) {
      const earliest = this.index.peek()
      wakeReaper = earliest === undefined || deadlineMs < earliest.deadlineMs
      this.index.insert({ deadlineMs, key })
    }

    if (wakeReaper) this.wake.notify()
  }

  /** Returns whether a live entry was removed. */
  delete(key: string): boolean {
    const entry = this.entries.get(key)
    if (!entry) return false

    const live = !this.isExpired(entry, this.deps.clock.nowMs())
    this.removeEntry(key, entry)

    return live
  }

  /** Ordered snapshot of the expiration index. */
  expirations(): readonly ExpirationEntry[] {
    return this.index.entries()
  }

  /**
   * Evict every entry due at `nowMs`. Returns the earliest remaining deadline.
   */
  purgeExpired(nowMs: MonotonicMs = this.deps.clock.nowMs()): MonotonicMs | undefined {
    const due = this.index.popDue(nowMs)

    for (const { key } of due) {
      this.entries.delete(key)
    }

    if (due.length > 0) {
      this.deps.logger.trace("Evicted expired keys", { count: due.length })
    }

    return this.index.peek()?.deadlineMs
  }

  /** Stop the reaper. Reads and writes keep working, with lazy expiry only. */
  close(): Promise<void> {
    this.closing ??= this.reaper.stop()

    return this.closing
  }

  private liveEntry(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry, this.deps.clock.nowMs())) {
      this.removeEntry(key, entry)
      return undefined
    }

    return entry
  }

  private removeEntry(key: string, entry: StoredEntry): void {
    this.entries.delete(key)
    this.unindex(key, entry)
  }

  private unindex(key: string, entry: StoredEntry): void {
    if (entry.deadlineMs !== undefined) {
      this.index.remove({ deadlineMs: entry.deadlineMs, key })
    }
  }

  private isExpired(entry: StoredEntry, nowMs: MonotonicMs): boolean {
    return entry.deadlineMs !== undefined && nowMs >= entry.deadlineMs
  }
}

function isValidTtl(ttlMs: Milliseconds): boolean {
  return Number.isFinite(ttlMs) && ttlMs > 0
}
