import type { Milliseconds } from "@respkv/clock"

export type StoreSetOptions = {
  /** Time to live from now. Omitted: the entry never expires. */
  ttlMs?: Milliseconds
}

export type ExpiringStoreOptions = {
  /**
   * Start the background reaper at construction.
   *
   * With the reaper off, expired entries are only dropped when read.
   * @default true
   */
  reaper?: boolean
}
