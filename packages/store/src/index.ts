export { type ExpirationEntry, ExpirationIndex, compareExpirations } from "./core/expiration-index"
export { ExpirationReaper, type ExpirationReaperDeps } from "./core/expiration-reaper"
export { ExpiringStore, type ExpiringStoreDeps, type StoredEntry } from "./core/expiring-store"
export { WakeSignal } from "./core/wake-signal"
export type { ExpiringStoreOptions, StoreSetOptions } from "./ports/store-options"
export type { StoreFound, StoreNotFound, StoreResult } from "./ports/store-result"
