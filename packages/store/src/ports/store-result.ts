export type StoreFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type StoreNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a store read. Expired entries read as `not_found`.
 */
export type StoreResult<T> = StoreFound<T> | StoreNotFound
