/** A duration in milliseconds. */
export type Milliseconds = number

/**
 * A point on the monotonic timeline, in milliseconds.
 *
 * @remarks
 * Only comparable with other values from the same clock. Never goes backwards,
 * even when the wall clock is adjusted.
 */
export type MonotonicMs = number

/** Largest delay a Node.js timer accepts before it overflows to 1ms. */
export const MAX_TIMER_MS: Milliseconds = 2_147_483_647
