export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export { MAX_TIMER_MS, type Milliseconds, type MonotonicMs } from "./ports/time"
