import { type Clock, MAX_TIMER_MS, type Milliseconds } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import type { ExpiringStore } from "@respkv/store"
import { DEFAULT_MAX_FRAME_BYTES } from "../connection/connection"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"

export interface ServerDependencies {
  logger: Logger
  clock: Clock
  /** Shared by every connection; closed as the last shutdown step. */
  store: ExpiringStore
}

export interface ServerOptions {
  /** @default 6379 */
  port?: number
  /** @default "127.0.0.1" */
  host?: string

  /** Budget for all start hooks together. @default MAX_TIMER_MS */
  startupTimeoutMs?: Milliseconds
  /** Budget for the whole shutdown sequence. @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  /** Largest request a connection will buffer. @default 512 MiB */
  maxFrameBytes?: number

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  maxFrameBytes: number
  startHooks: readonly LifecycleHook[]
  stopHooks: readonly LifecycleHook[]
}

export const DEFAULTS = {
  port: 6379,
  host: "127.0.0.1",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
} as const satisfies Omit<ResolvedServerOptions, "startHooks" | "stopHooks">

export function resolveOptions(options: ServerOptions = {}): ResolvedServerOptions {
  return {
    port: options.port ?? DEFAULTS.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    maxFrameBytes: options.maxFrameBytes ?? DEFAULTS.maxFrameBytes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
