import { serve, type ServeFn } from "../handler/serve"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, type Listener, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import { StartupError } from "./server-errors"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type ServerState = "idle" | "starting" | "started"

/** The lifecycle steps a Server delegates to; replaced in unit tests. */
export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  serve: ServeFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
}

const productionCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  serve,
  createStopper,
  setupProcessHandlers,
}

const NOTHING_TO_STOP: StopResult = { ok: true, failures: [], timedOut: false }

/**
 * One server instance: start hooks, then a TCP listener feeding connections
 * into the shared store. `start()` may be called once; after a failed start
 * the server is idle again and may be retried.
 */
export class Server {
  private state: ServerState = "idle"
  private handle?: ServerHandle
  private signals?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly steps: ServerCollaborators = productionCollaborators,
  ) {}

  getState(): ServerState {
    return this.state
  }

  /** Route SIGINT/SIGTERM and fatal process events to `stop()`. Only installs once. */
  setupProcessHandlers(): this {
    this.signals ??= this.steps.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.stopIfRunning(),
      fatalTimeoutMs: this.options.shutdownTimeoutMs,
    })

    return this
  }

  /** @throws {StartupError} when a start hook fails or startup runs out of time */
  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") throw new Error("Server already started")

    this.state = "starting"

    try {
      await this.runStartHooks()
      this.handle = this.watch(await this.bind())
      this.state = "started"

      return this.handle
    } catch (err) {
      this.state = "idle"
      throw err
    }
  }

  private async runStartHooks(): Promise<void> {
    const { clock, logger } = this.deps
    const result = await this.steps.onStartup({
      clock,
      logger,
      deadlineMs: clock.nowMs() + this.options.startupTimeoutMs,
      startHooks: this.options.startHooks,
    })

    if (!result.ok) throw new StartupError(result.failures, result.timedOut)
  }

  private bind(): Promise<Listener> {
    return this.steps.listen({ options: this.options, deps: this.deps, serve: this.steps.serve })
  }

  private watch(listener: Listener): ServerHandle {
    return this.steps.createStopper({
      listener,
      deps: this.deps,
      options: this.options,
      stopHooks: this.options.stopHooks,
      shutdown: this.steps.onShutdown,
      onStop: () => this.signals?.unregister(),
    })
  }

  private stopIfRunning(): Promise<StopResult> {
    if (this.handle) return this.handle.stop()

    this.deps.logger.warn("Stop called but server not running")
    return Promise.resolve(NOTHING_TO_STOP)
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions = {}): Server {
  return new Server(deps, resolveOptions(options))
}
