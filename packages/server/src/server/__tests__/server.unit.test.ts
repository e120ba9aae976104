import { FakeClock } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import { ExpiringStore } from "@respkv/store"
import { mock } from "vitest-mock-extended"
import type { RunningServerContext, ServerHandle } from "../../lifecycle/create-stopper"
import type { Listener } from "../../lifecycle/listen"
import type { StartResult } from "../../lifecycle/startup"
import type { StopResult } from "../../lifecycle/shutdown"
import type { SignalHandlerContext } from "../../lifecycle/signals"
import type { Mock } from "../../tests/mock"
import { Server, type ServerCollaborators, type ServerState } from "../server"
import { StartupError } from "../server-errors"
import { type ResolvedServerOptions, resolveOptions, type ServerDependencies } from "../server-options"

const STARTED: StartResult = { ok: true, failures: [], timedOut: false }
const STOPPED: StopResult = { ok: true, failures: [], timedOut: false }

describe("Server", () => {
  let logger: Mock<Logger>
  let clock: FakeClock
  let deps: ServerDependencies
  let options: ResolvedServerOptions
  let listener: Listener
  let steps: ServerCollaborators

  function fakeHandle(stop = vi.fn(async () => STOPPED)): ServerHandle {
    return { stop, address: { host: "127.0.0.1", port: 7100 } }
  }

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(0)
    deps = { logger, clock, store: new ExpiringStore({ clock, logger }, { reaper: false }) }
    options = resolveOptions({ port: 7100, maxFrameBytes: 4096 })
    listener = { address: { host: "127.0.0.1", port: 7100 }, close: vi.fn() }

    steps = {
      onStartup: vi.fn(async () => STARTED),
      onShutdown: vi.fn(async () => STOPPED),
      listen: vi.fn(async () => listener),
      serve: vi.fn(() => ({ size: 0, endAll: vi.fn() })),
      createStopper: vi.fn(() => fakeHandle()),
      setupProcessHandlers: vi.fn(() => ({ unregister: vi.fn() })),
    }
  })

  function build(overrides: Partial<ServerCollaborators> = {}): Server {
    return new Server(deps, options, { ...steps, ...overrides })
  }

  describe("start", () => {
    it("runs the start hooks, binds, then hands back the stopper's handle", async () => {
      const order: string[] = []
      const handle = fakeHandle()
      const server = build({
        onStartup: vi.fn(async () => {
          order.push("hooks")
          return STARTED
        }),
        listen: vi.fn(async () => {
          order.push("listen")
          return listener
        }),
        createStopper: vi.fn(() => {
          order.push("stopper")
          return handle
        }),
      })

      await expect(server.start()).resolves.toBe(handle)
      expect(order).toStrictEqual(["hooks", "listen", "stopper"])
      expect(server.getState()).toBe("started")
    })

    it("gives the start hooks a deadline of now plus startupTimeoutMs", async () => {
      clock.set(2_500)
      options.startupTimeoutMs = 500
      options.startHooks = [{ name: "warmup", fn: async () => {} }]

      await build().start()

      expect(steps.onStartup).toHaveBeenCalledExactlyOnceWith({
        clock,
        logger,
        deadlineMs: 3_000,
        startHooks: options.startHooks,
      })
    })

    it("binds with the resolved options and the connection handler", async () => {
      await build().start()

      expect(steps.listen).toHaveBeenCalledExactlyOnceWith({ options, deps, serve: steps.serve })
    })

    it("hands the listener, stop hooks and shutdown routine to the stopper", async () => {
      options.stopHooks = [{ name: "flush-metrics", fn: async () => {} }]

      await build().start()

      expect(steps.createStopper).toHaveBeenCalledWith(
        expect.objectContaining({
          listener,
          deps,
          options,
          stopHooks: options.stopHooks,
          shutdown: steps.onShutdown,
        }),
      )
    })

    it("is starting while the hooks and the stopper run", async () => {
      const seen: ServerState[] = []
      const server: Server = build({
        onStartup: vi.fn(async () => {
          seen.push(server.getState())
          return STARTED
        }),
        createStopper: vi.fn(() => {
          seen.push(server.getState())
          return fakeHandle()
        }),
      })

      expect(server.getState()).toBe("idle")
      await server.start()

      expect(seen).toStrictEqual(["starting", "starting"])
    })

    it("refuses a second start, during or after the first", async () => {
      const pending = build({ onStartup: () => new Promise<StartResult>(() => {}) })
      void pending.start()
      await expect(pending.start()).rejects.toThrow("Server already started")

      const started = build()
      await started.start()
      await expect(started.start()).rejects.toThrow("Server already started")
    })
  })

  describe("failed start", () => {
    it("raises StartupError naming the failed hook, without binding", async () => {
      const cause = new Error("disk full")
      const server = build({
        onStartup: vi.fn(async () => ({
          ok: false,
          failures: [{ hook: "check-disk", error: cause }],
          timedOut: false,
        })),
      })

      const err = await server.start().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StartupError)
      expect(err).toMatchObject({
        code: "startup_failed",
        message: "Startup hook failed",
        context: { hooks: ["check-disk"], timedOut: false },
        cause,
      })
      expect(steps.listen).not.toHaveBeenCalled()
    })

    it("says when startup ran out of time", async () => {
      const server = build({ onStartup: vi.fn(async () => ({ ...STARTED, ok: false, timedOut: true })) })

      await expect(server.start()).rejects.toThrow("Startup timed out")
    })

    it.each<[string, Partial<ServerCollaborators>]>([
      [
        "the start hooks reject",
        {
          onStartup: async () => {
            throw new Error("hooks")
          },
        },
      ],
      [
        "the port is taken",
        {
          listen: async () => {
            throw new Error("EADDRINUSE")
          },
        },
      ],
      [
        "the stopper throws",
        {
          createStopper: () => {
            throw new Error("stopper")
          },
        },
      ],
    ])("goes back to idle when %s", async (_label, overrides) => {
      const server = build(overrides)

      await expect(server.start()).rejects.toThrow()
      expect(server.getState()).toBe("idle")
    })
  })

  describe("process handlers", () => {
    function captureStop(server: Server): Pick<SignalHandlerContext, "stop"> {
      const captured: Pick<SignalHandlerContext, "stop"> = {}

      vi.mocked(steps.setupProcessHandlers).mockImplementation((ctx: SignalHandlerContext) => {
        captured.stop = ctx.stop
        return { unregister: vi.fn() }
      })
      server.setupProcessHandlers()

      return captured
    }

    it("installs once and chains", () => {
      const server = build()

      expect(server.setupProcessHandlers().setupProcessHandlers()).toBe(server)
      expect(steps.setupProcessHandlers).toHaveBeenCalledOnce()
      expect(steps.setupProcessHandlers).toHaveBeenCalledWith(
        expect.objectContaining({ logger, fatalTimeoutMs: options.shutdownTimeoutMs }),
      )
    })

    it("stops the running server on a signal", async () => {
      const stop = vi.fn(async () => STOPPED)
      steps.createStopper = vi.fn(() => fakeHandle(stop))
      const server = build()
      const captured = captureStop(server)

      await server.start()

      await expect(captured.stop?.()).resolves.toBe(STOPPED)
      expect(stop).toHaveBeenCalledOnce()
    })

    it("answers a signal before start with an empty result and a warning", async () => {
      const captured = captureStop(build())

      await expect(captured.stop?.()).resolves.toStrictEqual(STOPPED)
      expect(logger.warn).toHaveBeenCalledWith("Stop called but server not running")
    })

    it("removes the handlers once the server has stopped", async () => {
      const unregister = vi.fn()
      const stopper: { ctx?: RunningServerContext } = {}
      const server = build({
        setupProcessHandlers: vi.fn(() => ({ unregister })),
        createStopper: vi.fn((ctx: RunningServerContext) => {
          stopper.ctx = ctx
          return fakeHandle()
        }),
      })

      server.setupProcessHandlers()
      await server.start()
      stopper.ctx?.onStop()

      expect(unregister).toHaveBeenCalledOnce()
    })

    it("has nothing to remove when handlers were never installed", async () => {
      const stopper: { ctx?: RunningServerContext } = {}
      await build({
        createStopper: vi.fn((ctx: RunningServerContext) => {
          stopper.ctx = ctx
          return fakeHandle()
        }),
      }).start()

      expect(() => stopper.ctx?.onStop()).not.toThrow()
    })
  })
})
