import { FakeClock } from "@respkv/clock"
import type { Logger } from "@respkv/logger"
import { ExpiringStore } from "@respkv/store"
import { mock } from "vitest-mock-extended"
import { resolveOptions, type ServerDependencies } from "../../server/server-options"
import { createStopper, type RunningServerContext } from "../create-stopper"
import type { LifecycleHook } from "../lifecycle-hook"
import type { Listener } from "../listen"
import type { ShutdownFn, StopResult } from "../shutdown"

function createDeps(clock = new FakeClock(0)): ServerDependencies {
  const logger = mock<Logger>()

  return { logger, clock, store: new ExpiringStore({ clock, logger }, { reaper: false }) }
}

describe("createStopper", () => {
  const okResult: StopResult = { ok: true, failures: [], timedOut: false }

  let deps: ServerDependencies
  let listener: Listener
  let stopHooks: LifecycleHook[]
  let onStop: () => void
  let shutdownFn: ReturnType<typeof vi.fn<ShutdownFn>>

  beforeEach(() => {
    deps = createDeps()
    listener = { address: { host: "127.0.0.1", port: 40123 }, close: vi.fn() }
    stopHooks = [{ name: "hook.a", fn: vi.fn(async () => {}) }]
    onStop = vi.fn()
    shutdownFn = vi.fn<ShutdownFn>()
  })

  function ctx(overrides: Partial<RunningServerContext> = {}): RunningServerContext {
    return {
      listener,
      deps,
      options: resolveOptions({ shutdownTimeoutMs: 1234 }),
      stopHooks,
      onStop,
      shutdown: shutdownFn,
      ...overrides,
    }
  }

  it("reports the bound listener address", () => {
    expect(createStopper(ctx()).address).toStrictEqual({ host: "127.0.0.1", port: 40123 })
  })

  describe("stop()", () => {
    it("passes the listener, store and hooks to shutdown", async () => {
      shutdownFn.mockResolvedValue(okResult)

      await createStopper(ctx()).stop()

      expect(shutdownFn).toHaveBeenCalledExactlyOnceWith({
        listener,
        store: deps.store,
        deps,
        stopHooks,
        deadlineMs: 1234,
      })
    })

    it("derives the shutdown deadline from the clock and configured timeout", async () => {
      deps = createDeps(new FakeClock(1_000))
      shutdownFn.mockResolvedValue(okResult)

      await createStopper(ctx({ options: resolveOptions({ shutdownTimeoutMs: 500 }) })).stop()

      expect(shutdownFn).toHaveBeenCalledWith(expect.objectContaining({ deadlineMs: 1_500 }))
    })

    it("calls onStop after shutdown", async () => {
      const order: string[] = []

      shutdownFn.mockImplementation(async () => {
        order.push("shutdown")
        return okResult
      })

      await createStopper(ctx({ onStop: () => void order.push("onStop") })).stop()

      expect(order).toStrictEqual(["shutdown", "onStop"])
    })

    it("calls onStop even when shutdown rejects", async () => {
      shutdownFn.mockRejectedValue(new Error("exploded"))

      await expect(createStopper(ctx()).stop()).rejects.toThrow("exploded")
      expect(onStop).toHaveBeenCalledOnce()
    })
  })

  describe("idempotency", () => {
    it("concurrent stop calls share the same in-flight shutdown", async () => {
      const gate: { release?: (result: StopResult) => void } = {}

      shutdownFn.mockReturnValue(
        new Promise<StopResult>((resolve) => {
          gate.release = resolve
        }),
      )

      const running = createStopper(ctx())
      const a = running.stop()
      const b = running.stop()

      expect(shutdownFn).toHaveBeenCalledOnce()

      gate.release?.(okResult)

      const [ra, rb] = await Promise.all([a, b])

      expect(ra).toBe(okResult)
      expect(rb).toBe(okResult)
    })

    it("does not re-run shutdown on later calls", async () => {
      shutdownFn.mockResolvedValue(okResult)

      const running = createStopper(ctx())
      await running.stop()
      await running.stop()

      expect(shutdownFn).toHaveBeenCalledOnce()
      expect(onStop).toHaveBeenCalledOnce()
    })
  })

  describe("shutdown outcomes", () => {
    it("returns the shutdown outcome produced by the shutdown routine", async () => {
      const outcome: StopResult = {
        ok: false,
        failures: [{ hook: "x", error: new Error("boom") }],
        timedOut: false,
      }

      shutdownFn.mockResolvedValue(outcome)

      await expect(createStopper(ctx()).stop()).resolves.toStrictEqual(outcome)
    })

    it("propagates cleanup failures", async () => {
      shutdownFn.mockResolvedValue(okResult)

      const running = createStopper(
        ctx({
          onStop: () => {
            throw new Error("cleanup failed")
          },
        }),
      )

      await expect(running.stop()).rejects.toThrow("cleanup failed")
      expect(shutdownFn).toHaveBeenCalledOnce()
    })
  })
})
