import { afterEach, describe, expect, it, vi } from "vitest"
import { SignalHandler } from "../signals"

describe("SignalHandler", () => {
  const handlers: SignalHandler[] = []

  function handler(onCleanupError?: (error: unknown) => void) {
    const exit = vi.fn((_code: number) => undefined)
    const signalHandler = new SignalHandler(onCleanupError, exit)
    handlers.push(signalHandler)
    return { signalHandler, exit }
  }

  afterEach(() => {
    for (const signalHandler of handlers.splice(0)) {
      signalHandler.removeHandlers()
    }
  })

  it("runs cleanup callbacks in order, then exits with 130", async () => {
    const { signalHandler, exit } = handler()
    const calls: string[] = []
    signalHandler.onCleanup(async () => {
      calls.push("stop recorder")
    })
    signalHandler.onCleanup(() => {
      calls.push("remove chunk")
    })

    await signalHandler.handle("SIGINT")

    expect(calls).toEqual(["stop recorder", "remove chunk"])
    expect(signalHandler.shuttingDown).toBe(true)
    expect(exit).toHaveBeenCalledWith(130)
  })

  it("reports failing callbacks and keeps cleaning up", async () => {
    const onCleanupError = vi.fn()
    const { signalHandler, exit } = handler(onCleanupError)
    const failure = new Error("recorder already gone")
    const after = vi.fn()
    signalHandler.onCleanup(() => {
      throw failure
    })
    signalHandler.onCleanup(after)

    await signalHandler.handle("SIGTERM")

    expect(onCleanupError).toHaveBeenCalledWith(failure)
    expect(after).toHaveBeenCalledTimes(1)
    expect(exit).toHaveBeenCalledWith(130)
  })

  it("exits at once on a second signal", async () => {
    const { signalHandler, exit } = handler()
    const cleanup = vi.fn()
    signalHandler.onCleanup(cleanup)

    await signalHandler.handle("SIGINT")
    await signalHandler.handle("SIGINT")

    expect(cleanup).toHaveBeenCalledTimes(1)
    expect(exit).toHaveBeenCalledTimes(2)
  })

  it("listens for SIGINT and SIGTERM until removed", () => {
    const before = process.listenerCount("SIGINT")
    const { signalHandler } = handler()

    expect(process.listenerCount("SIGINT")).toBe(before + 1)
    expect(process.listenerCount("SIGTERM")).toBeGreaterThan(0)

    signalHandler.removeHandlers()

    expect(process.listenerCount("SIGINT")).toBe(before)
  })
})
