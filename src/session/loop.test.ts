import { describe, expect, it, vi } from "vitest"
import type { Backend, BackendResult, HandleOptions } from "../backend/types.js"
import { isExitCommand, runDelegationLoop } from "./loop.js"
import type { LoopState } from "./loop.js"

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line
}

function makeBackend(impl: (request: string, options?: HandleOptions) => Promise<BackendResult>) {
  const handle = vi.fn(impl)
  const backend: Backend = {
    name: "test",
    tools: [],
    handle,
    close: async () => {},
  }
  return { backend, handle }
}

const ok = (output: string) => async (): Promise<BackendResult> => ({ status: "success", output })

function collector() {
  const chunks: string[] = []
  return { write: (text: string) => chunks.push(text), text: () => chunks.join("") }
}

describe("isExitCommand", () => {
  it.each(["quit", "exit", "q", "QUIT", "Exit", "Q", "  q  "])("treats %j as an exit command", (line) => {
    expect(isExitCommand(line)).toBe(true)
  })

  it.each(["quitting", "exit now", "", "qq"])("does not treat %j as an exit command", (line) => {
    expect(isExitCommand(line)).toBe(false)
  })
})

describe("runDelegationLoop", () => {
  it("prints the backend output and returns to idle", async () => {
    const { backend, handle } = makeBackend(ok("Hi there!"))
    const out = collector()
    const states: LoopState[] = []

    const exit = await runDelegationLoop({
      backend,
      lines: linesOf("hello"),
      write: out.write,
      onStateChange: (s) => states.push(s),
    })

    expect(handle).toHaveBeenCalledTimes(1)
    expect(handle.mock.calls[0]?.[0]).toBe("hello")
    expect(out.text()).toBe("Hi there!\n")
    expect(states).toEqual(["idle", "dispatching", "idle", "terminated"])
    expect(exit).toEqual({ reason: "end_of_input", turns: 1 })
  })

  it("calls the backend once per non-empty input and trims it", async () => {
    const { backend, handle } = makeBackend(ok("ok"))
    const out = collector()

    const exit = await runDelegationLoop({ backend, lines: linesOf("  first  ", "second"), write: out.write })

    expect(handle.mock.calls.map((c) => c[0])).toEqual(["first", "second"])
    expect(exit.turns).toBe(2)
  })

  it("re-prompts on empty and whitespace-only input without contacting the backend", async () => {
    const { backend, handle } = makeBackend(ok("unused"))
    const out = collector()
    const prompt = vi.fn()

    const exit = await runDelegationLoop({ backend, lines: linesOf("", "   ", "\t"), write: out.write, prompt })

    expect(handle).not.toHaveBeenCalled()
    expect(prompt).toHaveBeenCalledTimes(4)
    expect(out.text()).toBe("")
    expect(exit).toEqual({ reason: "end_of_input", turns: 0 })
  })

  it.each(["quit", "EXIT", "Q"])("terminates on %j without calling the backend", async (command) => {
    const { backend, handle } = makeBackend(ok("unused"))
    const out = collector()

    const exit = await runDelegationLoop({ backend, lines: linesOf(command, "never read"), write: out.write })

    expect(handle).not.toHaveBeenCalled()
    expect(out.text()).toBe("bye\n")
    expect(exit).toEqual({ reason: "exit_command", turns: 0 })
  })

  it("prints a failed result and keeps the session going", async () => {
    const results: BackendResult[] = [
      { status: "failure", kind: "transport", output: "Gemini request failed: socket hang up" },
      { status: "success", output: "Recovered" },
    ]
    const { backend, handle } = makeBackend(async () => results.shift() ?? { status: "success", output: "" })
    const out = collector()

    const exit = await runDelegationLoop({ backend, lines: linesOf("one", "two"), write: out.write })

    expect(handle).toHaveBeenCalledTimes(2)
    expect(out.text()).toBe("(error) transport: Gemini request failed: socket hang up\nRecovered\n")
    expect(exit).toEqual({ reason: "end_of_input", turns: 2 })
  })

  it("terminates as fatal when the backend itself rejects", async () => {
    const { backend } = makeBackend(async () => {
      throw new Error("Backend has been closed")
    })
    const out = collector()
    const states: LoopState[] = []

    const exit = await runDelegationLoop({
      backend,
      lines: linesOf("hello", "again"),
      write: out.write,
      onStateChange: (s) => states.push(s),
    })

    expect(out.text()).toBe("(fatal) Backend has been closed\n")
    expect(states).toEqual(["idle", "dispatching", "terminated"])
    expect(exit).toEqual({ reason: "fatal", turns: 1 })
  })

  it("ends the session when interrupted during a request", async () => {
    const controller = new AbortController()
    const { backend, handle } = makeBackend(async (_request, options) => {
      controller.abort()
      expect(options?.signal?.aborted).toBe(true)
      return { status: "failure", kind: "cancelled", output: "Request cancelled" }
    })
    const out = collector()

    const exit = await runDelegationLoop({
      backend,
      lines: linesOf("slow question", "next"),
      write: out.write,
      signal: controller.signal,
    })

    expect(handle).toHaveBeenCalledTimes(1)
    expect(out.text()).toBe("(error) cancelled: Request cancelled\n")
    expect(exit).toEqual({ reason: "interrupted", turns: 1 })
  })

  it("passes one conversation across turns when memory is on", async () => {
    const { backend, handle } = makeBackend(ok("ok"))

    await runDelegationLoop({ backend, lines: linesOf("a", "b"), write: () => {}, memory: true })

    const first = handle.mock.calls[0]?.[1]?.conversation
    const second = handle.mock.calls[1]?.[1]?.conversation
    expect(first).toBeDefined()
    expect(second).toBe(first)
  })

  it("passes no conversation when memory is off", async () => {
    const { backend, handle } = makeBackend(ok("ok"))

    await runDelegationLoop({ backend, lines: linesOf("a"), write: () => {} })

    expect(handle.mock.calls[0]?.[1]?.conversation).toBeUndefined()
  })
})
