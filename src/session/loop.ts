import type { Backend, Conversation } from "../backend/types.js"
import { describeError } from "../errors.js"

export type LoopState = "idle" | "dispatching" | "terminated"

export type LoopExitReason = "exit_command" | "end_of_input" | "interrupted" | "fatal"

export type LoopExit = {
  reason: LoopExitReason
  /** Requests handed to the backend. */
  turns: number
}

const EXIT_COMMANDS = new Set(["quit", "exit", "q"])

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.has(line.trim().toLowerCase())
}

export async function runDelegationLoop(params: {
  backend: Backend
  lines: AsyncIterable<string>
  write: (text: string) => void
  prompt?: () => void
  /** Aborted by an operator interrupt: cancels the in-flight request and ends the session. */
  signal?: AbortSignal
  /** Keep history between requests. */
  memory?: boolean
  onStateChange?: (state: LoopState) => void
}): Promise<LoopExit> {
  const conversation: Conversation | undefined = params.memory ? { messages: [] } : undefined
  let turns = 0

  const enter = (state: LoopState) => {
    params.onStateChange?.(state)
    if (state === "idle") params.prompt?.()
  }
  const terminate = (reason: LoopExitReason): LoopExit => {
    enter("terminated")
    return { reason, turns }
  }

  enter("idle")
  for await (const line of params.lines) {
    if (params.signal?.aborted) return terminate("interrupted")

    const request = line.trim()
    if (!request) {
      enter("idle")
      continue
    }
    if (isExitCommand(request)) {
      params.write("bye\n")
      return terminate("exit_command")
    }

    enter("dispatching")
    turns += 1
    try {
      const result = await params.backend.handle(request, { conversation, signal: params.signal })
      if (result.status === "success") params.write(`${result.output}\n`)
      else params.write(`(error) ${result.kind}: ${result.output}\n`)
    } catch (e) {
      params.write(`(fatal) ${describeError(e)}\n`)
      return terminate("fatal")
    }

    if (params.signal?.aborted) return terminate("interrupted")
    enter("idle")
  }

  return terminate(params.signal?.aborted ? "interrupted" : "end_of_input")
}
