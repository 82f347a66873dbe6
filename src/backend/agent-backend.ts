import { runAgentTask } from "../agent/run-task.js"
import type { AgentEvent, ChatMessage } from "../agent/types.js"
import {
  BackendClosedError,
  CancelledError,
  TransportError,
  UpstreamError,
  ValidationError,
  describeError,
} from "../errors.js"
import type { ModelProvider } from "../llm/types.js"
import type { ToolDefinition } from "../tools/types.js"
import type { Backend, BackendResult, HandleOptions } from "./types.js"

export type AgentBackendOptions = {
  name: string
  provider: ModelProvider
  model: string
  temperature: number
  systemPrompt: string
  tools?: readonly ToolDefinition[]
  maxSteps: number
  /** 0 disables the per-request timeout. */
  timeoutMs: number
  maxToolOutputChars: number
  onEvent?: (event: AgentEvent) => void
  /** Releases resources owned by the tools, e.g. a database handle. */
  onClose?: () => void | Promise<void>
}

const UPSTREAM_HINTS = {
  auth: "check the API key",
  rate_limit: "rate limited, wait and try again",
  server: "provider error",
  malformed: "unexpected response",
} as const

export function toFailure(e: unknown, signal?: AbortSignal): BackendResult {
  if (e instanceof ValidationError) return { status: "failure", kind: "validation", output: e.message }
  if (e instanceof TransportError) return { status: "failure", kind: "transport", output: e.message }
  if (e instanceof UpstreamError) {
    return { status: "failure", kind: "upstream", output: `${e.message} (${UPSTREAM_HINTS[e.reason]})` }
  }
  if (e instanceof CancelledError || signal?.aborted) {
    return { status: "failure", kind: "cancelled", output: describeError(e) }
  }
  return { status: "failure", kind: "internal", output: describeError(e) }
}

function combineSignals(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal | undefined {
  const signals: AbortSignal[] = []
  if (signal) signals.push(signal)
  if (timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs))
  if (signals.length <= 1) return signals[0]
  return AbortSignal.any(signals)
}

export class AgentBackend implements Backend {
  public readonly name: string
  public readonly tools: readonly ToolDefinition[]
  private closed = false

  public constructor(private readonly options: AgentBackendOptions) {
    this.name = options.name
    this.tools = options.tools ?? []
  }

  public get model(): string {
    return this.options.model
  }

  public get providerName(): string {
    return this.options.provider.name
  }

  public async handle(request: string, options: HandleOptions = {}): Promise<BackendResult> {
    if (this.closed) throw new BackendClosedError()
    if (options.signal?.aborted) return toFailure(new CancelledError(), options.signal)

    const history: ChatMessage[] = options.conversation?.messages ?? []

    try {
      const signal = combineSignals(options.signal, this.options.timeoutMs)
      const result = await runAgentTask({
        provider: this.options.provider,
        model: this.options.model,
        temperature: this.options.temperature,
        messages: [{ role: "system", content: this.options.systemPrompt }, ...history],
        userInput: request,
        tools: this.tools,
        toolContext: { maxToolOutputChars: this.options.maxToolOutputChars, signal },
        maxSteps: this.options.maxSteps,
        onEvent: this.options.onEvent,
      })

      if (!result.completed) {
        return { status: "failure", kind: "step_limit", output: result.finalText }
      }
      if (options.conversation) {
        options.conversation.messages = result.messages.slice(1)
      }
      return { status: "success", output: result.finalText }
    } catch (e) {
      return toFailure(e, options.signal)
    }
  }

  public async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.options.onClose?.()
  }
}
