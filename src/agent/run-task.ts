import { ValidationError } from "../errors.js"
import type { ModelProvider } from "../llm/types.js"
import { invokeTool } from "../tools/types.js"
import type { ToolContext, ToolDefinition } from "../tools/types.js"
import type { AgentEvent, ChatMessage } from "./types.js"

export type AgentTaskResult = {
  finalText: string
  messages: ChatMessage[]
  completed: boolean
}

/**
 * Runs one request through the model, executing tool calls until the model answers in plain
 * text. Tool failures are reported back to the model; malformed arguments abort the task.
 */
export async function runAgentTask(params: {
  provider: ModelProvider
  model: string
  temperature: number
  messages: ChatMessage[]
  userInput: string
  tools: readonly ToolDefinition[]
  toolContext: ToolContext
  maxSteps: number
  onEvent?: (event: AgentEvent) => void
}): Promise<AgentTaskResult> {
  const messages: ChatMessage[] = [...params.messages, { role: "user", content: params.userInput }]

  const toolByName = new Map<string, ToolDefinition>(params.tools.map((t) => [t.name, t]))

  for (let step = 0; step < params.maxSteps; step += 1) {
    const response = await params.provider.complete({
      model: params.model,
      messages,
      tools: params.tools,
      temperature: params.temperature,
      signal: params.toolContext.signal,
    })

    if (response.toolCalls.length > 0) {
      messages.push({ role: "assistant", content: response.assistantText ?? undefined, toolCalls: response.toolCalls })

      for (const call of response.toolCalls) {
        const tool = toolByName.get(call.name)
        if (!tool) {
          const err = `Unknown tool: ${call.name}`
          params.onEvent?.({ type: "error", message: err })
          messages.push({ role: "tool", toolCallId: call.id, name: call.name, content: err })
          continue
        }

        params.onEvent?.({ type: "tool_call", toolName: call.name, argsJson: call.argsJson })

        const outcome = await invokeTool(tool, call.argsJson, params.toolContext)
        if (outcome.ok) {
          params.onEvent?.({ type: "tool_result", toolName: call.name, result: outcome.output })
          messages.push({ role: "tool", toolCallId: call.id, name: call.name, content: outcome.output })
          continue
        }

        params.onEvent?.({ type: "error", message: outcome.error.message })
        if (outcome.error instanceof ValidationError) throw outcome.error

        const err = `Tool ${call.name} failed: ${outcome.error.message}`
        messages.push({ role: "tool", toolCallId: call.id, name: call.name, content: err })
      }

      continue
    }

    const assistantText = (response.assistantText ?? "").trim()
    messages.push({ role: "assistant", content: assistantText })
    params.onEvent?.({ type: "assistant_message", content: assistantText })
    return { finalText: assistantText, messages, completed: true }
  }

  const errText = `Stopped after maxSteps=${params.maxSteps}.`
  params.onEvent?.({ type: "error", message: errText })
  return { finalText: errText, messages, completed: false }
}
