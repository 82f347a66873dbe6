import { z } from "zod"
import type { ChatMessage, ToolCall } from "../agent/types.js"
import { UpstreamError } from "../errors.js"
import type { ToolDefinition } from "../tools/types.js"
import { postJson } from "./http.js"
import type { ModelCompleteRequest, ModelProvider, ModelResponse } from "./types.js"

type OpenAiTool = {
  type: "function"
  function: {
    name: string
    description?: string
    parameters?: Record<string, unknown>
  }
}

type OpenAiMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant"
      content: string | null
      tool_calls?: Array<{
        id: string
        type: "function"
        function: { name: string; arguments: string }
      }>
    }
  | { role: "tool"; tool_call_id: string; content: string }

const OpenAiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
})

function toOpenAiTools(tools: readonly ToolDefinition[]): OpenAiTool[] {
  return tools.map((t) => ({
    type: "function",
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parametersJsonSchema,
    },
  }))
}

function toOpenAiMessages(messages: ChatMessage[]): OpenAiMessage[] {
  return messages.map((m) => {
    if (m.role === "system") return { role: "system", content: m.content }
    if (m.role === "user") return { role: "user", content: m.content }
    if (m.role === "tool") return { role: "tool", tool_call_id: m.toolCallId, content: m.content }
    return {
      role: "assistant",
      content: m.content ?? null,
      tool_calls: m.toolCalls?.map((tc) => ({
        id: tc.id,
        type: "function",
        function: { name: tc.name, arguments: tc.argsJson },
      })),
    }
  })
}

export class OpenAiProvider implements ModelProvider {
  public readonly name = "openai"

  public constructor(private readonly apiKey: string, private readonly baseUrl = "https://api.openai.com/v1") {}

  public async complete(request: ModelCompleteRequest): Promise<ModelResponse> {
    // An empty tools array is rejected upstream, so a tool-less agent sends neither field.
    const toolFields =
      request.tools.length > 0 ? { tools: toOpenAiTools(request.tools), tool_choice: "auto" } : {}
    const body = {
      model: request.model,
      messages: toOpenAiMessages(request.messages),
      temperature: request.temperature,
      ...toolFields,
    }

    const data = await postJson(`${this.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      label: "OpenAI",
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body,
      signal: request.signal,
    })

    const parsed = OpenAiResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new UpstreamError("OpenAI response is missing choices[0].message", "malformed")
    }

    const message = parsed.data.choices[0]?.message
    const assistantText = message?.content ?? null
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      argsJson: tc.function.arguments,
    }))

    return { assistantText, toolCalls }
  }
}
