import { ulid } from "ulid"
import { z } from "zod"
import type { ChatMessage, ToolCall } from "../agent/types.js"
import { UpstreamError } from "../errors.js"
import type { ToolDefinition } from "../tools/types.js"
import { postJson } from "./http.js"
import type { ModelCompleteRequest, ModelProvider, ModelResponse } from "./types.js"

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: Record<string, unknown> } }

type GeminiContent = { role: "user" | "model"; parts: GeminiPart[] }

type GeminiFunctionDeclaration = {
  name: string
  description: string
  parameters?: unknown
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({ name: z.string(), args: z.record(z.unknown()).optional() })
                    .optional(),
                }),
              )
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .min(1),
})

// Keys the function-declaration schema subset does not accept.
const UNSUPPORTED_SCHEMA_KEYS = new Set(["additionalProperties", "default"])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function toGeminiSchema(schema: unknown): unknown {
  if (Array.isArray(schema)) return schema.map(toGeminiSchema)
  if (!isRecord(schema)) return schema
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(schema)) {
    if (UNSUPPORTED_SCHEMA_KEYS.has(key)) continue
    out[key] = toGeminiSchema(value)
  }
  return out
}

function toFunctionDeclarations(tools: readonly ToolDefinition[]): GeminiFunctionDeclaration[] {
  return tools.map((t) => {
    const parameters = toGeminiSchema(t.parametersJsonSchema)
    // A declaration without arguments must leave parameters out entirely.
    const hasProperties =
      isRecord(parameters) && isRecord(parameters.properties) && Object.keys(parameters.properties).length > 0
    const declaration: GeminiFunctionDeclaration = { name: t.name, description: t.description }
    if (hasProperties) declaration.parameters = parameters
    return declaration
  })
}

function parseArgs(argsJson: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(argsJson || "{}")
    return isRecord(parsed) ? parsed : {}
  } catch {
    return {}
  }
}

export function toGeminiRequest(messages: ChatMessage[]): {
  systemInstruction?: { parts: Array<{ text: string }> }
  contents: GeminiContent[]
} {
  const system: string[] = []
  const contents: GeminiContent[] = []

  for (const m of messages) {
    if (m.role === "system") {
      system.push(m.content)
      continue
    }
    if (m.role === "user") {
      contents.push({ role: "user", parts: [{ text: m.content }] })
      continue
    }
    if (m.role === "assistant") {
      const parts: GeminiPart[] = []
      if (m.content) parts.push({ text: m.content })
      for (const tc of m.toolCalls ?? []) {
        parts.push({ functionCall: { name: tc.name, args: parseArgs(tc.argsJson) } })
      }
      // An empty answer still takes its turn, so user turns never follow each other.
      if (parts.length === 0) parts.push({ text: "" })
      contents.push({ role: "model", parts })
      continue
    }

    // Results for one batch of calls travel together in a single turn.
    const part: GeminiPart = { functionResponse: { name: m.name, response: { content: m.content } } }
    const last = contents[contents.length - 1]
    if (last && last.role === "user" && last.parts.every((p) => "functionResponse" in p)) {
      last.parts.push(part)
    } else {
      contents.push({ role: "user", parts: [part] })
    }
  }

  return system.length > 0
    ? { systemInstruction: { parts: [{ text: system.join("\n\n") }] }, contents }
    : { contents }
}

export class GeminiProvider implements ModelProvider {
  public readonly name = "gemini"

  public constructor(
    private readonly apiKey: string,
    private readonly baseUrl = "https://generativelanguage.googleapis.com/v1beta",
  ) {}

  public async complete(request: ModelCompleteRequest): Promise<ModelResponse> {
    const toolFields =
      request.tools.length > 0 ? { tools: [{ functionDeclarations: toFunctionDeclarations(request.tools) }] } : {}
    const body = {
      ...toGeminiRequest(request.messages),
      ...toolFields,
      generationConfig: { temperature: request.temperature },
    }

    const url = `${this.baseUrl.replace(/\/+$/, "")}/models/${encodeURIComponent(request.model)}:generateContent`
    const data = await postJson(url, {
      label: "Gemini",
      headers: { "x-goog-api-key": this.apiKey },
      body,
      signal: request.signal,
    })

    const parsed = GeminiResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new UpstreamError("Gemini response has no candidates", "malformed")
    }

    const candidate = parsed.data.candidates[0]
    const parts = candidate?.content?.parts
    if (!parts) {
      throw new UpstreamError(
        `Gemini returned no content (finishReason: ${candidate?.finishReason ?? "unknown"})`,
        "malformed",
      )
    }

    const texts: string[] = []
    const toolCalls: ToolCall[] = []
    for (const part of parts) {
      if (part.functionCall) {
        toolCalls.push({
          id: ulid(),
          name: part.functionCall.name,
          argsJson: JSON.stringify(part.functionCall.args ?? {}),
        })
      } else if (part.text !== undefined) {
        texts.push(part.text)
      }
    }

    return { assistantText: texts.length > 0 ? texts.join("") : null, toolCalls }
  }
}
