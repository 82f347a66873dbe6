import { z } from "zod"
import { ValidationError } from "../errors.js"
import type { PolicyError } from "../errors.js"
import { safeJsonStringify, truncate } from "../util/text.js"

export type ToolRisk = "safe" | "dangerous"

export type ToolContext = {
  maxToolOutputChars: number
  signal?: AbortSignal
}

export type ToolDefinition<InputSchema extends z.ZodTypeAny = z.ZodTypeAny> = {
  name: string
  description: string
  risk: ToolRisk
  parametersJsonSchema: Record<string, unknown>
  inputSchema: InputSchema
  handler: (input: z.output<InputSchema>, ctx: ToolContext) => Promise<unknown>
}

export type ToolOutcome =
  | { ok: true; output: string }
  | { ok: false; error: ValidationError | PolicyError | Error }

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "input"}: ${i.message}`).join("; ")
}

/**
 * Parses the model-supplied JSON arguments, validates them against the tool's schema and runs
 * the handler. Never throws: bad arguments come back as a ValidationError outcome.
 */
export async function invokeTool(tool: ToolDefinition, argsJson: string, ctx: ToolContext): Promise<ToolOutcome> {
  let parsedArgs: unknown
  try {
    parsedArgs = JSON.parse(argsJson || "{}")
  } catch (e) {
    return { ok: false, error: new ValidationError(`Invalid JSON arguments for tool ${tool.name}: ${String(e)}`, tool.name) }
  }

  const input = tool.inputSchema.safeParse(parsedArgs)
  if (!input.success) {
    return { ok: false, error: new ValidationError(`Invalid arguments for tool ${tool.name}: ${formatIssues(input.error)}`, tool.name) }
  }

  try {
    const result: unknown = await tool.handler(input.data, ctx)
    const text = typeof result === "string" ? result : safeJsonStringify(result)
    return { ok: true, output: truncate(text, ctx.maxToolOutputChars) }
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e : new Error(String(e)) }
  }
}

/** Wraps a list of tools, rejecting duplicate names. An empty list is a valid toolset. */
export function createToolset(tools: readonly ToolDefinition[]): readonly ToolDefinition[] {
  const seen = new Set<string>()
  for (const tool of tools) {
    if (seen.has(tool.name)) throw new Error(`Duplicate tool name: ${tool.name}`)
    seen.add(tool.name)
  }
  return Object.freeze([...tools])
}
