import fs from "node:fs/promises"
import { ConfigurationError, describeError } from "../errors.js"
import type { ToolDefinition } from "../tools/types.js"

export type AgentVariant = "chat" | "sql"

const DEFAULT_INSTRUCTIONS: Record<AgentVariant, string> = {
  chat: `
You are a helpful AI assistant specializing in explaining technology concepts.
You provide clear, concise explanations and are always friendly and professional.
`,
  sql: `
You are an agent designed to interact with a SQLite database.
Given an input question, create a syntactically correct SQLite query to run, then look at the results of the query and return the answer.
Unless the user specifies a specific number of examples they wish to obtain, always limit your query to at most 10 results.
You can order the results by a relevant column to return the most interesting examples in the database.
Never query for all the columns from a specific table, only ask for the relevant columns given the question.
If you get an error while executing a query, rewrite the query and try again.
If the question does not seem related to the database, just answer it directly.
`,
}

export async function loadInstructions(filePath: string): Promise<string> {
  let content: string
  try {
    content = await fs.readFile(filePath, "utf8")
  } catch (e) {
    throw new ConfigurationError(`Cannot read system prompt file ${filePath}: ${describeError(e)}`)
  }
  const trimmed = content.trim()
  if (!trimmed) throw new ConfigurationError(`System prompt file is empty: ${filePath}`)
  return trimmed
}

function toolRules(tools: readonly ToolDefinition[]): string {
  const lines = tools.map((t) => `- ${t.name}: ${t.description}`)
  return `
### Tools
${lines.join("\n")}

- Tool arguments must be strict JSON matching the tool's parameters.
- Tool results may be truncated; narrow the request when they are.
- Do not make up tool results.
`.trim()
}

export async function buildSystemPrompt(params: {
  variant: AgentVariant
  tools: readonly ToolDefinition[]
  instructionsFile?: string
}): Promise<string> {
  const instructions = params.instructionsFile
    ? await loadInstructions(params.instructionsFile)
    : DEFAULT_INSTRUCTIONS[params.variant].trim()

  const rules = params.tools.length > 0 ? toolRules(params.tools) : ""
  return [instructions, rules].filter(Boolean).join("\n\n")
}
