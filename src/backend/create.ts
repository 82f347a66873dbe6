import { formatAgentEvent } from "../agent/events.js"
import { buildSystemPrompt } from "../agent/prompt.js"
import type { AgentVariant } from "../agent/prompt.js"
import type { AgentLoopConfig } from "../config.js"
import { openDatabase } from "../db/sqlite.js"
import { ConfigurationError } from "../errors.js"
import { GeminiProvider } from "../llm/gemini.js"
import { MockProvider } from "../llm/mock.js"
import { OpenAiProvider } from "../llm/openai.js"
import type { ModelProvider } from "../llm/types.js"
import { createSqlTools, createToolset } from "../tools/index.js"
import type { ToolDefinition } from "../tools/index.js"
import { AgentBackend } from "./agent-backend.js"

export function createProvider(config: AgentLoopConfig): ModelProvider {
  if (config.provider === "mock") return new MockProvider()
  if (config.provider === "openai") {
    if (!config.openaiApiKey) {
      throw new ConfigurationError("Missing OPENAI_API_KEY. Set it in .env or environment variables.")
    }
    return new OpenAiProvider(config.openaiApiKey, config.openaiBaseUrl)
  }
  if (!config.googleApiKey) {
    throw new ConfigurationError("Missing GOOGLE_API_KEY. Set it in .env or environment variables.")
  }
  return new GeminiProvider(config.googleApiKey)
}

/**
 * Builds the backend for a variant once at startup. Throws ConfigurationError for missing
 * credentials or an unusable database path, before anything is shown to the operator.
 */
export async function createBackend(
  config: AgentLoopConfig,
  variant: AgentVariant,
  options: { write?: (text: string) => void; provider?: ModelProvider } = {},
): Promise<AgentBackend> {
  const provider = options.provider ?? createProvider(config)

  let tools: readonly ToolDefinition[] = []
  let onClose: (() => void) | undefined
  if (variant === "sql") {
    const db = openDatabase(config.dbPath)
    tools = createToolset(
      createSqlTools({
        db,
        allowWrites: config.allowWrites,
        checker: { provider, model: config.model, temperature: config.temperature },
      }),
    )
    onClose = () => db.close()
  }

  let systemPrompt: string
  try {
    systemPrompt = await buildSystemPrompt({ variant, tools, instructionsFile: config.systemPromptFile })
  } catch (e) {
    onClose?.()
    throw e
  }

  const write = options.write
  return new AgentBackend({
    name: variant,
    provider,
    model: config.model,
    temperature: config.temperature,
    systemPrompt,
    tools,
    maxSteps: config.maxSteps,
    timeoutMs: config.timeoutMs,
    maxToolOutputChars: config.maxToolOutputChars,
    onEvent:
      config.verbose && write
        ? (event) => {
            const line = formatAgentEvent(event)
            if (line) write(`${line}\n`)
          }
        : undefined,
    onClose,
  })
}
