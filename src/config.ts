import { z } from "zod"
import { ConfigurationError } from "./errors.js"

export type AgentLoopProvider = "gemini" | "openai" | "mock"

export type AgentLoopConfig = {
  provider: AgentLoopProvider
  model: string
  googleApiKey?: string
  openaiApiKey?: string
  openaiBaseUrl?: string
  temperature: number
  maxSteps: number
  timeoutMs: number
  maxToolOutputChars: number
  dbPath: string
  allowWrites: boolean
  verbose: boolean
  memory: boolean
  systemPromptFile?: string
}

const DEFAULT_MODELS: Record<AgentLoopProvider, string> = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
  mock: "mock",
}

const EnvSchema = z
  .object({
    AGENTLOOP_PROVIDER: z.enum(["gemini", "openai", "mock"]).optional(),
    AGENTLOOP_MODEL: z.string().optional(),
    GOOGLE_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().optional(),
    AGENTLOOP_TEMPERATURE: z.string().optional(),
    AGENTLOOP_MAX_STEPS: z.string().optional(),
    AGENTLOOP_TIMEOUT_MS: z.string().optional(),
    AGENTLOOP_MAX_TOOL_OUTPUT_CHARS: z.string().optional(),
    AGENTLOOP_DB_PATH: z.string().optional(),
    AGENTLOOP_ALLOW_WRITES: z.string().optional(),
    AGENTLOOP_VERBOSE: z.string().optional(),
    AGENTLOOP_MEMORY: z.string().optional(),
    AGENTLOOP_SYSTEM_PROMPT_FILE: z.string().optional(),
  })
  .passthrough()

// Largest delay Node's timers accept.
const MAX_TIMEOUT_MS = 2_147_483_647

const ConfigSchema = z.object({
  temperature: z.number().min(0).max(2),
  maxSteps: z.number().int().min(1),
  timeoutMs: z.number().int().min(0).max(MAX_TIMEOUT_MS),
  maxToolOutputChars: z.number().int().min(100),
  dbPath: z.string().trim().min(1, "database path must not be empty"),
})

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue
  const normalized = value.trim().toLowerCase()
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false
  return defaultValue
}

function parseNumber(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === "") return defaultValue
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`)
  }
  return parsed
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function loadConfig(
  overrides: Partial<AgentLoopConfig> = {},
  rawEnv: NodeJS.ProcessEnv = process.env,
): AgentLoopConfig {
  const parsedEnv = EnvSchema.safeParse(rawEnv)
  if (!parsedEnv.success) {
    const issue = parsedEnv.error.issues[0]
    throw new ConfigurationError(`Invalid ${issue?.path.join(".") ?? "environment"}: ${issue?.message ?? "unknown"}`)
  }
  const env = parsedEnv.data

  const provider = overrides.provider ?? env.AGENTLOOP_PROVIDER ?? "gemini"
  const model = overrides.model ?? emptyToUndefined(env.AGENTLOOP_MODEL) ?? DEFAULT_MODELS[provider]
  const googleApiKey = overrides.googleApiKey ?? emptyToUndefined(env.GOOGLE_API_KEY)
  const openaiApiKey = overrides.openaiApiKey ?? emptyToUndefined(env.OPENAI_API_KEY)
  const openaiBaseUrl = overrides.openaiBaseUrl ?? emptyToUndefined(env.OPENAI_BASE_URL)
  const temperature =
    overrides.temperature ?? parseNumber("AGENTLOOP_TEMPERATURE", env.AGENTLOOP_TEMPERATURE, 0)
  const maxSteps = overrides.maxSteps ?? parseNumber("AGENTLOOP_MAX_STEPS", env.AGENTLOOP_MAX_STEPS, 10)
  const timeoutMs = overrides.timeoutMs ?? parseNumber("AGENTLOOP_TIMEOUT_MS", env.AGENTLOOP_TIMEOUT_MS, 60_000)
  const maxToolOutputChars =
    overrides.maxToolOutputChars ??
    parseNumber("AGENTLOOP_MAX_TOOL_OUTPUT_CHARS", env.AGENTLOOP_MAX_TOOL_OUTPUT_CHARS, 12_000)
  const dbPath = overrides.dbPath ?? env.AGENTLOOP_DB_PATH ?? "sql_agent_class.db"
  const allowWrites = overrides.allowWrites ?? parseBool(env.AGENTLOOP_ALLOW_WRITES, /* default */ false)
  const verbose = overrides.verbose ?? parseBool(env.AGENTLOOP_VERBOSE, false)
  const memory = overrides.memory ?? parseBool(env.AGENTLOOP_MEMORY, true)
  const systemPromptFile = overrides.systemPromptFile ?? emptyToUndefined(env.AGENTLOOP_SYSTEM_PROMPT_FILE)

  const checked = ConfigSchema.safeParse({ temperature, maxSteps, timeoutMs, maxToolOutputChars, dbPath })
  if (!checked.success) {
    const issue = checked.error.issues[0]
    throw new ConfigurationError(`Invalid ${issue?.path.join(".") ?? "config"}: ${issue?.message ?? "unknown"}`)
  }

  return {
    provider,
    model,
    googleApiKey,
    openaiApiKey,
    openaiBaseUrl,
    ...checked.data,
    allowWrites,
    verbose,
    memory,
    systemPromptFile,
  }
}
