import { Command } from "commander"
import process from "node:process"
import { createInterface } from "node:readline"
import { z } from "zod"
import type { AgentVariant } from "./agent/prompt.js"
import type { AgentBackend } from "./backend/agent-backend.js"
import { createBackend } from "./backend/create.js"
import { loadConfig } from "./config.js"
import type { AgentLoopConfig } from "./config.js"
import { ConfigurationError } from "./errors.js"
import { runDelegationLoop } from "./session/loop.js"

export type AppIo = {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  env: NodeJS.ProcessEnv
  terminal: boolean
  /** Listen for process-level SIGINT in addition to the terminal's Ctrl-C. */
  handleSignals: boolean
  setExitCode: (code: number) => void
}

export function defaultIo(): AppIo {
  return {
    input: process.stdin,
    output: process.stdout,
    env: process.env,
    terminal: Boolean(process.stdout.isTTY),
    handleSignals: true,
    setExitCode: (code) => {
      process.exitCode = code
    },
  }
}

const CommonOptions = z.object({
  provider: z.enum(["gemini", "openai", "mock"]).optional(),
  model: z.string().optional(),
  temperature: z.coerce.number().optional(),
  maxSteps: z.coerce.number().int().optional(),
  timeoutMs: z.coerce.number().int().optional(),
  systemFile: z.string().optional(),
  verbose: z.boolean().optional(),
  memory: z.boolean().optional(),
  db: z.string().optional(),
  allowWrites: z.boolean().optional(),
  sql: z.boolean().optional(),
})

type CommonOptions = z.infer<typeof CommonOptions>

function parseOptions(raw: unknown): CommonOptions {
  const parsed = CommonOptions.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(`Invalid option --${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`)
  }
  return parsed.data
}

function toOverrides(opts: CommonOptions): Partial<AgentLoopConfig> {
  return {
    provider: opts.provider,
    model: opts.model,
    temperature: opts.temperature,
    maxSteps: opts.maxSteps,
    timeoutMs: opts.timeoutMs,
    systemPromptFile: opts.systemFile,
    verbose: opts.verbose ? true : undefined,
    memory: opts.memory === false ? false : undefined,
    dbPath: opts.db,
    allowWrites: opts.allowWrites ? true : undefined,
  }
}

const PROGRESS_NOTICE = "Processing your request...\n"

function banner(config: AgentLoopConfig, backend: AgentBackend): string {
  const tools = backend.tools.length > 0 ? backend.tools.map((t) => t.name).join(", ") : "none"
  const lines = [
    `agentloop ${backend.name} · provider=${backend.providerName} model=${backend.model} verbose=${config.verbose ? "on" : "off"}`,
    `tools: ${tools}`,
  ]
  if (backend.name === "sql") {
    const mode = config.allowWrites ? "writes allowed, statements are NOT restricted" : "read-only"
    lines.push(`database: ${config.dbPath} (${mode})`)
  }
  lines.push("Type 'quit', 'exit' or 'q' to stop.")
  return lines.join("\n") + "\n"
}

async function startSession(variant: AgentVariant, opts: CommonOptions, io: AppIo): Promise<void> {
  const config = loadConfig(toOverrides(opts), io.env)
  const write = (text: string) => {
    io.output.write(text)
  }
  const backend = await createBackend(config, variant, { write })

  write(banner(config, backend))

  const controller = new AbortController()
  const rl = createInterface({ input: io.input, output: io.output, terminal: io.terminal })
  rl.setPrompt("> ")
  const interrupt = () => {
    controller.abort()
    rl.close()
  }
  rl.on("SIGINT", interrupt)
  if (io.handleSignals) process.on("SIGINT", interrupt)

  try {
    const exit = await runDelegationLoop({
      backend,
      lines: rl,
      write,
      prompt: () => rl.prompt(),
      signal: controller.signal,
      memory: config.memory,
      onStateChange: (state) => {
        if (state === "dispatching" && config.verbose) write(PROGRESS_NOTICE)
      },
    })
    if (exit.reason === "interrupted") write("\nbye\n")
    if (exit.reason === "fatal") io.setExitCode(1)
  } finally {
    if (io.handleSignals) process.off("SIGINT", interrupt)
    rl.close()
    await backend.close()
  }
}

async function runOnce(request: string, opts: CommonOptions, io: AppIo): Promise<void> {
  const config = loadConfig(toOverrides(opts), io.env)
  const write = (text: string) => {
    io.output.write(text)
  }
  const trimmed = request.trim()
  if (!trimmed) throw new ConfigurationError("Request must not be empty.")

  const backend = await createBackend(config, opts.sql ? "sql" : "chat", { write })
  try {
    if (config.verbose) write(PROGRESS_NOTICE)
    const result = await backend.handle(trimmed)
    if (result.status === "success") {
      write(`${result.output}\n`)
    } else {
      write(`(error) ${result.kind}: ${result.output}\n`)
      io.setExitCode(1)
    }
  } finally {
    await backend.close()
  }
}

export function buildProgram(io: AppIo = defaultIo()): Command {
  const program = new Command()

  program
    .name("agentloop")
    .description("Ask a hosted model questions, optionally letting it query a SQLite database")
    .version("0.1.0")
    .configureOutput({ writeOut: (str) => io.output.write(str) })

  const withCommonOptions = (cmd: Command) =>
    cmd
      .option("--provider <provider>", "gemini | openai | mock")
      .option("--model <model>", "model name")
      .option("--temperature <t>", "sampling temperature (0-2)")
      .option("--max-steps <n>", "maximum tool-calling steps per request")
      .option("--timeout-ms <ms>", "per-request timeout, 0 to disable")
      .option("--system-file <path>", "file with system instructions")
      .option("--verbose", "print tool calls and results")
      .option("--no-memory", "forget earlier turns")

  const withSqlOptions = (cmd: Command) =>
    cmd
      .option("--db <path>", "SQLite database file")
      .option("--allow-writes", "let the agent run statements that modify the database (unsafe)")

  withCommonOptions(program.command("chat").description("Conversational agent without tools")).action(
    async (opts: unknown) => {
      await startSession("chat", parseOptions(opts), io)
    },
  )

  withSqlOptions(
    withCommonOptions(program.command("sql").description("Agent that answers questions about a SQLite database")),
  ).action(async (opts: unknown) => {
    await startSession("sql", parseOptions(opts), io)
  })

  withSqlOptions(
    withCommonOptions(
      program
        .command("run")
        .description("Send a single request and print the result")
        .argument("<request>", "the request to send")
        .option("--sql", "use the SQL agent"),
    ),
  ).action(async (request: string, opts: unknown) => {
    await runOnce(request, parseOptions(opts), io)
  })

  return program
}
