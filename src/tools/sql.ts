import { z } from "zod"
import { listTableNames, quoteIdentifier } from "../db/sqlite.js"
import type { SqliteDatabase } from "../db/sqlite.js"
import { PolicyError } from "../errors.js"
import type { ModelProvider } from "../llm/types.js"
import { formatRows } from "../util/text.js"
import { readOnlySqlGuard, restrictTool } from "./restrict.js"
import type { ToolDefinition } from "./types.js"

const SAMPLE_ROWS = 3

const NoInput = z.object({}).passthrough()

const SqlSchemaInput = z.object({
  tables: z.string().min(1),
})

const SqlQueryInput = z.object({
  query: z.string().trim().min(1),
})

export type SqlQueryChecker = {
  provider: ModelProvider
  model: string
  temperature: number
}

export type SqlToolOptions = {
  db: SqliteDatabase
  allowWrites: boolean
  checker?: SqlQueryChecker
}

function describeTable(db: SqliteDatabase, table: string): string {
  const ddl = db
    .prepare<[string], { sql: string | null }>("SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table)
  const sample = db.prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoteIdentifier(table)} LIMIT ${SAMPLE_ROWS}`)
  const rows = sample.all()
  const columns = sample.columns().map((c) => c.name)
  return [
    (ddl?.sql ?? `CREATE TABLE ${table} (...)`).trim(),
    "",
    "/*",
    `${rows.length} rows from ${table} table:`,
    formatRows(rows, columns),
    "*/",
  ].join("\n")
}

function runStatement(db: SqliteDatabase, query: string, readOnly: boolean): string {
  const stmt = db.prepare<unknown[], Record<string, unknown>>(query)
  // SQLite's own verdict; covers the PRAGMA name(value) form the keyword guard cannot see.
  if (readOnly && !stmt.readonly) {
    throw new PolicyError("sql_query refused: database is read-only; the statement would modify the database")
  }
  if (stmt.reader) {
    const rows = stmt.all()
    const columns = stmt.columns().map((c) => c.name)
    const table = formatRows(rows, columns)
    return `${table}\n(${rows.length} row${rows.length === 1 ? "" : "s"})`
  }
  const info = stmt.run()
  return `Statement executed; ${info.changes} row${info.changes === 1 ? "" : "s"} changed.`
}

function queryCheckPrompt(query: string): string {
  return `
Double check the SQLite query below for common mistakes, including:
- using NOT IN with NULL values
- using UNION when UNION ALL should have been used
- using BETWEEN for exclusive ranges
- data type mismatch in predicates
- properly quoting identifiers
- using the correct number of arguments for functions
- casting to the correct data type
- using the proper columns for joins

If there are any of the above mistakes, rewrite the query. If there are no mistakes, reproduce the original query.
Output only the final SQL query.

Query:
${query}
`.trim()
}

export function createSqlTools(options: SqlToolOptions): ToolDefinition[] {
  const { db } = options

  const sql_list_tables: ToolDefinition<typeof NoInput> = {
    name: "sql_list_tables",
    description: "List the tables in the SQLite database. Input is an empty object.",
    risk: "safe",
    parametersJsonSchema: { type: "object", properties: {} },
    inputSchema: NoInput,
    handler: async () => {
      const names = listTableNames(db)
      return names.length > 0 ? names.join(", ") : "(no tables)"
    },
  }

  const sql_schema: ToolDefinition<typeof SqlSchemaInput> = {
    name: "sql_schema",
    description:
      "Show the schema and sample rows of the given tables. Call sql_list_tables first to be sure the tables exist.",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        tables: { type: "string", description: "Comma-separated table names, e.g. students, courses" },
      },
      required: ["tables"],
    },
    inputSchema: SqlSchemaInput,
    handler: async (input) => {
      const requested = input.tables
        .split(",")
        .map((t) => t.trim())
        .filter(Boolean)
      // Identifiers are case-insensitive in SQLite; describe tables under their stored names.
      const known = new Map(listTableNames(db).map((name) => [name.toLowerCase(), name] as const))
      const missing = requested.filter((t) => !known.has(t.toLowerCase()))
      if (missing.length > 0) {
        throw new Error(`Tables not found: ${missing.join(", ")}`)
      }
      return requested.map((t) => describeTable(db, known.get(t.toLowerCase()) ?? t)).join("\n\n")
    },
  }

  const sql_query: ToolDefinition<typeof SqlQueryInput> = {
    name: "sql_query",
    description:
      "Execute one SQL statement against the database and return the result. If the statement fails, read the error, fix the statement and try again.",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        query: { type: "string", description: "A single, syntactically correct SQLite statement" },
      },
      required: ["query"],
    },
    inputSchema: SqlQueryInput,
    handler: async (input) => runStatement(db, input.query, !options.allowWrites),
  }

  const tools: ToolDefinition[] = [
    sql_list_tables,
    sql_schema,
    options.allowWrites ? sql_query : restrictTool(sql_query, readOnlySqlGuard),
  ]

  const checker = options.checker
  if (checker) {
    const sql_query_check: ToolDefinition<typeof SqlQueryInput> = {
      name: "sql_query_check",
      description: "Review a SQL query for common mistakes before running it with sql_query.",
      risk: "safe",
      parametersJsonSchema: {
        type: "object",
        additionalProperties: false,
        properties: {
          query: { type: "string", description: "The SQL query to review" },
        },
        required: ["query"],
      },
      inputSchema: SqlQueryInput,
      handler: async (input, ctx) => {
        const response = await checker.provider.complete({
          model: checker.model,
          temperature: checker.temperature,
          messages: [{ role: "user", content: queryCheckPrompt(input.query) }],
          tools: [],
          signal: ctx.signal,
        })
        return (response.assistantText ?? "").trim() || input.query
      },
    }
    tools.push(sql_query_check)
  }

  return tools
}
