import type { z } from "zod"
import { PolicyError } from "../errors.js"
import type { ToolDefinition } from "./types.js"

/** Returns a refusal reason, or null to let the call through. */
export type ToolGuard<Input> = (input: Input) => string | null

export function restrictTool<InputSchema extends z.ZodTypeAny>(
  tool: ToolDefinition<InputSchema>,
  guard: ToolGuard<z.output<InputSchema>>,
): ToolDefinition<InputSchema> {
  return {
    ...tool,
    handler: async (input, ctx) => {
      const refusal = guard(input)
      if (refusal !== null) throw new PolicyError(`${tool.name} refused: ${refusal}`)
      return tool.handler(input, ctx)
    },
  }
}

/** Removes comments and blanks out quoted text so keywords and semicolons can be scanned. */
export function maskSql(sql: string): string {
  let out = ""
  let i = 0
  while (i < sql.length) {
    const ch = sql[i]
    const next = sql[i + 1]
    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i)
      i = end === -1 ? sql.length : end
      out += " "
      continue
    }
    if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2)
      i = end === -1 ? sql.length : end + 2
      out += " "
      continue
    }
    if (ch === "'" || ch === '"' || ch === "`") {
      let j = i + 1
      while (j < sql.length) {
        if (sql[j] === ch && sql[j + 1] === ch) {
          j += 2
          continue
        }
        if (sql[j] === ch) break
        j += 1
      }
      out += `${ch}${ch}`
      i = j + 1
      continue
    }
    out += ch
    i += 1
  }
  return out
}

const READ_KEYWORDS = new Set(["SELECT", "WITH", "EXPLAIN", "VALUES", "PRAGMA"])
const WRITE_KEYWORDS = /\b(INSERT|UPDATE|DELETE|REPLACE|CREATE|DROP|ALTER|ATTACH|DETACH|VACUUM|REINDEX)\b/i

export const readOnlySqlGuard: ToolGuard<{ query: string }> = ({ query }) => {
  const masked = maskSql(query).trim().replace(/;\s*$/, "")
  if (masked.includes(";")) return "only a single statement is allowed"

  const keyword = /^[A-Za-z]+/.exec(masked)?.[0]?.toUpperCase()
  if (!keyword) return "no SQL statement found"
  if (!READ_KEYWORDS.has(keyword)) return `database is read-only; ${keyword} statements are not allowed`
  if (keyword === "PRAGMA" && masked.includes("=")) return "database is read-only; PRAGMA assignments are not allowed"
  if (keyword === "WITH" && WRITE_KEYWORDS.test(masked)) {
    return "database is read-only; data-modifying statements are not allowed"
  }
  return null
}
