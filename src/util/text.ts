export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text
  return `${text.slice(0, Math.max(0, maxChars - 14))}\n…(truncated)`
}

export function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2)
  } catch {
    return String(value)
  }
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "NULL"
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`
  if (typeof value === "object") return safeJsonStringify(value)
  return String(value)
}

/** Renders rows as a pipe-separated table with a header line. */
export function formatRows(rows: ReadonlyArray<Record<string, unknown>>, columns?: readonly string[]): string {
  const header = columns ?? Object.keys(rows[0] ?? {})
  if (header.length === 0) return ""
  const lines = [header.join(" | ")]
  for (const row of rows) {
    lines.push(header.map((c) => cellText(row[c])).join(" | "))
  }
  return lines.join("\n")
}
