import type { AgentEvent } from "./types.js"

/** One progress line per event, or null for events that are not echoed. */
export function formatAgentEvent(event: AgentEvent): string | null {
  if (event.type === "tool_call") return `(tool_call) ${event.toolName} ${event.argsJson || "{}"}`
  if (event.type === "tool_result") return `(tool_result) ${event.toolName}`
  if (event.type === "error") return `(error) ${event.message}`
  return null
}
