import type { ChatMessage } from "../agent/types.js"
import type { ToolDefinition } from "../tools/types.js"

export type FailureKind = "transport" | "upstream" | "validation" | "cancelled" | "step_limit" | "internal"

export type BackendResult =
  | { status: "success"; output: string }
  | { status: "failure"; kind: FailureKind; output: string }

/** History carried between requests of one session. `handle` replaces `messages` on success. */
export type Conversation = {
  messages: ChatMessage[]
}

export type HandleOptions = {
  conversation?: Conversation
  signal?: AbortSignal
}

export interface Backend {
  readonly name: string
  readonly tools: readonly ToolDefinition[]
  /**
   * Resolves exactly one result per request. Per-request errors come back as failures; the
   * promise only rejects when the backend itself can no longer be used.
   */
  handle(request: string, options?: HandleOptions): Promise<BackendResult>
  close(): Promise<void>
}
