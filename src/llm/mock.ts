import type { ModelCompleteRequest, ModelProvider, ModelResponse } from "./types.js"

/** A scripted step: a response to return, or an error to throw. */
export type MockStep = ModelResponse | Error

const DEFAULT_REPLY: ModelResponse = {
  assistantText: "(mock model) Ready. Set GOOGLE_API_KEY and use --provider gemini to talk to a real model.",
  toolCalls: [],
}

export function mockText(text: string): ModelResponse {
  return { assistantText: text, toolCalls: [] }
}

export function mockToolCall(name: string, args: unknown, id = `call_${name}`): ModelResponse {
  return { assistantText: null, toolCalls: [{ id, name, argsJson: JSON.stringify(args) }] }
}

export class MockProvider implements ModelProvider {
  public readonly name = "mock"
  public readonly requests: ModelCompleteRequest[] = []
  private readonly script: MockStep[]

  /** Steps are consumed in order; once the script runs out the last step repeats. */
  public constructor(script: MockStep[] = [DEFAULT_REPLY]) {
    this.script = script.length > 0 ? [...script] : [DEFAULT_REPLY]
  }

  public async complete(request: ModelCompleteRequest): Promise<ModelResponse> {
    this.requests.push({ ...request, messages: [...request.messages] })
    const step = this.script.length > 1 ? this.script.shift() : this.script[0]
    if (step instanceof Error) throw step
    return step ?? DEFAULT_REPLY
  }
}
