import { afterEach, describe, expect, it, vi } from "vitest"
import { z } from "zod"
import type { ChatMessage } from "../agent/types.js"
import { CancelledError, TransportError, UpstreamError } from "../errors.js"
import type { ToolDefinition } from "../tools/types.js"
import { GeminiProvider, toGeminiRequest, toGeminiSchema } from "./gemini.js"

const QueryInput = z.object({ query: z.string() })

const queryTool: ToolDefinition<typeof QueryInput> = {
  name: "sql_query",
  description: "Run a query",
  risk: "dangerous",
  parametersJsonSchema: {
    type: "object",
    additionalProperties: false,
    properties: { query: { type: "string", default: "SELECT 1" } },
    required: ["query"],
  },
  inputSchema: QueryInput,
  handler: async () => "",
}

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  )
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0]?.[1]
  return JSON.parse(String(init?.body))
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("toGeminiSchema", () => {
  it("strips keys the API does not accept, at every depth", () => {
    expect(toGeminiSchema(queryTool.parametersJsonSchema)).toEqual({
      type: "object",
      properties: { query: { type: "string" } },
      required: ["query"],
    })
  })
})

describe("toGeminiRequest", () => {
  it("moves system text out and merges consecutive tool results", () => {
    const messages: ChatMessage[] = [
      { role: "system", content: "Be brief." },
      { role: "user", content: "How many students?" },
      {
        role: "assistant",
        toolCalls: [
          { id: "a", name: "sql_list_tables", argsJson: "{}" },
          { id: "b", name: "sql_schema", argsJson: '{"tables":"students"}' },
        ],
      },
      { role: "tool", toolCallId: "a", name: "sql_list_tables", content: "students" },
      { role: "tool", toolCallId: "b", name: "sql_schema", content: "CREATE TABLE students (id)" },
      { role: "assistant", content: "There are 4." },
    ]

    expect(toGeminiRequest(messages)).toEqual({
      systemInstruction: { parts: [{ text: "Be brief." }] },
      contents: [
        { role: "user", parts: [{ text: "How many students?" }] },
        {
          role: "model",
          parts: [
            { functionCall: { name: "sql_list_tables", args: {} } },
            { functionCall: { name: "sql_schema", args: { tables: "students" } } },
          ],
        },
        {
          role: "user",
          parts: [
            { functionResponse: { name: "sql_list_tables", response: { content: "students" } } },
            { functionResponse: { name: "sql_schema", response: { content: "CREATE TABLE students (id)" } } },
          ],
        },
        { role: "model", parts: [{ text: "There are 4." }] },
      ],
    })
  })

  it("keeps an empty answer as a model turn", () => {
    const messages: ChatMessage[] = [
      { role: "user", content: "say nothing" },
      { role: "assistant", content: "" },
      { role: "user", content: "now say hi" },
    ]

    expect(toGeminiRequest(messages).contents).toEqual([
      { role: "user", parts: [{ text: "say nothing" }] },
      { role: "model", parts: [{ text: "" }] },
      { role: "user", parts: [{ text: "now say hi" }] },
    ])
  })
})

describe("GeminiProvider", () => {
  it("sends no tool declarations when there are no tools", async () => {
    const fetchMock = stubFetch({ candidates: [{ content: { parts: [{ text: "Hi there!" }] } }] })
    const provider = new GeminiProvider("test-key", "https://gemini.test/v1beta")

    const response = await provider.complete({
      model: "gemini-2.0-flash",
      messages: [{ role: "user", content: "hello" }],
      tools: [],
      temperature: 0,
    })

    expect(response).toEqual({ assistantText: "Hi there!", toolCalls: [] })
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://gemini.test/v1beta/models/gemini-2.0-flash:generateContent")
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ "x-goog-api-key": "test-key" })
    expect(sentBody(fetchMock)).toEqual({
      contents: [{ role: "user", parts: [{ text: "hello" }] }],
      generationConfig: { temperature: 0 },
    })
  })

  it("declares tools and turns function calls into tool calls", async () => {
    const fetchMock = stubFetch({
      candidates: [{ content: { parts: [{ functionCall: { name: "sql_query", args: { query: "SELECT 1" } } }] } }],
    })
    const provider = new GeminiProvider("test-key")

    const response = await provider.complete({
      model: "gemini-2.0-flash",
      messages: [{ role: "user", content: "run it" }],
      tools: [queryTool],
    })

    expect(response.assistantText).toBeNull()
    expect(response.toolCalls).toHaveLength(1)
    expect(response.toolCalls[0]).toMatchObject({ name: "sql_query", argsJson: '{"query":"SELECT 1"}' })
    expect(response.toolCalls[0]?.id).toMatch(/^[0-9A-Z]{26}$/)
    expect(sentBody(fetchMock)).toMatchObject({
      tools: [
        {
          functionDeclarations: [
            {
              name: "sql_query",
              description: "Run a query",
              parameters: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
            },
          ],
        },
      ],
    })
  })

  it("maps 401 to an auth upstream error", async () => {
    stubFetch({ error: { message: "API key not valid" } }, 401)
    const provider = new GeminiProvider("test-key")

    const err = await provider
      .complete({ model: "m", messages: [{ role: "user", content: "x" }], tools: [] })
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(UpstreamError)
    if (err instanceof UpstreamError) {
      expect(err.reason).toBe("auth")
      expect(err.status).toBe(401)
    }
  })

  it("treats a body without candidates as malformed", async () => {
    stubFetch({ promptFeedback: { blockReason: "SAFETY" } })
    const provider = new GeminiProvider("test-key")

    const err = await provider
      .complete({ model: "m", messages: [{ role: "user", content: "x" }], tools: [] })
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(UpstreamError)
    if (err instanceof UpstreamError) expect(err.reason).toBe("malformed")
  })

  it("reports network failures as transport errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed")
      }),
    )
    const provider = new GeminiProvider("test-key")

    const err = await provider
      .complete({ model: "m", messages: [{ role: "user", content: "x" }], tools: [] })
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    if (err instanceof TransportError) expect(err.message).toBe("Gemini request failed: fetch failed")
  })

  it("reports an operator abort as cancellation", async () => {
    const controller = new AbortController()
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        controller.abort()
        throw new Error("This operation was aborted")
      }),
    )
    const provider = new GeminiProvider("test-key")

    await expect(
      provider.complete({ model: "m", messages: [{ role: "user", content: "x" }], tools: [], signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError)
  })
})
