import { CancelledError, TransportError, UpstreamError, describeError } from "../errors.js"
import type { UpstreamReason } from "../errors.js"

function reasonForStatus(status: number): UpstreamReason {
  if (status === 401 || status === 403) return "auth"
  if (status === 429) return "rate_limit"
  return "server"
}

function abortError(signal: AbortSignal, label: string): Error {
  const reason: unknown = signal.reason
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return new TransportError(`${label} request timed out`)
  }
  return new CancelledError()
}

/**
 * POSTs a JSON body and returns the parsed JSON response, mapping every failure onto
 * TransportError, UpstreamError or CancelledError.
 */
export async function postJson(
  url: string,
  options: { label: string; headers: Record<string, string>; body: unknown; signal?: AbortSignal },
): Promise<unknown> {
  let raw: string
  let status: number
  let ok: boolean
  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: options.signal,
    })
    status = res.status
    ok = res.ok
    raw = await res.text()
  } catch (e) {
    if (options.signal?.aborted) throw abortError(options.signal, options.label)
    throw new TransportError(`${options.label} request failed: ${describeError(e)}`)
  }

  if (!ok) {
    throw new UpstreamError(`${options.label} error ${status}: ${raw}`, reasonForStatus(status), status)
  }

  try {
    return JSON.parse(raw) as unknown
  } catch {
    throw new UpstreamError(`${options.label} returned a non-JSON body`, "malformed", status)
  }
}
