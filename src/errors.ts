export class ConfigurationError extends Error {
  public override readonly name = "ConfigurationError"
}

export class TransportError extends Error {
  public override readonly name = "TransportError"
}

export type UpstreamReason = "auth" | "rate_limit" | "server" | "malformed"

export class UpstreamError extends Error {
  public override readonly name = "UpstreamError"

  public constructor(
    message: string,
    public readonly reason: UpstreamReason,
    public readonly status?: number,
  ) {
    super(message)
  }
}

/** Malformed tool arguments: bad JSON, or input that fails the tool's schema. */
export class ValidationError extends Error {
  public override readonly name = "ValidationError"

  public constructor(message: string, public readonly toolName: string) {
    super(message)
  }
}

export class PolicyError extends Error {
  public override readonly name = "PolicyError"
}

export class CancelledError extends Error {
  public override readonly name = "CancelledError"

  public constructor(message = "Request cancelled") {
    super(message)
  }
}

export class BackendClosedError extends Error {
  public override readonly name = "BackendClosedError"

  public constructor(message = "Backend has been closed") {
    super(message)
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
