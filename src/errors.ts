// src/errors.ts
export type ErrorCode =
  | "validation"
  | "out_of_scope"
  | "transport_failure"
  | "upstream_application"
  | "malformed_response"
  | "unknown_section"
  | "upstream"
  | "unexpected"

export class GatewayError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, readonly issues: string[] = []) {
    super("validation", message)
  }
}

/** The topic gate turned the question away; `message` is shown to the user as-is. */
export class OutOfScopeError extends GatewayError {
  constructor(message: string) {
    super("out_of_scope", message)
  }
}

/** Connection refused, reset, DNS failure or per-attempt timeout. Retried by the client. */
export class TransportFailure extends GatewayError {
  constructor(message: string, readonly timedOut = false, options?: { cause?: unknown }) {
    super("transport_failure", message, options)
  }
}

/** The provider answered with a non-2xx status. Never retried. */
export class UpstreamApplicationError extends GatewayError {
  constructor(readonly status: number, readonly body: string) {
    super("upstream_application", `LLM API error ${status}: ${body}`)
  }
}

export class MalformedResponseError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_response", `Invalid response format from LLM API: ${message}`, options)
  }
}

export class UnknownSectionError extends GatewayError {
  constructor(readonly key: string) {
    super("unknown_section", `Unknown prompt section: ${key}`)
  }
}

export class UpstreamError extends GatewayError {
  constructor(cause: GatewayError) {
    super("upstream", cause.message, { cause })
  }
}

export class UnexpectedError extends GatewayError {
  constructor(cause: unknown) {
    super("unexpected", cause instanceof Error ? cause.message : String(cause), { cause })
  }
}

export const isUpstreamFailure = (e: unknown): e is TransportFailure | UpstreamApplicationError | MalformedResponseError =>
  e instanceof TransportFailure || e instanceof UpstreamApplicationError || e instanceof MalformedResponseError
