/**
 * Typed error catalog. Every error the core raises on purpose is a
 * `DocQaError`, which carries an HTTP status and a stable error code so the
 * server can render it without inspecting the concrete class.
 */

/** HTTP statuses the catalog maps onto. */
export type ErrorStatus = 400 | 404 | 409 | 415 | 500 | 502 | 504;

export class DocQaError extends Error {
  constructor(
    public readonly code: ErrorStatus,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 400: Request validation

export class ValidationError extends DocQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, "VALIDATION_ERROR", message, details);
  }
}

// 404: Unknown or inactive project, unknown catalog row

export class NotFoundError extends DocQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(404, "NOT_FOUND", message, details);
  }
}

// 409: Uniqueness violation on an index binding

export class ConflictError extends DocQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, "CONFLICT", message, details);
  }
}

// 415: Audio the voice bridge cannot decode

export class UnsupportedAudioError extends DocQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(415, "UNSUPPORTED_AUDIO", message, details);
  }
}

// 502/504: External index, answering or voice capability failed

export type GatewayErrorKind =
  | "timeout"
  | "auth"
  | "rate_limit"
  | "not_found"
  | "network"
  | "provider"
  | "malformed_response";

export class GatewayError extends DocQaError {
  public readonly kind: GatewayErrorKind;

  constructor(
    kind: GatewayErrorKind,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(
      kind === "timeout" ? 504 : 502,
      kind === "timeout" ? "GATEWAY_TIMEOUT" : "GATEWAY_ERROR",
      message,
      { kind, ...options?.details },
    );
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// 500: Missing required setting. Fatal at startup.

export class ConfigurationError extends DocQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(500, "CONFIGURATION_ERROR", message, details);
  }
}
