import type { ClientError, ErrorKind } from "@marketlens/shared";

/**
 * Base class for every failure the gateway reports. The message is written
 * for clients; upstream errors travel only as `cause`.
 */
export class GatewayError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.kind = kind;
  }

  toClient(): ClientError {
    return { kind: this.kind, message: this.message };
  }
}

export class RateLimitedError extends GatewayError {
  constructor(
    readonly sourceId: string,
    message = `Rate limit exceeded for ${sourceId}`,
  ) {
    super("RateLimited", message);
    this.name = "RateLimitedError";
  }
}

export class CircuitOpenError extends GatewayError {
  constructor(
    readonly sourceId: string,
    readonly retryAt: number,
  ) {
    super("CircuitOpen", `Upstream ${sourceId} is unavailable; retry after ${new Date(retryAt).toISOString()}`);
    this.name = "CircuitOpenError";
  }
}

export class TimeoutError extends GatewayError {
  constructor(label: string) {
    super("Timeout", `${label} timed out`);
    this.name = "TimeoutError";
  }
}

export class NoContextError extends GatewayError {
  constructor() {
    super("NoContext", "No analyzer produced usable data");
    this.name = "NoContextError";
  }
}

export class DeadlineExceededError extends GatewayError {
  constructor(budgetMs: number) {
    super("DeadlineExceeded", `Request exceeded its ${budgetMs}ms budget`);
    this.name = "DeadlineExceededError";
  }
}

export class AuthFailedError extends GatewayError {
  constructor(message = "Authentication failed") {
    super("AuthFailed", message);
    this.name = "AuthFailedError";
  }
}

export class DisconnectedError extends GatewayError {
  constructor(message = "Connection is closing") {
    super("Disconnected", message);
    this.name = "DisconnectedError";
  }
}

export class UnavailableError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Unavailable", message, options);
    this.name = "UnavailableError";
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super("InvalidRequest", message);
    this.name = "InvalidRequestError";
  }
}

/** Never leaks a foreign error's message to a client. */
export function toClientError(err: unknown): ClientError {
  if (err instanceof GatewayError) {
    return err.toClient();
  }
  return { kind: "Internal", message: "Internal error" };
}
