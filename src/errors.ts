export class GatewayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
  }
}

// ── Resolution & session errors ──

export class NameNotFoundError extends GatewayError {
  constructor(readonly serverName: string) {
    super(`server not found: ${serverName}`, "NAME_NOT_FOUND");
    this.name = "NameNotFoundError";
  }
}

export class NameConflictError extends GatewayError {
  constructor(readonly serverName: string) {
    super(`name already registered: ${serverName}`, "NAME_CONFLICT");
    this.name = "NameConflictError";
  }
}

export class SessionNotFoundError extends GatewayError {
  constructor(readonly sessionId: string) {
    super(`session not found: ${sessionId}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
  }
}

export class SessionBusyError extends GatewayError {
  constructor(readonly sessionId: string) {
    super(`session ${sessionId} already has an attached stream`, "SESSION_BUSY");
    this.name = "SessionBusyError";
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_REQUEST", options);
    this.name = "InvalidRequestError";
  }
}

// ── Backend errors ──

export class BackendUnreachableError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "BACKEND_UNREACHABLE", options);
    this.name = "BackendUnreachableError";
  }
}

export class BackendStreamError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "BACKEND_STREAM", options);
    this.name = "BackendStreamError";
  }
}

/** Structured error reported by a backend method; `backendCode` and message pass through verbatim. */
export class BackendCallError extends GatewayError {
  readonly status: number;
  readonly backendCode: string;

  constructor(status: number, backendCode: string, message: string) {
    super(message, "BACKEND_CALL");
    this.name = "BackendCallError";
    this.status = status;
    this.backendCode = backendCode;
  }
}

/** Internal signal only; drives cleanup and is never surfaced to a caller. */
export class ClientDisconnectedError extends GatewayError {
  constructor(readonly sessionId: string, options?: ErrorOptions) {
    super(`client disconnected from session ${sessionId}`, "CLIENT_DISCONNECTED", options);
    this.name = "ClientDisconnectedError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to GatewayError (preserves cause chain). */
export function toGatewayError(value: unknown): GatewayError {
  if (value instanceof GatewayError) return value;
  if (value instanceof Error) return new GatewayError(value.message, "UNKNOWN", { cause: value });
  return new GatewayError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
