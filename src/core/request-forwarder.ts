/**
 * RequestForwarder: per-call request/response path scoped to a session.
 *
 * Stateless: each call looks up the session's backend address and performs one
 * backend round-trip. It never touches the event buffer or the bridge task and
 * never changes session state; concurrent calls are not sequenced.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { GatewayError, InvalidRequestError, SessionNotFoundError } from "../errors.js";
import type { BackendConnector } from "../interfaces/backend-connector.js";
import type { Logger } from "../interfaces/logger.js";
import type { SessionTable } from "./session-table.js";

const METHOD_NAME_PATTERN = /^[A-Za-z0-9_-]{1,100}$/;

export interface RequestForwarderOptions {
  sessions: SessionTable;
  connector: BackendConnector;
  /** Per-call deadline; the call fails with BackendUnreachableError when it passes. */
  callTimeoutMs?: number;
  logger?: Logger;
}

export class RequestForwarder {
  private readonly logger: Logger;

  constructor(private readonly options: RequestForwarderOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  async forward(sessionId: string, method: string, payload: unknown): Promise<unknown> {
    const session = this.options.sessions.lookup(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (!METHOD_NAME_PATTERN.test(method)) {
      throw new InvalidRequestError(`invalid method name: ${JSON.stringify(method)}`);
    }

    const signal = this.options.callTimeoutMs
      ? AbortSignal.timeout(this.options.callTimeoutMs)
      : undefined;
    const startedAt = Date.now();
    try {
      const result = await this.options.connector.call(
        session.backendAddress,
        method,
        payload,
        signal,
      );
      this.logger.debug?.("Forwarded call completed", {
        sessionId,
        method,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (err) {
      this.logger.warn("Forwarded call failed", {
        sessionId,
        method,
        code: err instanceof GatewayError ? err.code : "UNKNOWN",
        error: err,
      });
      throw err;
    }
  }
}
