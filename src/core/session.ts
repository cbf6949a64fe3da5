/**
 * Session: one client-to-backend binding.
 *
 * Holds the backend address captured at connect time, the event buffer, the
 * lifecycle state and the single cancellation handle shared by the bridge task,
 * the stream publisher and the session table. The session table owns it; the
 * other components only hold references.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { SessionBusyError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { CloseReason, SessionSnapshot } from "../types/session-state.js";
import { EventBuffer } from "./event-buffer.js";
import { isSessionTransitionAllowed, type SessionState } from "./session-lifecycle.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface SessionEvents {
  "state:changed": { sessionId: string; from: SessionState; to: SessionState };
  closed: { sessionId: string; reason: CloseReason };
}

export interface SessionOptions {
  id: string;
  serverName: string;
  backendAddress: URL;
  bufferCapacity?: number;
  logger?: Logger;
  now?: () => number;
}

export class Session extends TypedEventEmitter<SessionEvents> {
  readonly id: string;
  readonly serverName: string;
  readonly backendAddress: URL;
  readonly createdAt: number;
  readonly buffer: EventBuffer;

  private currentState: SessionState = "connecting";
  private reason: CloseReason | undefined;
  private readonly abortController = new AbortController();
  private consumerAttached = false;
  private readonly closedPromise: Promise<void>;
  private resolveClosed: () => void = () => {};
  private readonly logger: Logger;

  constructor(options: SessionOptions) {
    super();
    this.id = options.id;
    this.serverName = options.serverName;
    // Copy: later registry changes never reach an existing session.
    this.backendAddress = new URL(options.backendAddress.href);
    this.createdAt = (options.now ?? Date.now)();
    this.logger = options.logger ?? noopLogger;
    this.buffer = new EventBuffer(options.bufferCapacity, (dropped) => {
      this.logger.debug?.("Event buffer full, dropped oldest frame", {
        sessionId: this.id,
        dropped,
      });
    });
    this.closedPromise = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get closeReason(): CloseReason | undefined {
    return this.reason;
  }

  /** Aborted once the session starts closing, whichever side asked. */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isAttached(): boolean {
    return this.consumerAttached;
  }

  /** True while the session can still deliver frames to a new consumer. */
  get isLive(): boolean {
    return this.currentState === "connecting" || this.currentState === "streaming";
  }

  /** Resolves when the session has reached `closed`. */
  whenClosed(): Promise<void> {
    return this.closedPromise;
  }

  /** Claim the single consumer slot. Throws SessionBusyError when already taken. */
  attach(): void {
    if (this.consumerAttached) throw new SessionBusyError(this.id);
    this.consumerAttached = true;
  }

  detach(): void {
    this.consumerAttached = false;
    if (this.currentState === "closed") this.buffer.clear();
  }

  /** Bridge task confirmed the backend stream is open. False if the session already started closing. */
  markStreaming(): boolean {
    if (this.currentState !== "connecting") return false;
    this.transition("streaming");
    return true;
  }

  /**
   * Enter `closing` with the given reason. The first caller wins; later calls are
   * no-ops. Aborts the shared signal and ends the buffer for its reader.
   */
  beginClosing(reason: CloseReason): boolean {
    if (this.currentState === "closing" || this.currentState === "closed") return false;
    this.reason = reason;
    this.transition("closing");
    this.buffer.close();
    this.abortController.abort();
    return true;
  }

  /** Request cancellation from outside the bridge task (client, unregister, shutdown). */
  cancel(cause: string): boolean {
    const started = this.beginClosing("client-cancel");
    if (started) this.logger.info("Session cancelled", { sessionId: this.id, cause });
    return started;
  }

  /** Called by the bridge task once the backend handle is released. Terminal. */
  markClosed(): void {
    if (this.currentState === "closed") return;
    if (this.currentState !== "closing") this.beginClosing("backend-error");
    this.transition("closed");
    if (!this.consumerAttached) this.buffer.clear();
    const reason = this.reason ?? "backend-error";
    this.emit("closed", { sessionId: this.id, reason });
    this.resolveClosed();
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      server: this.serverName,
      backendAddress: this.backendAddress.href,
      state: this.currentState,
      createdAt: this.createdAt,
      buffered: this.buffer.size,
      dropped: this.buffer.dropped,
      attached: this.consumerAttached,
      ...(this.reason && { closeReason: this.reason }),
    };
  }

  private transition(to: SessionState): void {
    const from = this.currentState;
    if (!isSessionTransitionAllowed(from, to)) {
      throw new Error(`Invalid session transition ${from} -> ${to} for ${this.id}`);
    }
    this.currentState = to;
    this.logger.debug?.("Session state changed", { sessionId: this.id, from, to });
    this.emit("state:changed", { sessionId: this.id, from, to });
  }
}
