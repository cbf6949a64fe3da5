/**
 * SessionTable: the only shared mutable structure of the data plane.
 *
 * Maps session ids to live sessions. `create` runs a synchronous probe: it
 * starts the bridge task and only registers the session once the backend stream
 * is open, so a session whose backend is unreachable is never visible. Sessions
 * remove themselves when they reach `closed`.
 *
 * @module SessionControl
 */

import { randomUUID } from "node:crypto";
import { noopLogger } from "../adapters/noop-logger.js";
import { SessionNotFoundError } from "../errors.js";
import type { BackendConnector } from "../interfaces/backend-connector.js";
import type { Logger } from "../interfaces/logger.js";
import type { SessionSnapshot } from "../types/session-state.js";
import { type BridgeTaskHandle, startBridgeTask } from "./bridge-task.js";
import { DEFAULT_BUFFER_CAPACITY } from "./event-buffer.js";
import { Session } from "./session.js";

export interface SessionTableOptions {
  connector: BackendConnector;
  bufferCapacity?: number;
  /** Bridge task read timeout; 0 disables. */
  backendIdleTimeoutMs?: number;
  logger?: Logger;
  /** Id source; defaults to random UUIDs. */
  generateId?: () => string;
}

export interface SessionTarget {
  serverName: string;
  backendAddress: URL;
}

interface Entry {
  session: Session;
  bridge: BridgeTaskHandle;
}

export class SessionTable {
  private readonly live = new Map<string, Entry>();
  /** Sessions whose backend stream is still being opened. */
  private readonly pending = new Map<string, Entry>();
  private readonly options: SessionTableOptions;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(options: SessionTableOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Create a session bound to `target` and return it once its backend stream is
   * open. Rejects with BackendUnreachableError without registering anything when
   * the stream cannot be opened.
   */
  async create(target: SessionTarget): Promise<Session> {
    const session = new Session({
      id: this.nextId(),
      serverName: target.serverName,
      backendAddress: target.backendAddress,
      bufferCapacity: this.options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY,
      logger: this.logger,
    });
    session.once("closed", () => this.remove(session.id));

    const bridge = startBridgeTask(session, {
      connector: this.options.connector,
      idleTimeoutMs: this.options.backendIdleTimeoutMs,
      logger: this.logger,
    });
    const entry: Entry = { session, bridge };
    this.pending.set(session.id, entry);

    const outcome = await bridge.opened;
    this.pending.delete(session.id);
    if (!outcome.ok) {
      await bridge.done;
      throw outcome.error;
    }

    // A backend that already finished leaves nothing to attach to.
    if (session.state === "closed") return session;
    this.live.set(session.id, entry);
    this.logger.info("Session created", {
      sessionId: session.id,
      server: session.serverName,
      backend: session.backendAddress.href,
    });
    return session;
  }

  lookup(sessionId: string): Session | undefined {
    return this.live.get(sessionId)?.session;
  }

  /** Like lookup, but throws SessionNotFoundError for an unknown or expired id. */
  get(sessionId: string): Session {
    const session = this.lookup(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /** Drop a session from the table. Removing an absent id is a no-op. */
  remove(sessionId: string): void {
    if (this.live.delete(sessionId)) {
      this.logger.debug?.("Session removed from table", { sessionId });
    }
  }

  /**
   * Cancel a session and wait until its bridge task has released the backend.
   * Returns false when the id is unknown.
   */
  async close(sessionId: string, cause = "closed by request"): Promise<boolean> {
    const entry = this.live.get(sessionId);
    if (!entry) return false;
    entry.session.cancel(cause);
    await entry.bridge.done;
    return true;
  }

  /** Cancel every session bound to `serverName`. Returns the number cancelled. */
  cancelByServer(serverName: string, cause: string): number {
    let count = 0;
    for (const { session } of [...this.live.values(), ...this.pending.values()]) {
      if (session.serverName === serverName && session.cancel(cause)) count++;
    }
    return count;
  }

  /** Cancel every live and in-flight session and wait until all are closed. */
  async closeAll(cause = "gateway shutdown"): Promise<void> {
    const entries = [...this.live.values(), ...this.pending.values()];
    for (const { session } of entries) session.cancel(cause);
    await Promise.all(entries.map(({ bridge }) => bridge.done));
  }

  list(): SessionSnapshot[] {
    return Array.from(this.live.values(), ({ session }) => session.snapshot());
  }

  get size(): number {
    return this.live.size;
  }

  private nextId(): string {
    // Skip ids still held by a live or pending session.
    let id = this.generateId();
    while (this.live.has(id) || this.pending.has(id)) {
      id = this.generateId();
    }
    return id;
  }
}
