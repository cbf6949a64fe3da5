/**
 * DataPlane: the three client operations over the session engine.
 *
 *   connect(name)               → session id (registry resolved exactly once)
 *   attachStream(id, sink)      → frames/heartbeats until end or disconnect
 *   call(id, method, payload)   → backend result
 *
 * Also reacts to registry `unregistered` events by cancelling that backend's
 * sessions, and owns orderly shutdown.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { NameNotFoundError, SessionNotFoundError } from "../errors.js";
import type { BackendConnector } from "../interfaces/backend-connector.js";
import type { BackendResolver } from "../interfaces/backend-resolver.js";
import type { Logger } from "../interfaces/logger.js";
import type { FrameSink } from "../interfaces/transport.js";
import type { SessionSnapshot } from "../types/session-state.js";
import type { BackendRegistry } from "./backend-registry.js";
import { RequestForwarder } from "./request-forwarder.js";
import { SessionTable } from "./session-table.js";
import { type PublishOutcome, StreamPublisher } from "./stream-publisher.js";

export interface DataPlaneOptions {
  resolver: BackendResolver;
  connector: BackendConnector;
  bufferCapacity?: number;
  heartbeatIntervalMs?: number;
  backendIdleTimeoutMs?: number;
  backendCallTimeoutMs?: number;
  logger?: Logger;
}

export interface ConnectResult {
  sessionId: string;
  server: string;
}

export class DataPlane {
  readonly sessions: SessionTable;
  private readonly publisher: StreamPublisher;
  private readonly forwarder: RequestForwarder;
  private readonly resolver: BackendResolver;
  private readonly logger: Logger;
  private detachRegistry: (() => void) | null = null;
  private readonly activeStreams = new Set<Promise<PublishOutcome>>();

  constructor(options: DataPlaneOptions) {
    this.resolver = options.resolver;
    this.logger = options.logger ?? noopLogger;
    this.sessions = new SessionTable({
      connector: options.connector,
      bufferCapacity: options.bufferCapacity,
      backendIdleTimeoutMs: options.backendIdleTimeoutMs,
      logger: this.logger,
    });
    this.publisher = new StreamPublisher({
      heartbeatIntervalMs: options.heartbeatIntervalMs,
      logger: this.logger,
    });
    this.forwarder = new RequestForwarder({
      sessions: this.sessions,
      connector: options.connector,
      callTimeoutMs: options.backendCallTimeoutMs,
      logger: this.logger,
    });
  }

  /** Cancel a backend's sessions whenever it is unregistered. */
  watchRegistry(registry: BackendRegistry): void {
    this.detachRegistry?.();
    const onUnregistered = ({ name }: { name: string }) => {
      const cancelled = this.sessions.cancelByServer(name, `backend ${name} unregistered`);
      if (cancelled > 0) {
        this.logger.info("Cancelled sessions of unregistered backend", { server: name, cancelled });
      }
    };
    registry.on("unregistered", onUnregistered);
    this.detachRegistry = () => registry.off("unregistered", onUnregistered);
  }

  async connect(name: string): Promise<ConnectResult> {
    const backendAddress = this.resolver.resolve(name);
    if (!backendAddress) throw new NameNotFoundError(name);
    const session = await this.sessions.create({ serverName: name, backendAddress });
    return { sessionId: session.id, server: name };
  }

  /**
   * Publish a session's frames to `sink` until the session ends or the client
   * goes away. Rejects with SessionNotFoundError or SessionBusyError before
   * anything is written.
   */
  attachStream(sessionId: string, sink: FrameSink): Promise<PublishOutcome> {
    const session = this.sessions.lookup(sessionId);
    if (!session) return Promise.reject(new SessionNotFoundError(sessionId));
    const streaming = this.publisher.publish(session, sink);
    this.activeStreams.add(streaming);
    const untrack = () => this.activeStreams.delete(streaming);
    streaming.then(untrack, untrack);
    return streaming;
  }

  call(sessionId: string, method: string, payload: unknown): Promise<unknown> {
    return this.forwarder.forward(sessionId, method, payload);
  }

  closeSession(sessionId: string): Promise<boolean> {
    return this.sessions.close(sessionId);
  }

  listSessions(): SessionSnapshot[] {
    return this.sessions.list();
  }

  async shutdown(): Promise<void> {
    this.detachRegistry?.();
    this.detachRegistry = null;
    const count = this.sessions.size;
    await this.sessions.closeAll();
    // Attached streams have their end signal written before shutdown resolves.
    await Promise.allSettled(this.activeStreams);
    this.logger.info("Data plane stopped", { sessionsClosed: count });
  }
}
