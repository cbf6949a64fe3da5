/**
 * StreamPublisher: drains one session's event buffer into one client stream.
 *
 * Frames go out in buffer order. When nothing arrives for `heartbeatIntervalMs`
 * a heartbeat is written and the timer restarts; the pending buffer read is kept
 * across heartbeats so no frame is skipped. When the client goes away (close
 * notification or failed write) the session is cancelled and the publisher
 * returns at once, without waiting for the bridge task.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { ClientDisconnectedError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { FrameSink } from "../interfaces/transport.js";
import type { CloseReason, Frame } from "../types/session-state.js";
import type { Session } from "./session.js";

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;

export interface StreamPublisherOptions {
  heartbeatIntervalMs?: number;
  logger?: Logger;
}

export type PublishOutcome =
  | { kind: "ended"; reason: CloseReason; framesSent: number }
  | { kind: "disconnected"; framesSent: number };

const CLIENT_GONE = Symbol("client-gone");
const IDLE = Symbol("idle");

type ReadOutcome = { frame: Frame | null } | typeof CLIENT_GONE | typeof IDLE;

export class StreamPublisher {
  private readonly heartbeatIntervalMs: number;
  private readonly logger: Logger;

  constructor(options: StreamPublisherOptions = {}) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Attach to `session` and publish until end-of-stream or client disconnect.
   * Rejects with SessionBusyError when another consumer is already attached.
   */
  async publish(session: Session, sink: FrameSink): Promise<PublishOutcome> {
    session.attach();
    let pending: Promise<Frame | null> | null = null;
    let framesSent = 0;

    this.logger.debug?.("Stream consumer attached", { sessionId: session.id });
    try {
      while (true) {
        if (sink.closed) return this.disconnect(session, framesSent);

        pending ??= session.buffer.next();
        const outcome = await this.awaitFrame(pending, sink);

        if (outcome === CLIENT_GONE) return this.disconnect(session, framesSent);
        if (outcome === IDLE) {
          await sink.sendHeartbeat();
          continue;
        }

        pending = null;
        if (outcome.frame === null) {
          const reason = session.closeReason ?? "backend-error";
          sink.end(reason);
          this.logger.debug?.("Stream ended", { sessionId: session.id, reason, framesSent });
          return { kind: "ended", reason, framesSent };
        }

        await sink.sendFrame(outcome.frame);
        framesSent++;
      }
    } catch (err) {
      return this.disconnect(session, framesSent, err);
    } finally {
      session.detach();
    }
  }

  /** Wait for the next frame, the idle interval or the client leaving. Every listener ends with the wait. */
  private awaitFrame(pending: Promise<Frame | null>, sink: FrameSink): Promise<ReadOutcome> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let unsubscribe = () => {};
    const idle = new Promise<typeof IDLE>((resolve) => {
      timer = setTimeout(() => resolve(IDLE), this.heartbeatIntervalMs);
    });
    const clientGone = new Promise<typeof CLIENT_GONE>((resolve) => {
      unsubscribe = sink.onClose(() => resolve(CLIENT_GONE));
    });
    const read = pending.then((frame) => ({ frame }));
    return Promise.race([read, clientGone, idle]).finally(() => {
      clearTimeout(timer);
      unsubscribe();
    });
  }

  private disconnect(session: Session, framesSent: number, cause?: unknown): PublishOutcome {
    const signal = new ClientDisconnectedError(session.id, { cause });
    session.cancel(signal.message);
    this.logger.info("Stream consumer disconnected", {
      sessionId: session.id,
      framesSent,
      ...(cause !== undefined && { error: cause }),
    });
    return { kind: "disconnected", framesSent };
  }
}
