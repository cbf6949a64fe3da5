import { WebSocket } from "ws";
import type { DataPlane } from "../core/data-plane.js";
import { SessionBusyError, SessionNotFoundError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { FrameSink } from "../interfaces/transport.js";
import type { CloseReason, Frame } from "../types/session-state.js";
import { noopLogger } from "./noop-logger.js";

/** Close codes in the application range, mirroring the HTTP statuses of the SSE route. */
export const WS_CLOSE_SESSION_NOT_FOUND = 4404;
export const WS_CLOSE_SESSION_BUSY = 4409;
export const WS_CLOSE_INTERNAL = 1011;

export type WsStreamMessage =
  | { type: "frame"; data: Frame }
  | { type: "heartbeat" }
  | { type: "end"; reason: CloseReason };

class SocketGoneError extends Error {
  constructor() {
    super("websocket closed");
    this.name = "SocketGoneError";
  }
}

/**
 * FrameSink over a `ws` socket. Every message is one JSON object; writes
 * resolve once `ws` has flushed them to the socket.
 */
export class WsFrameSink implements FrameSink {
  private isClosed = false;
  private readonly closeHandlers = new Set<() => void>();

  constructor(private readonly ws: WebSocket) {
    ws.once("close", () => this.markClosed());
  }

  get closed(): boolean {
    return this.isClosed || this.ws.readyState !== WebSocket.OPEN;
  }

  onClose(handler: () => void): () => void {
    if (this.isClosed) {
      handler();
      return () => {};
    }
    this.closeHandlers.add(handler);
    return () => this.closeHandlers.delete(handler);
  }

  sendFrame(frame: Frame): Promise<void> {
    return this.send({ type: "frame", data: frame });
  }

  sendHeartbeat(): Promise<void> {
    return this.send({ type: "heartbeat" });
  }

  end(reason: CloseReason): void {
    if (this.closed) return;
    const message: WsStreamMessage = { type: "end", reason };
    // The close frame is queued behind the end message.
    this.ws.send(JSON.stringify(message));
    this.ws.close(1000, reason);
  }

  private send(message: WsStreamMessage): Promise<void> {
    if (this.closed) return Promise.reject(new SocketGoneError());
    return new Promise<void>((resolve, reject) => {
      this.ws.send(JSON.stringify(message), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private markClosed(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const handlers = [...this.closeHandlers];
    this.closeHandlers.clear();
    for (const handler of handlers) handler();
  }
}

/**
 * Attach a freshly accepted socket to a session. Unknown sessions close with
 * 4404, an already attached one with 4409.
 */
export function serveWebSocketStream(
  dataPlane: DataPlane,
  ws: WebSocket,
  sessionId: string,
  logger: Logger = noopLogger,
): void {
  ws.on("error", (err) => {
    logger.warn("WebSocket stream error", { sessionId, error: err });
  });

  const sink = new WsFrameSink(ws);
  dataPlane
    .attachStream(sessionId, sink)
    .then((outcome) => {
      logger.debug?.("WebSocket stream finished", { sessionId, ...outcome });
    })
    .catch((err: unknown) => {
      if (err instanceof SessionNotFoundError) {
        ws.close(WS_CLOSE_SESSION_NOT_FOUND, "Session not found");
      } else if (err instanceof SessionBusyError) {
        ws.close(WS_CLOSE_SESSION_BUSY, "Session busy");
      } else {
        logger.error("WebSocket stream failed", { sessionId, error: err });
        ws.close(WS_CLOSE_INTERNAL, "Internal error");
      }
    });
}
