import type { ServerResponse } from "node:http";
import type { FrameSink } from "../interfaces/transport.js";
import type { CloseReason, Frame } from "../types/session-state.js";

/** SSE comment line; ignored by EventSource clients but keeps proxies from timing out. */
export const SSE_HEARTBEAT = ":\n\n";

/** Encode a frame as one SSE event, one `data:` line per payload line. */
export function formatSseData(frame: Frame): string {
  return `${frame
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join("\n")}\n\n`;
}

export function formatSseEnd(reason: CloseReason): string {
  return `event: end\ndata: ${JSON.stringify({ reason })}\n\n`;
}

class ClientGoneError extends Error {
  constructor() {
    super("client stream closed");
    this.name = "ClientGoneError";
  }
}

/**
 * FrameSink over an HTTP response in text/event-stream format.
 * Writes wait for `drain` when the socket buffer is full.
 */
export class SseFrameSink implements FrameSink {
  private isClosed = false;
  private readonly closeHandlers = new Set<() => void>();

  constructor(private readonly res: ServerResponse) {
    res.once("close", () => this.markClosed());
  }

  /** Send the stream headers. Call once the request has been accepted. */
  open(): void {
    this.res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    this.res.flushHeaders();
  }

  get closed(): boolean {
    return this.isClosed;
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
    return this.write(formatSseData(frame));
  }

  sendHeartbeat(): Promise<void> {
    return this.write(SSE_HEARTBEAT);
  }

  end(reason: CloseReason): void {
    if (this.isClosed || this.res.writableEnded) return;
    this.res.end(formatSseEnd(reason));
  }

  private write(chunk: string): Promise<void> {
    if (this.isClosed || this.res.writableEnded) return Promise.reject(new ClientGoneError());
    if (this.res.write(chunk)) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        this.res.off("close", onClose);
        resolve();
      };
      const onClose = () => {
        this.res.off("drain", onDrain);
        reject(new ClientGoneError());
      };
      this.res.once("drain", onDrain);
      this.res.once("close", onClose);
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
