import type { IncomingMessage, Server } from "node:http";
import type { WebSocket } from "ws";
import { WebSocketServer as WSServer } from "ws";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "./noop-logger.js";

const STREAM_PATH_RE = /^\/data\/ws\/([^/]+)$/;

export type OnStreamConnection = (socket: WebSocket, sessionId: string) => void;

export interface NodeWebSocketServerOptions {
  /** HTTP server to piggyback on; upgrades share its port. */
  server: Server;
  /** Maximum inbound payload size in bytes (default: 64KB). Clients only ever close. */
  maxPayload?: number;
  logger?: Logger;
}

/**
 * WebSocket transport for session streams using the `ws` package.
 * Accepts upgrades on `/data/ws/:sessionId`; anything else closes with 4000.
 */
export class NodeWebSocketServer {
  private wss: WSServer | null = null;
  private readonly options: NodeWebSocketServerOptions;
  private readonly logger: Logger;

  constructor(options: NodeWebSocketServerOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  /** Port of the underlying HTTP server once it is listening. */
  get port(): number | undefined {
    const addr = this.options.server.address();
    if (addr && typeof addr === "object") return addr.port;
    return undefined;
  }

  listen(onStreamConnection: OnStreamConnection): void {
    if (this.wss) throw new Error("NodeWebSocketServer is already listening");
    this.wss = new WSServer({
      server: this.options.server,
      maxPayload: this.options.maxPayload ?? 65_536,
    });
    this.wss.on("connection", (ws, req) => this.route(ws, req, onStreamConnection));
  }

  private route(ws: WebSocket, req: IncomingMessage, onStreamConnection: OnStreamConnection): void {
    // Strip query string for path matching
    const pathOnly = (req.url ?? "").split("?")[0] ?? "";
    const match = STREAM_PATH_RE.exec(pathOnly);
    const encoded = match?.[1];
    if (!encoded) {
      ws.close(4000, "Invalid path");
      return;
    }

    let sessionId: string;
    try {
      sessionId = decodeURIComponent(encoded);
    } catch {
      ws.close(1008, "Invalid session ID encoding");
      return;
    }
    this.logger.debug?.("WebSocket stream connection", { sessionId });
    onStreamConnection(ws, sessionId);
  }

  /** Close every open stream socket and stop accepting upgrades. The HTTP server stays up. */
  async close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    for (const client of wss.clients) {
      if (client.readyState === client.OPEN) client.close(1001, "Server shutting down");
    }
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
    this.wss = null;
  }
}
