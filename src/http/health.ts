import type { IncomingMessage, ServerResponse } from "node:http";
import type { SessionSnapshot } from "../types/session-state.js";

/** What the health endpoint reports beyond `status`. */
export interface HealthContext {
  version: string;
  listSessions(): SessionSnapshot[];
  backendCount(): number;
}

export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx?: HealthContext,
): void {
  const body: Record<string, unknown> = { status: "ok" };
  if (ctx) {
    const sessions = ctx.listSessions();
    body.version = ctx.version;
    body.uptime_seconds = Math.floor(process.uptime());
    body.backends = ctx.backendCount();
    body.sessions = sessions.length;
    body.streaming = sessions.filter((s) => s.attached).length;
    body.frames_dropped = sessions.reduce((sum, s) => sum + s.dropped, 0);
  }
  res.writeHead(200, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
