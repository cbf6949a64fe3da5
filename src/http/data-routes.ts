import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { connectRequestSchema } from "../config/config-schema.js";
import type { DataPlane } from "../core/data-plane.js";
import { SessionBusyError, SessionNotFoundError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { json, pathSegments, readJsonBody, sendError } from "./http-utils.js";
import { SseFrameSink } from "./sse-frame-sink.js";

export interface DataRouteDeps {
  dataPlane: DataPlane;
  maxBodyBytes?: number;
  logger?: Logger;
}

const callPayloadSchema = z.unknown();

export function handleDataRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  deps: DataRouteDeps,
): void {
  const { dataPlane, logger } = deps;
  const method = req.method ?? "GET";
  const segments = pathSegments(url.pathname); // ["data", ...]
  if (!segments) {
    json(res, 400, { error: { code: "INVALID_REQUEST", message: "Malformed path" } });
    return;
  }
  const [, resource, sessionId, backendMethod] = segments;

  // POST /data/connect: {server}
  if (resource === "connect" && segments.length === 2 && method === "POST") {
    readJsonBody(req, connectRequestSchema, deps.maxBodyBytes)
      .then((body) => dataPlane.connect(body.server))
      .then((result) => json(res, 200, { session_id: result.sessionId, server: result.server }))
      .catch((err) => sendError(res, err, logger));
    return;
  }

  // GET /data/stream/:sessionId: text/event-stream until the session ends
  if (resource === "stream" && sessionId && segments.length === 3 && method === "GET") {
    handleStream(res, sessionId, deps);
    return;
  }

  // POST /data/request/:sessionId/:method: forwarded backend call
  if (resource === "request" && sessionId && backendMethod && segments.length === 4) {
    if (method !== "POST") {
      json(res, 405, { error: { code: "METHOD_NOT_ALLOWED", message: "Method not allowed" } });
      return;
    }
    readJsonBody(req, callPayloadSchema, deps.maxBodyBytes)
      .then((payload) => dataPlane.call(sessionId, backendMethod, payload))
      .then((result) => json(res, 200, result))
      .catch((err) => sendError(res, err, logger));
    return;
  }

  // GET /data/sessions: snapshot of live sessions
  if (resource === "sessions" && segments.length === 2 && method === "GET") {
    json(res, 200, { sessions: dataPlane.listSessions() });
    return;
  }

  // DELETE /data/sessions/:sessionId: cancel a session
  if (resource === "sessions" && sessionId && segments.length === 3 && method === "DELETE") {
    dataPlane
      .closeSession(sessionId)
      .then((closed) => {
        if (closed) json(res, 200, { status: "closed", session_id: sessionId });
        else sendError(res, new SessionNotFoundError(sessionId), logger);
      })
      .catch((err) => sendError(res, err, logger));
    return;
  }

  json(res, 404, { error: { code: "NOT_FOUND", message: "Not found" } });
}

function handleStream(res: ServerResponse, sessionId: string, deps: DataRouteDeps): void {
  const { dataPlane, logger } = deps;
  const session = dataPlane.sessions.lookup(sessionId);
  if (!session) {
    sendError(res, new SessionNotFoundError(sessionId), logger);
    return;
  }
  if (session.isAttached) {
    sendError(res, new SessionBusyError(sessionId), logger);
    return;
  }

  // No await between the checks above and attach inside attachStream.
  const sink = new SseFrameSink(res);
  sink.open();
  dataPlane
    .attachStream(sessionId, sink)
    .then((outcome) => {
      logger?.debug?.("SSE stream finished", { sessionId, ...outcome });
    })
    .catch((err) => sendError(res, err, logger));
}
