import type { IncomingMessage, ServerResponse } from "node:http";
import { registerRequestSchema, unregisterRequestSchema } from "../config/config-schema.js";
import type { BackendRegistry } from "../core/backend-registry.js";
import type { Logger } from "../interfaces/logger.js";
import { json, readJsonBody, sendError } from "./http-utils.js";

export interface ControlRouteDeps {
  registry: BackendRegistry;
  maxBodyBytes?: number;
  logger?: Logger;
}

export function handleControlRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  deps: ControlRouteDeps,
): void {
  const method = req.method ?? "GET";
  const { registry, logger } = deps;

  // POST /control/register: {name, base_url, meta?}
  if (url.pathname === "/control/register" && method === "POST") {
    readJsonBody(req, registerRequestSchema, deps.maxBodyBytes)
      .then((body) => {
        registry.register(body.name, body.base_url, body.meta ?? {});
        logger?.info("Backend registered", { server: body.name, url: body.base_url });
        json(res, 200, { status: "ok", registered: body.name });
      })
      .catch((err) => sendError(res, err, logger));
    return;
  }

  // POST /control/unregister: {name}
  if (url.pathname === "/control/unregister" && method === "POST") {
    readJsonBody(req, unregisterRequestSchema, deps.maxBodyBytes)
      .then((body) => {
        registry.unregister(body.name);
        logger?.info("Backend unregistered", { server: body.name });
        json(res, 200, { status: "ok", unregistered: body.name });
      })
      .catch((err) => sendError(res, err, logger));
    return;
  }

  // GET /control/list
  if (url.pathname === "/control/list" && method === "GET") {
    const servers: Record<string, unknown> = {};
    for (const entry of registry.list()) {
      servers[entry.name] = {
        url: entry.backendAddress.href.replace(/\/$/, ""),
        meta: entry.meta,
        registered_at: entry.registeredAt,
      };
    }
    json(res, 200, { servers });
    return;
  }

  if (["/control/register", "/control/unregister", "/control/list"].includes(url.pathname)) {
    json(res, 405, { error: { code: "METHOD_NOT_ALLOWED", message: "Method not allowed" } });
    return;
  }
  json(res, 404, { error: { code: "NOT_FOUND", message: "Not found" } });
}
