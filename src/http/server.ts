import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { BackendRegistry } from "../core/backend-registry.js";
import type { DataPlane } from "../core/data-plane.js";
import type { Logger } from "../interfaces/logger.js";
import { handleControlRoutes } from "./control-routes.js";
import { handleDataRoutes } from "./data-routes.js";
import { handleHealth } from "./health.js";
import { json } from "./http-utils.js";

export interface GatewayServerOptions {
  registry: BackendRegistry;
  dataPlane: DataPlane;
  version?: string;
  maxBodyBytes?: number;
  logger?: Logger;
}

/**
 * HTTP surface of the gateway:
 *   /control/*  backend registration
 *   /data/*     sessions, streams and forwarded calls
 *   /health     liveness plus session counters
 */
export function createGatewayServer(options: GatewayServerOptions): Server {
  const { registry, dataPlane, logger } = options;
  if (!registry || !dataPlane) {
    throw new Error("createGatewayServer requires registry and dataPlane");
  }

  return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health") {
      handleHealth(req, res, {
        version: options.version ?? "0.0.0",
        listSessions: () => dataPlane.listSessions(),
        backendCount: () => registry.size,
      });
      return;
    }

    if (url.pathname.startsWith("/control/")) {
      handleControlRoutes(req, res, url, {
        registry,
        maxBodyBytes: options.maxBodyBytes,
        logger,
      });
      return;
    }

    if (url.pathname.startsWith("/data/")) {
      handleDataRoutes(req, res, url, {
        dataPlane,
        maxBodyBytes: options.maxBodyBytes,
        logger,
      });
      return;
    }

    json(res, 404, { error: { code: "NOT_FOUND", message: "Not found" } });
  });
}
