/**
 * Gateway assembly: registry + connector + data plane + HTTP/WebSocket surfaces,
 * started on one port. Used by the CLI and by end-to-end tests.
 */

import type { Server } from "node:http";
import { HttpBackendConnector } from "./adapters/http-backend-connector.js";
import { NodeWebSocketServer } from "./adapters/node-ws-server.js";
import { noopLogger } from "./adapters/noop-logger.js";
import { serveWebSocketStream } from "./adapters/ws-frame-sink.js";
import { BackendRegistry } from "./core/backend-registry.js";
import { DataPlane } from "./core/data-plane.js";
import { createGatewayServer } from "./http/server.js";
import type { BackendConnector } from "./interfaces/backend-connector.js";
import type { Logger } from "./interfaces/logger.js";
import { type GatewayConfig, type ResolvedConfig, resolveConfig } from "./types/config.js";
import { VERSION } from "./version.js";

export interface StartGatewayOptions {
  config: GatewayConfig;
  logger?: Logger;
  /** Backend access; defaults to an HttpBackendConnector built from `config`. */
  connector?: BackendConnector;
  /** Backends registered before the server starts accepting requests. */
  backends?: Array<{ name: string; url: string }>;
}

export interface Gateway {
  readonly config: ResolvedConfig;
  readonly registry: BackendRegistry;
  readonly dataPlane: DataPlane;
  readonly httpServer: Server;
  /** Base URL the gateway is reachable at, e.g. `http://127.0.0.1:8080`. */
  readonly url: string;
  /** Cancel every session, close stream sockets and stop listening. Idempotent. */
  stop(): Promise<void>;
}

export async function startGateway(options: StartGatewayOptions): Promise<Gateway> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? noopLogger;

  const connector =
    options.connector ??
    new HttpBackendConnector({
      streamPath: config.backend.streamPath,
      streamQuery: config.backend.streamQuery,
      callPathPrefix: config.backend.callPathPrefix,
      connectTimeoutMs: config.backendConnectTimeoutMs,
      logger,
    });

  const registry = new BackendRegistry();
  for (const backend of options.backends ?? []) {
    registry.register(backend.name, backend.url);
  }

  const dataPlane = new DataPlane({
    resolver: registry,
    connector,
    bufferCapacity: config.bufferCapacity,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    backendIdleTimeoutMs: config.backendIdleTimeoutMs,
    backendCallTimeoutMs: config.backendCallTimeoutMs,
    logger,
  });
  dataPlane.watchRegistry(registry);

  const httpServer = createGatewayServer({
    registry,
    dataPlane,
    version: VERSION,
    maxBodyBytes: config.maxBodyBytes,
    logger,
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    httpServer.once("error", onError);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off("error", onError);
      resolve();
    });
  });

  const wsServer = new NodeWebSocketServer({ server: httpServer, logger });
  wsServer.listen((socket, sessionId) => serveWebSocketStream(dataPlane, socket, sessionId, logger));

  const address = httpServer.address();
  const port = address && typeof address === "object" ? address.port : config.port;
  const url = `http://${config.host}:${port}`;
  logger.info("Gateway listening", { url, backends: registry.size });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await dataPlane.shutdown();
      await wsServer.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      });
      logger.info("Gateway stopped");
    })();
    return stopping;
  };

  return { config: { ...config, port }, registry, dataPlane, httpServer, url, stop };
}
