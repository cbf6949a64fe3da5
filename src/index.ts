/**
 * streamgate public API barrel.
 *
 * Re-exports the session engine, the control plane, the HTTP/WebSocket surfaces
 * and the adapters that make up the `streamgate` package.
 * @module
 */

// Adapters
export type { HttpBackendConnectorOptions } from "./adapters/http-backend-connector.js";
export { HttpBackendConnector } from "./adapters/http-backend-connector.js";
export type { NodeWebSocketServerOptions, OnStreamConnection } from "./adapters/node-ws-server.js";
export { NodeWebSocketServer } from "./adapters/node-ws-server.js";
export { noopLogger } from "./adapters/noop-logger.js";
export type { SseEvent } from "./adapters/sse-parser.js";
export { parseSseStream } from "./adapters/sse-parser.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { WsStreamMessage } from "./adapters/ws-frame-sink.js";
export {
  serveWebSocketStream,
  WS_CLOSE_SESSION_BUSY,
  WS_CLOSE_SESSION_NOT_FOUND,
  WsFrameSink,
} from "./adapters/ws-frame-sink.js";
// Config
export {
  connectRequestSchema,
  gatewayConfigSchema,
  registerRequestSchema,
  unregisterRequestSchema,
} from "./config/config-schema.js";
// Core
export type { BackendRegistryEvents, Registration } from "./core/backend-registry.js";
export { BackendRegistry } from "./core/backend-registry.js";
export type { BridgeOpenResult, BridgeTaskHandle, BridgeTaskOptions } from "./core/bridge-task.js";
export { startBridgeTask } from "./core/bridge-task.js";
export type { ConnectResult, DataPlaneOptions } from "./core/data-plane.js";
export { DataPlane } from "./core/data-plane.js";
export { DEFAULT_BUFFER_CAPACITY, EventBuffer } from "./core/event-buffer.js";
export type { RequestForwarderOptions } from "./core/request-forwarder.js";
export { RequestForwarder } from "./core/request-forwarder.js";
export type { SessionEvents, SessionOptions } from "./core/session.js";
export { Session } from "./core/session.js";
export { isSessionTransitionAllowed, SESSION_STATES } from "./core/session-lifecycle.js";
export type { SessionTableOptions, SessionTarget } from "./core/session-table.js";
export { SessionTable } from "./core/session-table.js";
export type { PublishOutcome, StreamPublisherOptions } from "./core/stream-publisher.js";
export { DEFAULT_HEARTBEAT_INTERVAL_MS, StreamPublisher } from "./core/stream-publisher.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export {
  BackendCallError,
  BackendStreamError,
  BackendUnreachableError,
  ClientDisconnectedError,
  errorMessage,
  GatewayError,
  InvalidRequestError,
  NameConflictError,
  NameNotFoundError,
  SessionBusyError,
  SessionNotFoundError,
  toGatewayError,
} from "./errors.js";
// Gateway
export type { Gateway, StartGatewayOptions } from "./gateway.js";
export { startGateway } from "./gateway.js";
// HTTP
export type { GatewayServerOptions } from "./http/server.js";
export { createGatewayServer } from "./http/server.js";
export { formatSseData, formatSseEnd, SSE_HEARTBEAT, SseFrameSink } from "./http/sse-frame-sink.js";
// Interfaces
export type { BackendConnector, BackendStream } from "./interfaces/backend-connector.js";
export type { BackendResolver } from "./interfaces/backend-resolver.js";
export type { Logger } from "./interfaces/logger.js";
export type { FrameSink } from "./interfaces/transport.js";
// Types
export type {
  BackendEndpointConfig,
  GatewayConfig,
  ResolvedConfig,
} from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type { CloseReason, Frame, SessionSnapshot, SessionState } from "./types/session-state.js";
export { VERSION } from "./version.js";
