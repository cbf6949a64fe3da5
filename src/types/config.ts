import { gatewayConfigSchema } from "../config/config-schema.js";

export interface BackendEndpointConfig {
  /** Path of the backend's event stream, relative to its base URL. */
  streamPath: string; // default: "/stream"
  /** Query parameters sent with every stream request. */
  streamQuery: Record<string, string>; // default: { n: "50" }
  /** Prefix for method calls: POST {base}{callPathPrefix}/{method}. */
  callPathPrefix: string; // default: "/math"
}

/** Gateway configuration with sensible defaults */
export interface GatewayConfig {
  /** Port the HTTP server listens on (required) */
  port: number;
  host?: string; // default: "127.0.0.1"

  // Session data plane
  bufferCapacity?: number; // default: 100 frames
  heartbeatIntervalMs?: number; // default: 15000
  backendIdleTimeoutMs?: number; // default: 60000 (0 disables)

  // Backend connector
  backendCallTimeoutMs?: number; // default: 10000
  backendConnectTimeoutMs?: number; // default: 30000
  backend?: Partial<BackendEndpointConfig>;

  // HTTP surface
  maxBodyBytes?: number; // default: 1 MiB
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<GatewayConfig, "backend">> & {
  backend: BackendEndpointConfig;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  port: 8080,
  host: "127.0.0.1",
  bufferCapacity: 100,
  heartbeatIntervalMs: 15_000,
  backendIdleTimeoutMs: 60_000,
  backendCallTimeoutMs: 10_000,
  backendConnectTimeoutMs: 30_000,
  backend: {
    streamPath: "/stream",
    streamQuery: { n: "50" },
    callPathPrefix: "/math",
  },
  maxBodyBytes: 1024 * 1024,
};

export function resolveConfig(config: GatewayConfig): ResolvedConfig {
  const validation = gatewayConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  const { backend, ...rest } = config;
  const resolved: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    backend: { ...DEFAULT_CONFIG.backend, ...backend },
  };
  for (const [key, value] of Object.entries(rest)) {
    // An explicit undefined keeps the default.
    if (value !== undefined) Object.assign(resolved, { [key]: value });
  }
  return resolved;
}
