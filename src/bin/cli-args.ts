import { DEFAULT_CONFIG, type GatewayConfig } from "../types/config.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface CliConfig {
  gateway: GatewayConfig;
  backends: Array<{ name: string; url: string }>;
  verbose: boolean;
}

export type CliCommand = { kind: "run"; config: CliConfig } | { kind: "help" } | { kind: "version" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ── Help ───────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
  streamgate: session gateway for streaming backends

  Usage: streamgate [options]

  Options:
    --port <n>               HTTP/WebSocket port (default: ${DEFAULT_CONFIG.port})
    --host <addr>            Bind address (default: ${DEFAULT_CONFIG.host})
    --buffer-capacity <n>    Frames buffered per session (default: ${DEFAULT_CONFIG.bufferCapacity})
    --heartbeat-ms <n>       Idle interval before a heartbeat (default: ${DEFAULT_CONFIG.heartbeatIntervalMs})
    --idle-timeout-ms <n>    Backend silence before a session fails, 0 disables (default: ${DEFAULT_CONFIG.backendIdleTimeoutMs})
    --register <name=url>    Register a backend at startup (repeatable)
    --verbose, -v            Debug logging
    --version                Print the version
    --help, -h               Show this help
`;

// ── Parsing ────────────────────────────────────────────────────────────────

function intArg(flag: string, value: string | undefined, min: number): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new CliUsageError(`${flag} requires a number`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) throw new CliUsageError(`${flag} must be at least ${min}`);
  return parsed;
}

function backendArg(value: string | undefined): { name: string; url: string } {
  const eq = value?.indexOf("=") ?? -1;
  if (value === undefined || eq <= 0 || eq === value.length - 1) {
    throw new CliUsageError("--register requires name=url");
  }
  return { name: value.slice(0, eq), url: value.slice(eq + 1) };
}

/** Parse `argv` without the node and script entries. */
export function parseArgs(args: readonly string[]): CliCommand {
  const gateway: GatewayConfig = { port: DEFAULT_CONFIG.port };
  const backends: CliConfig["backends"] = [];
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--port":
        gateway.port = intArg(arg, args[++i], 0);
        break;
      case "--host": {
        const host = args[++i];
        if (!host) throw new CliUsageError("--host requires an address");
        gateway.host = host;
        break;
      }
      case "--buffer-capacity":
        gateway.bufferCapacity = intArg(arg, args[++i], 1);
        break;
      case "--heartbeat-ms":
        gateway.heartbeatIntervalMs = intArg(arg, args[++i], 1);
        break;
      case "--idle-timeout-ms":
        gateway.backendIdleTimeoutMs = intArg(arg, args[++i], 0);
        break;
      case "--register":
        backends.push(backendArg(args[++i]));
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--version":
        return { kind: "version" };
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return { kind: "run", config: { gateway, backends, verbose } };
}
