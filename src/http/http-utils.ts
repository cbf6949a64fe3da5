import type { IncomingMessage, ServerResponse } from "node:http";
import type { z } from "zod";
import { BackendCallError, GatewayError, InvalidRequestError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024; // 1 MB

export class PayloadTooLargeError extends GatewayError {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`, "PAYLOAD_TOO_LARGE");
    this.name = "PayloadTooLargeError";
  }
}

export function readBody(req: IncomingMessage, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let rejected = false;
    req.on("data", (chunk: Buffer) => {
      if (rejected) return;
      totalBytes += chunk.length;
      if (totalBytes > maxBytes) {
        rejected = true;
        req.resume();
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!rejected) resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", (err) => {
      if (!rejected) reject(err);
    });
  });
}

/** Read, JSON-parse and validate a request body. An empty body parses as `{}`. */
export async function readJsonBody<T extends z.ZodTypeAny>(
  req: IncomingMessage,
  schema: T,
  maxBytes?: number,
): Promise<z.output<T>> {
  const body = await readBody(req, maxBytes);
  let raw: unknown = {};
  if (body.trim()) {
    try {
      raw = JSON.parse(body);
    } catch (err) {
      throw new InvalidRequestError("Invalid JSON", { cause: err });
    }
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new InvalidRequestError(`Invalid request body: ${detail}`);
  }
  return parsed.data;
}

export function json(res: ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

export function statusForError(err: unknown): number {
  if (err instanceof BackendCallError) {
    return err.status >= 400 && err.status <= 599 ? err.status : 502;
  }
  if (!(err instanceof GatewayError)) return 500;
  switch (err.code) {
    case "NAME_NOT_FOUND":
    case "SESSION_NOT_FOUND":
      return 404;
    case "NAME_CONFLICT":
    case "SESSION_BUSY":
      return 409;
    case "INVALID_REQUEST":
      return 400;
    case "PAYLOAD_TOO_LARGE":
      return 413;
    case "BACKEND_UNREACHABLE":
    case "BACKEND_STREAM":
      return 502;
    default:
      return 500;
  }
}

/**
 * Write an error as `{ error: { code, message, source } }`. Backend call errors
 * pass the backend's own code and message through with `source: "backend"`.
 */
export function sendError(res: ServerResponse, err: unknown, logger?: Logger): void {
  const status = statusForError(err);
  if (status >= 500 && !(err instanceof GatewayError)) {
    logger?.error("Unhandled error while serving request", { error: err });
  }
  if (res.headersSent) {
    res.destroy();
    return;
  }
  if (err instanceof BackendCallError) {
    json(res, status, {
      error: { code: err.backendCode, message: err.message, source: "backend" },
    });
    return;
  }
  if (err instanceof GatewayError) {
    json(res, status, { error: { code: err.code, message: err.message, source: "gateway" } });
    return;
  }
  json(res, status, {
    error: { code: "INTERNAL", message: "Internal error", source: "gateway" },
  });
}

/** Split a pathname into decoded segments. Undefined when a segment is not valid URI encoding. */
export function pathSegments(pathname: string): string[] | undefined {
  try {
    return pathname.split("/").filter(Boolean).map(decodeURIComponent);
  } catch {
    return undefined;
  }
}
