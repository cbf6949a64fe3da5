/**
 * HTTP backend connector: fetch-based access to one backend server.
 *
 *   stream: GET  {base}{streamPath}?{streamQuery}   (text/event-stream, one frame per event)
 *   call:   POST {base}{callPathPrefix}/{method}    (JSON in, JSON out)
 */

import { z } from "zod";
import { BackendCallError, BackendUnreachableError, errorMessage } from "../errors.js";
import type { BackendConnector, BackendStream } from "../interfaces/backend-connector.js";
import type { Logger } from "../interfaces/logger.js";
import type { Frame } from "../types/session-state.js";
import { noopLogger } from "./noop-logger.js";
import { parseSseStream } from "./sse-parser.js";

export interface HttpBackendConnectorOptions {
  streamPath?: string;
  streamQuery?: Record<string, string>;
  callPathPrefix?: string;
  /** Deadline for the backend to answer the stream request with headers. */
  connectTimeoutMs?: number;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
}

const backendCode = z.union([z.string(), z.number()]).transform(String);

/** Error bodies seen from backends: {error}, {error:{code,message}}, {code,message}, {detail}. */
const backendErrorBodySchema = z.object({
  error: z
    .union([z.string(), z.object({ code: backendCode.optional(), message: z.string() })])
    .optional(),
  code: backendCode.optional(),
  message: z.string().optional(),
  detail: z.string().optional(),
});

class SseBackendStream implements BackendStream {
  private released = false;

  constructor(
    private readonly body: ReadableStream<Uint8Array>,
    private readonly controller: AbortController,
    private readonly onRelease: () => void,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<Frame> {
    for await (const event of parseSseStream(this.body)) {
      yield event.data;
    }
  }

  async close(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.controller.abort();
    this.onRelease();
  }
}

export class HttpBackendConnector implements BackendConnector {
  private readonly streamPath: string;
  private readonly streamQuery: Record<string, string>;
  private readonly callPathPrefix: string;
  private readonly connectTimeoutMs: number;
  private readonly fetchImpl: typeof globalThis.fetch;
  private readonly logger: Logger;

  constructor(options: HttpBackendConnectorOptions = {}) {
    this.streamPath = options.streamPath ?? "/stream";
    this.streamQuery = options.streamQuery ?? {};
    this.callPathPrefix = (options.callPathPrefix ?? "/math").replace(/\/$/, "");
    this.connectTimeoutMs = options.connectTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = options.logger ?? noopLogger;
  }

  async openStream(address: URL, signal: AbortSignal): Promise<BackendStream> {
    const url = joinPath(address, this.streamPath);
    for (const [key, value] of Object.entries(this.streamQuery)) {
      url.searchParams.set(key, value);
    }
    if (signal.aborted) {
      throw new BackendUnreachableError(`stream request to ${url.origin} cancelled`);
    }

    // Own controller: the stream must stay abortable after the caller's signal is gone.
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, { once: true });
    const detach = () => signal.removeEventListener("abort", onAbort);
    const connectTimer = setTimeout(() => controller.abort(), this.connectTimeoutMs);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "text/event-stream" },
        signal: controller.signal,
      });
    } catch (err) {
      detach();
      throw new BackendUnreachableError(
        `GET ${url.pathname} on ${url.origin} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    } finally {
      clearTimeout(connectTimer);
    }

    if (!res.ok || !res.body) {
      controller.abort();
      detach();
      throw new BackendUnreachableError(
        `backend stream at ${url.origin}${url.pathname} answered ${res.status}`,
      );
    }

    this.logger.debug?.("Backend stream opened", { url: url.href, status: res.status });
    return new SseBackendStream(res.body, controller, detach);
  }

  async call(
    address: URL,
    method: string,
    payload: unknown,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = joinPath(address, `${this.callPathPrefix}/${encodeURIComponent(method)}`);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(payload ?? {}),
        signal,
      });
      text = await res.text();
    } catch (err) {
      throw new BackendUnreachableError(
        `POST ${url.pathname} on ${url.origin} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const body = parseJson(text);
    if (!res.ok) throw toBackendCallError(res.status, body, text);
    if (body === INVALID_JSON) {
      throw new BackendCallError(502, "INVALID_RESPONSE", "backend returned a non-JSON result");
    }
    return body;
  }
}

const INVALID_JSON = Symbol("invalid-json");

function parseJson(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return INVALID_JSON;
  }
}

function toBackendCallError(status: number, body: unknown, text: string): BackendCallError {
  const parsed = backendErrorBodySchema.safeParse(body);
  if (parsed.success) {
    const { error, code, message, detail } = parsed.data;
    if (typeof error === "object") {
      return new BackendCallError(status, error.code ?? code ?? String(status), error.message);
    }
    const reported = error ?? message ?? detail;
    if (reported !== undefined) {
      return new BackendCallError(status, code ?? String(status), reported);
    }
  }
  return new BackendCallError(status, String(status), text.trim() || `backend answered ${status}`);
}

function joinPath(base: URL, path: string): URL {
  const url = new URL(base.href);
  url.pathname = `${url.pathname.replace(/\/+$/, "")}${path}`;
  url.search = "";
  return url;
}
