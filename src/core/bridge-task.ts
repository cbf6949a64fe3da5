/**
 * Bridge task: the one long-lived unit per session that moves frames from the
 * backend stream into the session's event buffer.
 *
 * Opens the stream, flips the session to `streaming`, then pumps until the
 * backend ends (`backend-complete`), fails or goes silent past the idle timeout
 * (`backend-error`), or the session signal aborts (`client-cancel`). Whatever the
 * exit, the backend stream handle is released exactly once before the session
 * is marked `closed`. Nothing is retried.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import {
  BackendStreamError,
  BackendUnreachableError,
  errorMessage,
  type GatewayError,
} from "../errors.js";
import type { BackendConnector, BackendStream } from "../interfaces/backend-connector.js";
import type { Logger } from "../interfaces/logger.js";
import type { CloseReason, Frame } from "../types/session-state.js";
import type { Session } from "./session.js";

export interface BridgeTaskOptions {
  connector: BackendConnector;
  /** Abort the backend read after this long without a frame. 0 disables. */
  idleTimeoutMs?: number;
  logger?: Logger;
}

export type BridgeOpenResult = { ok: true } | { ok: false; error: GatewayError };

export interface BridgeTaskHandle {
  /** Settles once the backend stream is open or failed to open. Never rejects. */
  readonly opened: Promise<BridgeOpenResult>;
  /** Resolves after the session reached `closed`. Never rejects. */
  readonly done: Promise<void>;
}

const CANCELLED = Symbol("cancelled");

export function startBridgeTask(session: Session, options: BridgeTaskOptions): BridgeTaskHandle {
  let settleOpen: (result: BridgeOpenResult) => void = () => {};
  const opened = new Promise<BridgeOpenResult>((resolve) => {
    settleOpen = resolve;
  });
  const done = runBridge(session, options, settleOpen);
  return { opened, done };
}

async function runBridge(
  session: Session,
  options: BridgeTaskOptions,
  settleOpen: (result: BridgeOpenResult) => void,
): Promise<void> {
  const logger = options.logger ?? noopLogger;
  let stream: BackendStream | undefined;

  try {
    try {
      stream = await options.connector.openStream(session.backendAddress, session.signal);
    } catch (err) {
      const error = toUnreachable(session, err);
      logger.warn("Backend stream could not be opened", {
        sessionId: session.id,
        backend: session.backendAddress.href,
        error,
      });
      settleOpen({ ok: false, error });
      session.beginClosing("backend-error");
      return;
    }

    if (!session.markStreaming()) {
      settleOpen({
        ok: false,
        error: new BackendUnreachableError("session cancelled before the backend stream opened"),
      });
      return;
    }
    settleOpen({ ok: true });
    logger.info("Bridge attached to backend stream", {
      sessionId: session.id,
      backend: session.backendAddress.href,
    });

    const reason = await pump(session, stream, options.idleTimeoutMs ?? 0, logger);
    session.beginClosing(reason);
  } catch (err) {
    // Only reachable through a bug in a collaborator; still close cleanly.
    logger.error("Bridge task failed unexpectedly", { sessionId: session.id, error: err });
    session.beginClosing("backend-error");
  } finally {
    if (stream) await release(session, stream, logger);
    session.markClosed();
    logger.info("Session closed", {
      sessionId: session.id,
      reason: session.closeReason,
      dropped: session.buffer.dropped,
    });
  }
}

async function pump(
  session: Session,
  stream: BackendStream,
  idleTimeoutMs: number,
  logger: Logger,
): Promise<CloseReason> {
  const iterator = stream[Symbol.asyncIterator]();

  while (true) {
    if (session.signal.aborted) return "client-cancel";

    let result: IteratorResult<Frame> | typeof CANCELLED;
    try {
      result = await untilAborted(withIdleTimeout(iterator.next(), idleTimeoutMs), session.signal);
    } catch (err) {
      if (session.signal.aborted) return "client-cancel";
      const error =
        err instanceof BackendStreamError
          ? err
          : new BackendStreamError(`backend stream failed: ${errorMessage(err)}`, { cause: err });
      logger.warn("Backend stream terminated with an error", { sessionId: session.id, error });
      return "backend-error";
    }

    if (result === CANCELLED) return "client-cancel";
    if (result.done) return "backend-complete";
    session.buffer.push(result.value);
  }
}

async function release(session: Session, stream: BackendStream, logger: Logger): Promise<void> {
  try {
    await stream.close();
  } catch (err) {
    logger.warn("Failed to release backend stream", { sessionId: session.id, error: err });
  }
}

/** Race one read against the session signal; the abort listener lives only as long as the read. */
function untilAborted<T>(read: Promise<T>, signal: AbortSignal): Promise<T | typeof CANCELLED> {
  if (signal.aborted) return Promise.resolve(CANCELLED);
  let onAbort = () => {};
  const cancelled = new Promise<typeof CANCELLED>((resolve) => {
    onAbort = () => resolve(CANCELLED);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([read, cancelled]).finally(() => {
    signal.removeEventListener("abort", onAbort);
  });
}

function withIdleTimeout<T>(read: Promise<T>, ms: number): Promise<T> {
  if (ms <= 0) return read;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new BackendStreamError(`no frame from backend within ${ms}ms`)),
      ms,
    );
  });
  return Promise.race([read, timeout]).finally(() => clearTimeout(timer));
}

function toUnreachable(session: Session, err: unknown): GatewayError {
  if (session.signal.aborted) {
    return new BackendUnreachableError("session cancelled before the backend stream opened", {
      cause: err,
    });
  }
  if (err instanceof BackendUnreachableError) return err;
  return new BackendUnreachableError(`backend stream could not be opened: ${errorMessage(err)}`, {
    cause: err,
  });
}
