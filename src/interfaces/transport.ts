import type { CloseReason, Frame } from "../types/session-state.js";

/**
 * Client-facing end of one attached stream. Transport-agnostic: the HTTP layer
 * implements it over SSE, the WebSocket server over `ws`.
 */
export interface FrameSink {
  /** Deliver one data frame. Resolves when the transport accepted it; rejects if the client is gone. */
  sendFrame(frame: Frame): Promise<void>;
  /** Deliver a heartbeat marker (distinct from data frames). */
  sendHeartbeat(): Promise<void>;
  /** Deliver the end-of-stream signal and close the transport. */
  end(reason: CloseReason): void;
  /** True once the client side has gone away. */
  readonly closed: boolean;
  /**
   * Register a callback fired once when the client side goes away (at once if
   * it already has). Returns a function that removes the callback.
   */
  onClose(handler: () => void): () => void;
}
