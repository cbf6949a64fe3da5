import type { SessionState } from "../core/session-lifecycle.js";

export type { SessionState } from "../core/session-lifecycle.js";

/** One opaque payload from a backend event stream. Never parsed or rewritten by the gateway. */
export type Frame = string;

/** Why a session left the streaming state; carried on the client's end-of-stream signal. */
export type CloseReason = "backend-complete" | "backend-error" | "client-cancel";

/** Read-only view of a session for listings and health output. */
export interface SessionSnapshot {
  sessionId: string;
  server: string;
  backendAddress: string;
  state: SessionState;
  createdAt: number;
  /** Frames currently waiting in the event buffer. */
  buffered: number;
  /** Frames evicted by the drop-oldest policy since the session started. */
  dropped: number;
  /** Whether a stream consumer is currently attached. */
  attached: boolean;
  closeReason?: CloseReason;
}
