/**
 * Backend connector contract: how the data plane talks to one backend address.
 * Streaming reads and method calls are independent channels.
 * @module
 */

import type { Frame } from "../types/session-state.js";

/** An open backend event stream. Iterate for frames; close to release the connection. */
export interface BackendStream extends AsyncIterable<Frame> {
  /** Release the underlying connection. Safe to call more than once. */
  close(): Promise<void>;
}

export interface BackendConnector {
  /**
   * Open the backend's event stream. Resolves once the backend has accepted the
   * request; rejects with BackendUnreachableError otherwise. Aborting `signal`
   * tears the connection down.
   */
  openStream(address: URL, signal: AbortSignal): Promise<BackendStream>;

  /**
   * Single request/response call to a backend method. Rejects with BackendCallError
   * for a structured backend error and BackendUnreachableError for transport failures.
   */
  call(address: URL, method: string, payload: unknown, signal?: AbortSignal): Promise<unknown>;
}
