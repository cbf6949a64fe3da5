/**
 * EventBuffer: bounded per-session frame queue with a drop-oldest overflow policy.
 *
 * One writer (the bridge task) pushes; one reader (the attached stream
 * publisher) awaits `next()`. A full buffer evicts its head so the newest frame
 * always gets a slot; every eviction bumps `dropped`.
 *
 * Usage:
 *   const buffer = new EventBuffer(100);
 *   buffer.push(frame);                 // producer side
 *   const frame = await buffer.next();  // consumer side, null = end of stream
 *   buffer.close();                     // session is closing
 *
 * @module SessionControl
 */

import type { Frame } from "../types/session-state.js";
import { RingBuffer } from "../utils/ring-buffer.js";

export const DEFAULT_BUFFER_CAPACITY = 100;

export class EventBuffer {
  private readonly ring: RingBuffer<Frame>;
  private waiter: ((frame: Frame | null) => void) | null = null;
  private closed = false;
  private dropCount = 0;

  constructor(
    capacity = DEFAULT_BUFFER_CAPACITY,
    private readonly onDrop?: (totalDropped: number) => void,
  ) {
    this.ring = new RingBuffer<Frame>(capacity);
  }

  /**
   * Enqueue a frame, handing it straight to a waiting reader when there is one.
   * Returns false when the buffer is already closed and the frame was discarded.
   */
  push(frame: Frame): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      // A pending read implies the ring is empty.
      const resolve = this.waiter;
      this.waiter = null;
      resolve(frame);
      return true;
    }

    if (this.ring.push(frame)) {
      this.dropCount++;
      this.onDrop?.(this.dropCount);
    }
    return true;
  }

  /**
   * Resolve with the oldest buffered frame, waiting for one if the buffer is
   * empty. Resolves null once the buffer is closed and drained.
   */
  next(): Promise<Frame | null> {
    if (this.waiter) {
      return Promise.reject(new Error("EventBuffer already has a pending reader"));
    }
    const frame = this.ring.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.closed) return Promise.resolve(null);

    return new Promise<Frame | null>((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting frames and release a pending reader with end-of-stream. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  /** Discard buffered frames. Used once nobody can read them any more. */
  clear(): void {
    this.ring.clear();
  }

  get size(): number {
    return this.ring.size;
  }

  get dropped(): number {
    return this.dropCount;
  }
}
