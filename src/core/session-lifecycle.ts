/**
 * Session Lifecycle: allowed states and transitions for a data-plane session.
 *
 * `connecting` until the bridge task has the backend stream open, `streaming`
 * while frames flow, `closing` once any side asked to stop, and `closed` after
 * the backend handle has been released. `closed` is terminal.
 *
 * @module SessionControl
 */

export const SESSION_STATES = ["connecting", "streaming", "closing", "closed"] as const;

export type SessionState = (typeof SESSION_STATES)[number];

const ALLOWED_TRANSITIONS: Record<SessionState, ReadonlySet<SessionState>> = {
  connecting: new Set(["streaming", "closing"]),
  streaming: new Set(["closing"]),
  closing: new Set(["closed"]),
  closed: new Set(),
};

export function isSessionTransitionAllowed(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
