import { describe, expect, it, vi } from "vitest";
import { SessionBusyError } from "../errors.js";
import { Session } from "./session.js";

function makeSession(capacity = 4): Session {
  return new Session({
    id: "s-1",
    serverName: "math1",
    backendAddress: new URL("http://127.0.0.1:9001/"),
    bufferCapacity: capacity,
    now: () => 1_700_000_000_000,
  });
}

describe("Session", () => {
  it("starts connecting with a live signal", () => {
    const session = makeSession();
    expect(session.state).toBe("connecting");
    expect(session.isLive).toBe(true);
    expect(session.signal.aborted).toBe(false);
    expect(session.closeReason).toBeUndefined();
  });

  it("copies the backend address", () => {
    const address = new URL("http://127.0.0.1:9001/");
    const session = new Session({ id: "s", serverName: "m", backendAddress: address });
    address.port = "9999";
    expect(session.backendAddress.href).toBe("http://127.0.0.1:9001/");
  });

  it("moves connecting → streaming once", () => {
    const session = makeSession();
    const changes = vi.fn();
    session.on("state:changed", changes);

    expect(session.markStreaming()).toBe(true);
    expect(session.markStreaming()).toBe(false);
    expect(changes).toHaveBeenCalledTimes(1);
    expect(changes).toHaveBeenCalledWith({
      sessionId: "s-1",
      from: "connecting",
      to: "streaming",
    });
  });

  it("keeps the first closing reason", () => {
    const session = makeSession();
    session.markStreaming();

    expect(session.beginClosing("backend-complete")).toBe(true);
    expect(session.cancel("late client")).toBe(false);
    expect(session.closeReason).toBe("backend-complete");
    expect(session.signal.aborted).toBe(true);
    expect(session.buffer.push("late")).toBe(false);
  });

  it("cancel closes with client-cancel", () => {
    const session = makeSession();
    expect(session.cancel("client went away")).toBe(true);
    expect(session.state).toBe("closing");
    expect(session.closeReason).toBe("client-cancel");
  });

  it("markStreaming refuses once closing", () => {
    const session = makeSession();
    session.cancel("early");
    expect(session.markStreaming()).toBe(false);
    expect(session.state).toBe("closing");
  });

  it("markClosed emits closed and resolves whenClosed", async () => {
    const session = makeSession();
    const closed = vi.fn();
    session.on("closed", closed);
    session.markStreaming();
    session.beginClosing("backend-error");

    session.markClosed();
    session.markClosed();

    await session.whenClosed();
    expect(session.state).toBe("closed");
    expect(session.isLive).toBe(false);
    expect(closed).toHaveBeenCalledTimes(1);
    expect(closed).toHaveBeenCalledWith({ sessionId: "s-1", reason: "backend-error" });
  });

  it("markClosed without a reason records backend-error", () => {
    const session = makeSession();
    session.markClosed();
    expect(session.closeReason).toBe("backend-error");
    expect(session.state).toBe("closed");
  });

  it("allows a single attached consumer", () => {
    const session = makeSession();
    session.attach();
    expect(() => session.attach()).toThrow(SessionBusyError);
    session.detach();
    expect(() => session.attach()).not.toThrow();
  });

  it("drops unread frames on close when nobody is attached", () => {
    const session = makeSession();
    session.markStreaming();
    session.buffer.push("a");
    session.beginClosing("backend-complete");
    session.markClosed();
    expect(session.buffer.size).toBe(0);
  });

  it("keeps frames for an attached reader until it detaches", () => {
    const session = makeSession();
    session.attach();
    session.markStreaming();
    session.buffer.push("a");
    session.beginClosing("backend-complete");
    session.markClosed();
    expect(session.buffer.size).toBe(1);

    session.detach();
    expect(session.buffer.size).toBe(0);
  });

  it("snapshot reports counters and close reason", () => {
    const session = makeSession(1);
    session.markStreaming();
    session.buffer.push("a");
    session.buffer.push("b");

    expect(session.snapshot()).toEqual({
      sessionId: "s-1",
      server: "math1",
      backendAddress: "http://127.0.0.1:9001/",
      state: "streaming",
      createdAt: 1_700_000_000_000,
      buffered: 1,
      dropped: 1,
      attached: false,
    });

    session.cancel("done");
    expect(session.snapshot().closeReason).toBe("client-cancel");
  });
});
