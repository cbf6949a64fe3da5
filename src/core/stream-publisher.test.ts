import { afterEach, describe, expect, it, vi } from "vitest";
import { SessionBusyError } from "../errors.js";
import type { FrameSink } from "../interfaces/transport.js";
import { FakeBackendConnector } from "../testing/fake-backend-connector.js";
import { heapGrowthMb, settle } from "../testing/heap.js";
import { RecordingFrameSink } from "../testing/recording-frame-sink.js";
import { Session } from "./session.js";
import { SessionTable } from "./session-table.js";
import { StreamPublisher } from "./stream-publisher.js";

function streamingSession(capacity = 10): Session {
  const session = new Session({
    id: "s-1",
    serverName: "math1",
    backendAddress: new URL("http://127.0.0.1:9001/"),
    bufferCapacity: capacity,
  });
  session.markStreaming();
  return session;
}

/** Sink that counts frames without keeping them and tracks live close listeners. */
class CountingSink implements FrameSink {
  framesWritten = 0;
  closed = false;
  readonly listeners = new Set<() => void>();

  onClose(handler: () => void): () => void {
    this.listeners.add(handler);
    return () => this.listeners.delete(handler);
  }

  async sendFrame(): Promise<void> {
    this.framesWritten++;
  }

  async sendHeartbeat(): Promise<void> {}

  end(): void {
    this.closed = true;
  }
}

afterEach(() => {
  vi.useRealTimers();
});

describe("StreamPublisher", () => {
  it("delivers frames in buffer order, then the end signal", async () => {
    const session = streamingSession();
    const sink = new RecordingFrameSink();
    const publishing = new StreamPublisher().publish(session, sink);

    session.buffer.push("1");
    session.buffer.push("2");
    session.buffer.push("3");
    session.beginClosing("backend-complete");

    expect(await publishing).toEqual({ kind: "ended", reason: "backend-complete", framesSent: 3 });
    expect(sink.events).toEqual([
      { type: "frame", frame: "1" },
      { type: "frame", frame: "2" },
      { type: "frame", frame: "3" },
      { type: "end", reason: "backend-complete" },
    ]);
    expect(session.isAttached).toBe(false);
  });

  it("delivers only the newest frames after an overflow", async () => {
    const session = streamingSession(2);
    for (const frame of ["a", "b", "c", "d", "e"]) session.buffer.push(frame);
    session.beginClosing("backend-complete");
    const sink = new RecordingFrameSink();

    await new StreamPublisher().publish(session, sink);

    expect(sink.frames).toEqual(["d", "e"]);
    expect(session.buffer.dropped).toBe(3);
  });

  it("passes the close reason through to the end signal", async () => {
    const session = streamingSession();
    const sink = new RecordingFrameSink();
    const publishing = new StreamPublisher().publish(session, sink);

    session.beginClosing("backend-error");

    expect(await publishing).toMatchObject({ kind: "ended", reason: "backend-error" });
    expect(sink.endReason).toBe("backend-error");
  });

  it("sends heartbeats while idle without losing the pending read", async () => {
    vi.useFakeTimers();
    const session = streamingSession();
    const sink = new RecordingFrameSink();
    const publishing = new StreamPublisher({ heartbeatIntervalMs: 1_000 }).publish(session, sink);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(sink.heartbeats).toBe(1);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(sink.heartbeats).toBe(2);

    session.buffer.push("x");
    session.beginClosing("backend-complete");
    await publishing;

    expect(sink.events).toEqual([
      { type: "heartbeat" },
      { type: "heartbeat" },
      { type: "frame", frame: "x" },
      { type: "end", reason: "backend-complete" },
    ]);
  });

  it("rejects a second consumer with SessionBusyError", async () => {
    const session = streamingSession();
    const publisher = new StreamPublisher();
    const first = publisher.publish(session, new RecordingFrameSink());

    await expect(publisher.publish(session, new RecordingFrameSink())).rejects.toBeInstanceOf(
      SessionBusyError,
    );

    session.beginClosing("backend-complete");
    expect(await first).toMatchObject({ kind: "ended" });
  });

  it("cancels the session when a write fails", async () => {
    const session = streamingSession();
    const sink = new RecordingFrameSink();
    sink.failWrites();
    const publishing = new StreamPublisher().publish(session, sink);

    session.buffer.push("a");

    expect(await publishing).toEqual({ kind: "disconnected", framesSent: 0 });
    expect(session.closeReason).toBe("client-cancel");
    expect(session.isAttached).toBe(false);
  });

  it("on client disconnect cancels the session, which then closes and leaves the table", async () => {
    const connector = new FakeBackendConnector();
    const table = new SessionTable({ connector });
    const session = await table.create({
      serverName: "math1",
      backendAddress: new URL("http://127.0.0.1:9001/"),
    });
    const sink = new RecordingFrameSink();
    const publishing = new StreamPublisher().publish(session, sink);

    connector.lastStream.push("1");
    await vi.waitFor(() => expect(sink.frames).toEqual(["1"]));
    sink.disconnect();

    expect(await publishing).toEqual({ kind: "disconnected", framesSent: 1 });
    await session.whenClosed();
    expect(session.closeReason).toBe("client-cancel");
    expect(connector.lastStream.closeCount).toBe(1);
    expect(table.lookup(session.id)).toBeUndefined();
  });

  it("returns at once when the sink is already closed", async () => {
    const session = streamingSession();
    const sink = new RecordingFrameSink();
    sink.disconnect();

    expect(await new StreamPublisher().publish(session, sink)).toEqual({
      kind: "disconnected",
      framesSent: 0,
    });
    expect(session.closeReason).toBe("client-cancel");
  });

  it("keeps memory and close listeners flat over a long-lived stream", async () => {
    const session = streamingSession(1_000);
    const sink = new CountingSink();
    const publishing = new StreamPublisher().publish(session, sink);
    const pushBatches = async (batches: number) => {
      for (let i = 0; i < batches; i++) {
        for (let j = 0; j < 1_000; j++) session.buffer.push("x");
        await settle();
        expect(sink.listeners.size).toBeLessThanOrEqual(1);
      }
    };

    await pushBatches(20);
    const grown = await heapGrowthMb(() => pushBatches(150));

    expect(sink.framesWritten).toBe(170_000);
    expect(session.buffer.dropped).toBe(0);
    expect(grown).toBeLessThan(5);
    session.beginClosing("backend-complete");
    expect(await publishing).toEqual({
      kind: "ended",
      reason: "backend-complete",
      framesSent: 170_000,
    });
    expect(sink.listeners.size).toBe(0);
  }, 30_000);
});
