import { describe, expect, it } from "vitest";
import { parseSseStream, type SseEvent } from "./sse-parser.js";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}

async function collect(stream: ReadableStream<Uint8Array>): Promise<SseEvent[]> {
  const events: SseEvent[] = [];
  for await (const event of parseSseStream(stream)) events.push(event);
  return events;
}

describe("parseSseStream", () => {
  it("dispatches one event per blank line", async () => {
    const events = await collect(streamOf("data: 1\n\ndata: 2\n\n"));
    expect(events).toEqual([{ data: "1" }, { data: "2" }]);
  });

  it("reassembles events split across chunks", async () => {
    const events = await collect(streamOf("data: {\"n\":", "1}\n", "\nda", "ta: 2\n\n"));
    expect(events).toEqual([{ data: '{"n":1}' }, { data: "2" }]);
  });

  it("joins multi-line data with newlines and keeps the event name", async () => {
    const events = await collect(streamOf("event: tick\ndata: a\ndata: b\n\n"));
    expect(events).toEqual([{ event: "tick", data: "a\nb" }]);
  });

  it("ignores comments, id and retry fields", async () => {
    const events = await collect(streamOf(": keepalive\n\nid: 7\nretry: 1000\ndata: x\n\n"));
    expect(events).toEqual([{ data: "x" }]);
  });

  it("accepts CRLF line endings", async () => {
    const events = await collect(streamOf("data: 1\r\n\r\ndata: 2\r\n\r\n"));
    expect(events).toEqual([{ data: "1" }, { data: "2" }]);
  });

  it("keeps an empty data line and a value without the optional space", async () => {
    const events = await collect(streamOf("data:\n\ndata:tight\n\n"));
    expect(events).toEqual([{ data: "" }, { data: "tight" }]);
  });

  it("flushes a final event that lacks the blank line", async () => {
    const events = await collect(streamOf("data: 1\n\ndata: last"));
    expect(events).toEqual([{ data: "1" }, { data: "last" }]);
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("data: é\n\n");
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.slice(0, 7));
        controller.enqueue(bytes.slice(7));
        controller.close();
      },
    });
    expect(await collect(stream)).toEqual([{ data: "é" }]);
  });
});
