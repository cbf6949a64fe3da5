import fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import { EventBuffer } from "./event-buffer.js";

async function drain(buffer: EventBuffer): Promise<string[]> {
  buffer.close();
  const frames: string[] = [];
  for (let frame = await buffer.next(); frame !== null; frame = await buffer.next()) {
    frames.push(frame);
  }
  return frames;
}

describe("EventBuffer", () => {
  it("returns frames in push order", async () => {
    const buffer = new EventBuffer(10);
    buffer.push("1");
    buffer.push("2");
    buffer.push("3");

    expect(await buffer.next()).toBe("1");
    expect(await buffer.next()).toBe("2");
    expect(await buffer.next()).toBe("3");
  });

  it("drops the oldest frame when full", async () => {
    const onDrop = vi.fn();
    const buffer = new EventBuffer(2, onDrop);
    buffer.push("a");
    buffer.push("b");
    buffer.push("c");

    expect(buffer.dropped).toBe(1);
    expect(onDrop).toHaveBeenCalledWith(1);
    expect(await drain(buffer)).toEqual(["b", "c"]);
  });

  it("hands a frame straight to a waiting reader", async () => {
    const buffer = new EventBuffer(1);
    const read = buffer.next();

    buffer.push("x");

    expect(await read).toBe("x");
    expect(buffer.size).toBe(0);
    expect(buffer.dropped).toBe(0);
  });

  it("releases a pending reader with null on close", async () => {
    const buffer = new EventBuffer();
    const read = buffer.next();

    buffer.close();

    expect(await read).toBeNull();
    expect(buffer.push("late")).toBe(false);
  });

  it("still yields buffered frames after close, then null", async () => {
    const buffer = new EventBuffer();
    buffer.push("last");
    buffer.close();

    expect(await buffer.next()).toBe("last");
    expect(await buffer.next()).toBeNull();
  });

  it("discards pushes after close", () => {
    const buffer = new EventBuffer();
    buffer.close();

    expect(buffer.push("late")).toBe(false);
    expect(buffer.size).toBe(0);
  });

  it("rejects a second concurrent reader", async () => {
    const buffer = new EventBuffer();
    const first = buffer.next();

    await expect(buffer.next()).rejects.toThrow("already has a pending reader");

    buffer.push("ok");
    expect(await first).toBe("ok");
  });

  it("clear empties the buffer without touching the drop count", () => {
    const buffer = new EventBuffer(1);
    buffer.push("a");
    buffer.push("b");
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.dropped).toBe(1);
  });

  it("uses a capacity of 100 by default", () => {
    const buffer = new EventBuffer();
    for (let i = 0; i < 101; i++) buffer.push(String(i));

    expect(buffer.size).toBe(100);
    expect(buffer.dropped).toBe(1);
  });
});

describe("EventBuffer properties", () => {
  it("keeps the newest `capacity` frames in order and counts the rest as dropped", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 20 }),
        fc.array(fc.string(), { maxLength: 60 }),
        async (capacity, frames) => {
          const buffer = new EventBuffer(capacity);
          for (const frame of frames) buffer.push(frame);

          const excess = Math.max(0, frames.length - capacity);
          expect(buffer.dropped).toBe(excess);
          expect(await drain(buffer)).toEqual(frames.slice(excess));
        },
      ),
    );
  });
});
