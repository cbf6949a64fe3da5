/**
 * Incremental text/event-stream parser for backend event streams.
 *
 * Follows the EventSource line rules the gateway needs:
 * - "data:" lines accumulate into the event payload (joined with "\n")
 * - "event:" names the event; "id:" and "retry:" are read and ignored
 * - lines starting with ":" are comments (backend heartbeats)
 * - a blank line dispatches the accumulated event
 * Both "\n" and "\r\n" line endings are accepted.
 */

export interface SseEvent {
  event?: string;
  data: string;
}

export async function* parseSseStream(stream: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let pending = "";
  let dataLines: string[] = [];
  let eventName: string | undefined;

  const dispatch = (): SseEvent | undefined => {
    if (dataLines.length === 0) {
      eventName = undefined;
      return undefined;
    }
    const event: SseEvent = { data: dataLines.join("\n") };
    if (eventName) event.event = eventName;
    dataLines = [];
    eventName = undefined;
    return event;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      pending += decoder.decode(value, { stream: true });
      const lines = pending.split("\n");
      pending = lines.pop() ?? "";

      for (const raw of lines) {
        const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
        if (line === "") {
          const event = dispatch();
          if (event) yield event;
          continue;
        }
        if (line.startsWith(":")) continue;

        const colon = line.indexOf(":");
        const field = colon === -1 ? line : line.slice(0, colon);
        let value = colon === -1 ? "" : line.slice(colon + 1);
        if (value.startsWith(" ")) value = value.slice(1);

        if (field === "data") dataLines.push(value);
        else if (field === "event") eventName = value;
      }
    }

    pending += decoder.decode();
    if (pending !== "" && pending.startsWith("data:")) {
      dataLines.push(pending.slice(5).replace(/^ /, "").replace(/\r$/, ""));
    }
    const last = dispatch();
    if (last) yield last;
  } finally {
    reader.releaseLock();
  }
}
