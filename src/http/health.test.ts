import type { IncomingMessage, ServerResponse } from "node:http";
import { describe, expect, it, vi } from "vitest";
import type { SessionSnapshot } from "../types/session-state.js";
import { type HealthContext, handleHealth } from "./health.js";

function mockResponse(): ServerResponse {
  return {
    writeHead: vi.fn(),
    end: vi.fn(),
  } as unknown as ServerResponse;
}

function snapshot(overrides: Partial<SessionSnapshot>): SessionSnapshot {
  return {
    sessionId: "s-1",
    server: "math1",
    backendAddress: "http://backend.test/",
    state: "streaming",
    createdAt: 0,
    buffered: 0,
    dropped: 0,
    attached: false,
    ...overrides,
  };
}

describe("handleHealth", () => {
  it("returns 200 with Content-Type application/json", () => {
    const res = mockResponse();
    handleHealth({} as IncomingMessage, res);

    expect(res.writeHead).toHaveBeenCalledWith(200, {
      "Content-Type": "application/json",
    });
  });

  it('returns { status: "ok" } body without context', () => {
    const res = mockResponse();
    handleHealth({} as IncomingMessage, res);

    expect(res.end).toHaveBeenCalledWith(JSON.stringify({ status: "ok" }));
  });

  it("reports sessions, attached streams and dropped frames with a context", () => {
    const res = mockResponse();
    const ctx: HealthContext = {
      version: "1.2.3",
      listSessions: () => [
        snapshot({ sessionId: "a", attached: true, dropped: 4 }),
        snapshot({ sessionId: "b", dropped: 1 }),
      ],
      backendCount: () => 2,
    };

    handleHealth({} as IncomingMessage, res, ctx);

    const body = JSON.parse((res.end as ReturnType<typeof vi.fn>).mock.calls[0][0]);
    expect(body.status).toBe("ok");
    expect(body.version).toBe("1.2.3");
    expect(body.uptime_seconds).toBeTypeOf("number");
    expect(body.backends).toBe(2);
    expect(body.sessions).toBe(2);
    expect(body.streaming).toBe(1);
    expect(body.frames_dropped).toBe(5);
  });
});
