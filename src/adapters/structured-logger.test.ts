import { describe, expect, it } from "vitest";
import { SessionNotFoundError } from "../errors.js";
import { LogLevel, parseLogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: ConstructorParameters<typeof StructuredLogger>[0] = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ ...options, writer: (line) => lines.push(line) });
  const entry = (index = 0): Record<string, unknown> => JSON.parse(lines[index]);
  return { lines, logger, entry };
}

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const { logger, entry } = capture();

    logger.info("gateway listening", { port: 8080 });

    expect(entry().level).toBe("info");
    expect(entry().msg).toBe("gateway listening");
    expect(entry().port).toBe(8080);
    expect(entry().time).toBeTypeOf("string"); // ISO 8601
  });

  it("respects log level filtering", () => {
    const { logger, lines } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("includes component name when set", () => {
    const { logger, entry } = capture({ component: "data-plane" });

    logger.info("test");

    expect(entry().component).toBe("data-plane");
  });

  it("serializes errors with code and stack", () => {
    const { logger, entry } = capture();

    logger.warn("stream rejected", { error: new SessionNotFoundError("s-1") });

    expect(entry().error).toBe("session not found: s-1");
    expect(entry().errorCode).toBe("SESSION_NOT_FOUND");
    expect(entry().errorStack).toContain("SessionNotFoundError: session not found: s-1");
  });

  it("serializes URLs as their href", () => {
    const { logger, entry } = capture();

    logger.info("opening", { backend: new URL("http://127.0.0.1:9001/base") });

    expect(entry().backend).toBe("http://127.0.0.1:9001/base");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const { logger, entry } = capture({ component: "test" });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    expect(entry().level).toBe("info");
    expect(entry().msg).toBe("spoofed");
    expect(entry().component).toBe("test");
    expect(entry().time).not.toBe("fake");
  });

  it("survives circular references in ctx", () => {
    const { logger, lines, entry } = capture();
    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    expect(entry()).toMatchObject({ msg: "circular data", level: "error", serializationError: true });
  });
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("info")).toBe(LogLevel.INFO);
    expect(parseLogLevel("warning")).toBe(LogLevel.WARN);
    expect(parseLogLevel("Error")).toBe(LogLevel.ERROR);
  });

  it("returns undefined for unknown or missing names", () => {
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
