/**
 * Public test utilities: exported from the `"streamgate/testing"` entry point.
 * In-process stand-ins for a backend and a client stream; no vitest dependency.
 */
export { noopLogger } from "./adapters/noop-logger.js";
export type { CallHandler, RecordedCall } from "./testing/fake-backend-connector.js";
export {
  FakeBackendConnector,
  FakeBackendStream,
  mathCallHandler,
} from "./testing/fake-backend-connector.js";
export type { SinkEvent } from "./testing/recording-frame-sink.js";
export { RecordingFrameSink } from "./testing/recording-frame-sink.js";
