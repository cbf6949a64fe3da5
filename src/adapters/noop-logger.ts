import type { Logger } from "../interfaces/logger.js";

/** Discards everything. Default for components constructed without a logger. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
