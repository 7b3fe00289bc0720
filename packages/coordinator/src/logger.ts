import type { CoordinatorLogger } from "./types.js";

/** Logger used when none is injected. */
export const silentLogger: CoordinatorLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
