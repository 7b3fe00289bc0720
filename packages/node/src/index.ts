/**
 * @multicustody/node: Custodian daemon.
 *
 * HTTP surface over one custodian's signature coordinator.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { handleError, requestIdMiddleware, REQUEST_ID_HEADER, loggerMiddleware, validateBody, validateQuery } from "./middleware/index.js";
export type { RequestLogEntry } from "./middleware/index.js";
export { createAccountRoutes, createHealthRoutes, createPendingRoutes, createReconcileRoutes } from "./routes/index.js";
export * from "./types/index.js";
