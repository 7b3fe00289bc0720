/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { SignatureCoordinator } from "@multicustody/coordinator";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createAccountRoutes } from "./routes/account.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPendingRoutes, createReconcileRoutes } from "./routes/pending.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly coordinator: SignatureCoordinator;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Readiness probe. Default: always ready */
  readonly isReady?: () => boolean;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.isReady ?? (() => true)));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/pending", createPendingRoutes(options.coordinator));
  app.route("/api/v1/reconcile", createReconcileRoutes(options.coordinator));
  app.route("/api/v1/account", createAccountRoutes(options.coordinator));

  return { app };
}
