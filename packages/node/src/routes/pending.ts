/**
 * Pending transaction routes.
 *
 * GET    /api/v1/pending                : List records (optional ?status=)
 * POST   /api/v1/pending                : Create, build and sign a transfer
 * POST   /api/v1/pending/import         : Import and merge an exported record
 * GET    /api/v1/pending/:id            : Get a single record
 * POST   /api/v1/pending/:id/sign       : Add the local custodian's signature
 * POST   /api/v1/pending/:id/broadcast  : Submit once quorum is met
 * GET    /api/v1/pending/:id/export     : Versioned JSON export
 * DELETE /api/v1/pending/:id            : Remove a local record
 */

import { Hono } from "hono";
import type { SignatureCoordinator } from "@multicustody/coordinator";
import type { AppEnv } from "../types/api-contract.js";
import { CreatePendingSchema, ImportPendingSchema, ListPendingQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createPendingRoutes(coordinator: SignatureCoordinator): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const { status } = validateQuery(c, ListPendingQuerySchema);
    const records = await coordinator.list(status);
    return c.json({ data: records });
  });

  routes.post("/", async (c) => {
    const body = await validateBody(c, CreatePendingSchema);
    const record = await coordinator.create({
      destination: body.destination,
      amount: body.amount,
      asset: body.asset.issuer !== undefined
        ? { code: body.asset.code, issuer: body.asset.issuer }
        : { code: body.asset.code },
      ...(body.description !== undefined ? { description: body.description } : {}),
    });
    return c.json({ data: record }, 201);
  });

  // Registered before /:id so "import" is not taken for an id
  routes.post("/import", async (c) => {
    const { blob } = await validateBody(c, ImportPendingSchema);
    const record = await coordinator.importAndMerge(blob);
    return c.json({ data: record });
  });

  routes.get("/:id", async (c) => {
    const id = c.req.param("id");
    const record = await coordinator.get(id);
    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Pending transaction ${id} not found`), 404);
    }
    return c.json({ data: record });
  });

  routes.post("/:id/sign", async (c) => {
    const record = await coordinator.sign(c.req.param("id"));
    return c.json({ data: record });
  });

  routes.post("/:id/broadcast", async (c) => {
    const record = await coordinator.broadcast(c.req.param("id"));
    return c.json({ data: record });
  });

  routes.get("/:id/export", async (c) => {
    const blob = await coordinator.export(c.req.param("id"));
    return c.body(blob, 200, { "Content-Type": "application/json" });
  });

  routes.delete("/:id", async (c) => {
    const id = c.req.param("id");
    const removed = await coordinator.delete(id);
    if (!removed) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Pending transaction ${id} not found`), 404);
    }
    return c.body(null, 204);
  });

  return routes;
}

/**
 * POST /api/v1/reconcile: Run one reconciliation pass now.
 */
export function createReconcileRoutes(coordinator: SignatureCoordinator): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const report = await coordinator.reconcile();
    return c.json({ data: report });
  });

  return routes;
}
