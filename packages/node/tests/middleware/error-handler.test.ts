/**
 * Tests for error handler middleware.
 *
 * Verifies errors are mapped to HTTP status codes by `code`
 * and rendered in the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { CoordinatorError } from "@multicustody/coordinator";
import { handleError } from "../../src/middleware/error-handler.js";
import { RequestValidationError } from "../../src/types/error.js";

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it.each([
    ["NOT_FOUND", 404],
    ["NOT_AUTHORIZED", 403],
    ["ALREADY_SIGNED", 409],
    ["INVALID_STATE", 409],
    ["QUORUM_NOT_MET", 409],
    ["EXPIRED", 410],
    ["INVALID_IMPORT", 400],
    ["ZERO_AMOUNT", 400],
    ["BROADCAST_REJECTED", 502],
  ] as const)("maps %s to %i", async (code, status) => {
    const res = await appThrowing(new CoordinatorError(code, "nope")).request("/boom");

    expect(res.status).toBe(status);
    const body: ErrorBody = await res.json();
    expect(body.error).toEqual({ code, message: "nope" });
  });

  it("passes details through", async () => {
    const err = new CoordinatorError("QUORUM_NOT_MET", "short", { signers: ["rA"], threshold: 2 });
    const res = await appThrowing(err).request("/boom");

    const body: ErrorBody = await res.json();
    expect(body.error.details).toEqual({ signers: ["rA"], threshold: 2 });
  });

  it("maps request validation errors to 400", async () => {
    const err = new RequestValidationError("Bad body", { issues: [] });
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "Bad body", details: { issues: [] } });
  });

  it("hides the message of unexpected errors", async () => {
    const res = await appThrowing(new Error("database password is test-secret")).request("/boom");

    expect(res.status).toBe(500);
    const body: ErrorBody = await res.json();
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });

  it("treats an unknown code as unexpected", async () => {
    const err = Object.assign(new Error("odd"), { code: "ENOENT" });
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(500);
  });
});
