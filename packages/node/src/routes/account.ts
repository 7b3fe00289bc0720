/**
 * Account overview route.
 *
 * GET /api/v1/account : Balances and signer list of the multisig account
 *                       (optional ?currency=&issuer= for an issued asset)
 */

import { Hono } from "hono";
import type { SignatureCoordinator } from "@multicustody/coordinator";
import type { AppEnv } from "../types/api-contract.js";
import { AccountQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createAccountRoutes(coordinator: SignatureCoordinator): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const { currency, issuer } = validateQuery(c, AccountQuerySchema);
    const overview = await coordinator.accountInfo(
      currency !== undefined && issuer !== undefined ? { code: currency, issuer } : undefined,
    );
    return c.json({ data: overview });
  });

  return routes;
}
