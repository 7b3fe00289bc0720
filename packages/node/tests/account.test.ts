/**
 * Tests for the account overview route.
 */

import { describe, it, expect } from "vitest";
import { Wallet } from "xrpl";
import type { AccountOverview } from "@multicustody/coordinator";
import { createApp } from "../src/app.js";
import { createTestApp } from "./setup.js";

interface DataBody<T> {
  data: T;
}

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("GET /api/v1/account", () => {
  it("reports the native balance and the signer list", async () => {
    const ctx = createTestApp();

    const res = await ctx.app.request("/api/v1/account");

    expect(res.status).toBe(200);
    const body: DataBody<AccountOverview> = await res.json();
    expect(body.data.balances).toEqual({ native: "75000000" });
    expect(body.data.asset).toBeUndefined();
    expect(body.data.threshold).toBe(2);
    expect(body.data.signerList).toEqual(ctx.gateway.roster.signers);
    expect(body.data.signer).toBe(ctx.gateway.roster.signers[0]?.address);
    expect(body.data.isSigner).toBe(true);
  });

  it("reports the balance of an issued asset", async () => {
    const ctx = createTestApp();
    const issuer = Wallet.generate().classicAddress;
    ctx.gateway.tokenBalances.set(`USD:${issuer}`, "1250000");

    const res = await ctx.app.request(`/api/v1/account?currency=USD&issuer=${issuer}`);

    expect(res.status).toBe(200);
    const body: DataBody<AccountOverview> = await res.json();
    expect(body.data.balances).toEqual({ native: "75000000", token: "1250000" });
    expect(body.data.asset).toEqual({ code: "USD", issuer });
  });

  it("reports a custodian that is not on the signer list", async () => {
    const ctx = createTestApp();
    const { app } = createApp({ coordinator: ctx.outsider });

    const res = await app.request("/api/v1/account");

    expect(res.status).toBe(200);
    const body: DataBody<AccountOverview> = await res.json();
    expect(body.data.isSigner).toBe(false);
  });

  it("returns 400 for a currency without an issuer", async () => {
    const ctx = createTestApp();

    const res = await ctx.app.request("/api/v1/account?currency=USD");

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "issuer", message: "currency and issuer go together" }],
    });
  });

  it("returns 400 for a malformed issuer", async () => {
    const ctx = createTestApp();

    const res = await ctx.app.request("/api/v1/account?currency=USD&issuer=rNotAnAddress");

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("INVALID_ADDRESS");
  });
});
