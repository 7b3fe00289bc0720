/**
 * @multicustody/node: Entry point.
 *
 * Loads config, connects to the ledger, opens the pending store,
 * starts the HTTP server and the reconcile timer, and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import {
  FilePendingStore,
  SignatureCoordinator,
  XrplGateway,
  XrplWalletSigner,
  createXrplPayloadCodec,
} from "@multicustody/coordinator";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const gateway = new XrplGateway({
    url: config.XRPL_URL,
    decimals: config.TOKEN_DECIMALS,
    ...(config.FEE_DROPS !== undefined ? { feeDrops: config.FEE_DROPS } : {}),
  });
  await gateway.connect();
  logger.info({ url: config.XRPL_URL }, "Connected to ledger");

  const store = await FilePendingStore.open(config.STORE_PATH);
  const signer = XrplWalletSigner.fromSeed(config.SIGNER_SEED);

  const coordinator = new SignatureCoordinator({
    account: config.MULTISIG_ACCOUNT,
    gateway,
    codec: createXrplPayloadCodec({ decimals: config.TOKEN_DECIMALS }),
    signer,
    store,
    logger: logger.child({ component: "coordinator" }),
    expiryWindowMs: config.EXPIRY_WINDOW_MS,
  });

  const { app } = createApp({
    coordinator,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    isReady: () => gateway.isConnected(),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, account: config.MULTISIG_ACCOUNT, signer: signer.address },
    "Custodian node started",
  );

  const timer = setInterval(() => {
    coordinator.reconcile().catch((err: unknown) => {
      logger.error({ err }, "Reconcile pass failed");
    });
  }, config.RECONCILE_INTERVAL_MS);

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    clearInterval(timer);
    server.close();
    await gateway.disconnect();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
