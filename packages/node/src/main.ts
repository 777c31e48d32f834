/**
 * @rightsline/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
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

  const { app } = createApp({
    serviceConfig: {
      baseCurrency: config.BASE_CURRENCY,
      payoutDecimals: config.PAYOUT_DECIMALS,
      splitEpsilon: config.SPLIT_EPSILON,
      expiryHorizonDays: config.EXPIRY_HORIZON_DAYS,
    },
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      currency: config.BASE_CURRENCY,
      payoutDecimals: config.PAYOUT_DECIMALS,
      splitEpsilon: config.SPLIT_EPSILON,
    },
    "Rightsline node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info("Shutdown complete");
    logger.flush();
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
