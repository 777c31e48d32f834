/**
 * Test helpers for @rightsline/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { RevenueRecord } from "@rightsline/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const FIXED_NOW = new Date("2026-01-15T12:00:00.000Z");

export const PERIOD = "Q4-2025";

/**
 * Create a test app with a fixed clock and silent logging.
 */
export function createTestApp(
  overrides: Partial<CreateAppOptions["serviceConfig"]> = {},
  logger?: Logger,
): AppInstance {
  return createApp({
    serviceConfig: {
      baseCurrency: "USD",
      payoutDecimals: 2,
      splitEpsilon: "0.001",
      expiryHorizonDays: 90,
      clock: () => FIXED_NOW,
      ...overrides,
    },
    logger,
  });
}

/** One parsed pino line. */
export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

export interface CapturedLogger {
  readonly logger: Logger;
  readonly lines: () => LogLine[];
}

/**
 * A pino logger at info level that keeps its JSON lines in memory.
 */
export function captureLogger(): CapturedLogger {
  const raw: string[] = [];
  const logger = pino({ level: "info" }, { write: (msg: string) => { raw.push(msg); } });
  return {
    logger,
    lines: () => raw.map((line) => JSON.parse(line) as LogLine),
  };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export function revenueRow(
  artist: string,
  revenue: string,
  extra: Partial<RevenueRecord> = {},
): RevenueRecord {
  return {
    artist,
    track: `${artist}-single`,
    platform: "spotify",
    country: "US",
    period: PERIOD,
    streams: 1000,
    revenue,
    ...extra,
  };
}

/**
 * Two artists with splits and advances, plus one artist without a split:
 *
 *   nova   10000.00 × 0.70, advance 7500.00 → net 0.00
 *   orbit    500.00 × 0.80, advance  100.00 → net 300.00
 *   ghost    120.00, no split → missing_split warning
 */
export async function seedQuarter(instance: AppInstance): Promise<readonly RevenueRecord[]> {
  const { app } = instance;
  await app.request(
    jsonRequest("/api/v1/shares/nova", "PUT", {
      fraction: "0.70",
      reason: "Signed contract",
      actor: "label-ops",
      provenance: "contract",
    }),
  );
  await app.request(
    jsonRequest("/api/v1/shares/orbit", "PUT", {
      fraction: "0.80",
      reason: "Ad-hoc deal",
      actor: "label-ops",
    }),
  );
  await app.request(
    jsonRequest("/api/v1/advances/nova", "PUT", { balance: "7500.00", actor: "finance" }),
  );
  await app.request(
    jsonRequest("/api/v1/advances/orbit", "PUT", { balance: "100.00", actor: "finance" }),
  );

  return [
    revenueRow("nova", "6000.00"),
    revenueRow("nova", "4000.00", { track: "nova-album", platform: "apple" }),
    revenueRow("orbit", "500.00"),
    revenueRow("ghost", "120.00"),
  ];
}
