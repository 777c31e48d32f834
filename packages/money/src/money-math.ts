/**
 * @rightsline/money — Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain decimal strings (no exponents)
 * - Rounding is half-up (half away from zero), never half-even
 * - Zero runtime dependencies
 */

import { MoneyError } from "./types.js";
import type { ScaledDecimal } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Fixed precision ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const parsed = parseDecimal(amount);

  if (parsed.scale > decimals) {
    throw new MoneyError(
      "INVALID_PRECISION",
      `Amount "${amount.trim()}" has ${String(parsed.scale)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return parsed.value * 10n ** BigInt(decimals - parsed.scale);
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Arbitrary precision ─────────────────────────────────────────────────

/**
 * Parse a decimal string keeping every digit it carries.
 *
 * "0.0035" → { value: 35n, scale: 4 }
 */
export function parseDecimal(amount: string): ScaledDecimal {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");
  const value = BigInt(intPart + fracPart);

  return { value: negative ? -value : value, scale: fracPart.length };
}

export function formatDecimal(decimal: ScaledDecimal): string {
  return formatAmount(decimal.value, decimal.scale);
}

/** Raise a decimal to a larger scale without changing its value. */
function rescale(decimal: ScaledDecimal, scale: number): bigint {
  return decimal.value * 10n ** BigInt(scale - decimal.scale);
}

/**
 * Round a scaled value to a smaller scale, half away from zero.
 */
function roundHalfUp(value: bigint, fromScale: number, toScale: number): bigint {
  if (toScale >= fromScale) {
    return value * 10n ** BigInt(toScale - fromScale);
  }

  const divisor = 10n ** BigInt(fromScale - toScale);
  const negative = value < 0n;
  const abs = negative ? -value : value;
  let quotient = abs / divisor;
  if ((abs % divisor) * 2n >= divisor) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Add two decimals. The result carries the larger of the two scales.
 *
 * "6000.00" + "0.125" → "6000.125"
 */
export function addDecimal(a: string, b: string): string {
  const da = parseDecimal(a);
  const db = parseDecimal(b);
  const scale = Math.max(da.scale, db.scale);
  return formatAmount(rescale(da, scale) + rescale(db, scale), scale);
}

/**
 * Subtract b from a. The result carries the larger of the two scales.
 */
export function subtractDecimal(a: string, b: string): string {
  const da = parseDecimal(a);
  const db = parseDecimal(b);
  const scale = Math.max(da.scale, db.scale);
  return formatAmount(rescale(da, scale) - rescale(db, scale), scale);
}

/**
 * Sum a list of decimals, never returning fewer than `minScale` places.
 */
export function sumDecimals(amounts: readonly string[], minScale = 0): string {
  const parsed = amounts.map(parseDecimal);
  const scale = parsed.reduce((max, d) => Math.max(max, d.scale), minScale);
  let total = 0n;
  for (const d of parsed) {
    total += rescale(d, scale);
  }
  return formatAmount(total, scale);
}

/**
 * Compare two decimals by value. Returns -1, 0, or 1.
 *
 * "300" and "300.00" compare equal.
 */
export function compareDecimal(a: string, b: string): -1 | 0 | 1 {
  const da = parseDecimal(a);
  const db = parseDecimal(b);
  const scale = Math.max(da.scale, db.scale);
  const va = rescale(da, scale);
  const vb = rescale(db, scale);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function minDecimal(a: string, b: string): string {
  return compareDecimal(a, b) <= 0 ? a : b;
}

export function maxDecimal(a: string, b: string): string {
  return compareDecimal(a, b) >= 0 ? a : b;
}

export function absDecimal(amount: string): string {
  const d = parseDecimal(amount);
  return formatDecimal({ value: d.value < 0n ? -d.value : d.value, scale: d.scale });
}

export function isZeroDecimal(amount: string): boolean {
  return parseDecimal(amount).value === 0n;
}

export function isNegativeDecimal(amount: string): boolean {
  return parseDecimal(amount).value < 0n;
}

export function isPositiveDecimal(amount: string): boolean {
  return parseDecimal(amount).value > 0n;
}

/**
 * Strip redundant zeros: "00.700" → "0.7", "5.00" → "5", "-0.0" → "0".
 */
export function normalizeDecimal(amount: string): string {
  const d = parseDecimal(amount);
  let { value, scale } = d;
  while (scale > 0 && value % 10n === 0n) {
    value /= 10n;
    scale -= 1;
  }
  return formatDecimal({ value, scale });
}

/**
 * Round a decimal to `decimals` places, half away from zero.
 *
 * "0.005" → "0.01", "-0.005" → "-0.01", "2.5" (0 places) → "3"
 */
export function quantizeHalfUp(amount: string, decimals: number): string {
  assertPrecision(decimals);
  const d = parseDecimal(amount);
  return formatAmount(roundHalfUp(d.value, d.scale, decimals), decimals);
}

/**
 * Multiply an amount by a factor exactly, then round half-up once.
 *
 * multiplyHalfUp("10000.00", "0.70", 2) → "7000.00"
 * multiplyHalfUp("0.01", "0.5", 2) → "0.01"
 */
export function multiplyHalfUp(amount: string, factor: string, decimals: number): string {
  assertPrecision(decimals);
  const a = parseDecimal(amount);
  const f = parseDecimal(factor);
  const product = a.value * f.value;
  return formatAmount(roundHalfUp(product, a.scale + f.scale, decimals), decimals);
}

function assertPrecision(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new MoneyError(
      "INVALID_PRECISION",
      `Precision must be a non-negative integer, got: ${String(decimals)}`,
    );
  }
}
