/**
 * @rightsline/money — Exact decimal arithmetic for royalty amounts.
 *
 * Design rules:
 * - All arithmetic uses bigint (no floating point)
 * - Amounts travel as decimal strings
 * - Rounding is half-up, applied once per derived amount
 * - Zero runtime dependencies
 */

export {
  parseAmount,
  formatAmount,
  parseDecimal,
  formatDecimal,
  addDecimal,
  subtractDecimal,
  sumDecimals,
  compareDecimal,
  minDecimal,
  maxDecimal,
  absDecimal,
  isZeroDecimal,
  isNegativeDecimal,
  isPositiveDecimal,
  normalizeDecimal,
  quantizeHalfUp,
  multiplyHalfUp,
} from "./money-math.js";

export { MoneyError } from "./types.js";
export type { MoneyErrorCode, ScaledDecimal } from "./types.js";
