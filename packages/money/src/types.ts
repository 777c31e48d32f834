/**
 * @rightsline/money — Error types.
 */

export type MoneyErrorCode = "INVALID_AMOUNT" | "INVALID_PRECISION";

/**
 * Structured error from decimal arithmetic.
 * Always thrown, never returned.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}

/**
 * A decimal value as an unscaled bigint and a scale.
 *
 * { value: 12345n, scale: 2 } is 123.45
 */
export interface ScaledDecimal {
  readonly value: bigint;
  readonly scale: number;
}
