/**
 * @rightsline/royalty — Error types.
 *
 * Only caller-correctable range violations and missing wiring are
 * thrown. Missing splits, discrepancies and mismatches are returned
 * as data.
 */

export type RoyaltyErrorCode =
  | "OUT_OF_RANGE"
  | "CONFIGURATION_MISSING"
  | "INVALID_RECORD"
  | "ALREADY_SETTLED";

export class RoyaltyError extends Error {
  public readonly code: RoyaltyErrorCode;

  constructor(code: RoyaltyErrorCode, message: string) {
    super(message);
    this.name = "RoyaltyError";
    this.code = code;
  }
}

/** A share fraction outside [0, 1] or a negative/malformed advance balance. */
export class OutOfRangeError extends RoyaltyError {
  constructor(message: string) {
    super("OUT_OF_RANGE", message);
    this.name = "OutOfRangeError";
  }
}

/** An operation needs a collaborator that was not wired into the engine. */
export class ConfigurationMissingError extends RoyaltyError {
  constructor(collaborator: string) {
    super("CONFIGURATION_MISSING", `${collaborator} is not configured`);
    this.name = "ConfigurationMissingError";
  }
}
