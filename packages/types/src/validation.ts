/**
 * Shared Validation
 *
 * Input checks applied identically by the approval automaton and the
 * signature coordinator.
 *
 * Rules:
 * - Amounts are bigint internally; decimal strings only at the edges
 * - No floating-point operations
 * - Zero runtime dependencies
 */

import type { CustodianRoster, ErrorKind, SignerEntry } from "./custody.js";

// =============================================================================
// Errors
// =============================================================================

export type ValidationErrorCode =
  | "ZERO_ADDRESS"
  | "ZERO_AMOUNT"
  | "INVALID_AMOUNT"
  | "INVALID_ROSTER"
  | "DUPLICATE_SIGNER"
  | "INVALID_THRESHOLD";

export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  public readonly kind: ErrorKind = "validation";

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

// =============================================================================
// Addresses
// =============================================================================

/** XRPL ACCOUNT_ZERO: the address encoding of twenty zero bytes. */
export const XRPL_ACCOUNT_ZERO = "rrrrrrrrrrrrrrrrrrrrrhoLvTp";

/**
 * True for the empty string and for every encoding of the all-zero account
 * this stack recognises (hex with or without 0x, XRPL ACCOUNT_ZERO).
 */
export function isZeroAddress(address: string): boolean {
  const trimmed = address.trim();
  if (trimmed.length === 0) return true;
  if (trimmed === XRPL_ACCOUNT_ZERO) return true;

  const hex = trimmed.startsWith("0x") || trimmed.startsWith("0X")
    ? trimmed.slice(2)
    : trimmed;
  return /^0+$/.test(hex);
}

export function assertNonZeroAddress(address: string, field = "address"): void {
  if (isZeroAddress(address)) {
    throw new ValidationError("ZERO_ADDRESS", `${field} must not be the zero address`);
  }
}

// =============================================================================
// Amounts
// =============================================================================

/**
 * Assert that an amount is a strictly positive integer and return it as a
 * bigint. Strings must be plain base-10 digits.
 */
export function assertPositiveAmount(amount: bigint | string): bigint {
  let value: bigint;
  if (typeof amount === "bigint") {
    value = amount;
  } else {
    const trimmed = amount.trim();
    if (!/^-?\d+$/.test(trimmed)) {
      throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
    }
    value = BigInt(trimmed);
  }

  if (value === 0n) {
    throw new ValidationError("ZERO_AMOUNT", "Amount must be greater than zero");
  }
  if (value < 0n) {
    throw new ValidationError("INVALID_AMOUNT", `Amount must be positive, got ${value.toString()}`);
  }
  return value;
}

/**
 * Parse a decimal string into smallest units.
 *
 * "100.5" with decimals=6 → 100500000n
 * "0.000001" with decimals=6 → 1n
 */
export function parseUnits(value: string, decimals: number): bigint {
  const trimmed = value.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${value}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const scaled = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -scaled : scaled;
}

/**
 * Render smallest units as a decimal string without trailing zeros.
 *
 * 100500000n with decimals=6 → "100.5"
 * 100000000n with decimals=6 → "100"
 */
export function formatUnits(scaled: bigint, decimals: number): string {
  const negative = scaled < 0n;
  const abs = (negative ? -scaled : scaled).toString();
  if (decimals === 0) {
    return negative ? `-${abs}` : abs;
  }

  const padded = abs.padStart(decimals + 1, "0");
  const intPart = padded.slice(0, padded.length - decimals);
  const fracPart = padded.slice(padded.length - decimals).replace(/0+$/, "");
  const result = fracPart.length > 0 ? `${intPart}.${fracPart}` : intPart;

  return negative ? `-${result}` : result;
}

// =============================================================================
// Roster
// =============================================================================

/**
 * Build a roster from addresses (unit weight) or weighted entries.
 *
 * Rejects an empty roster, zero addresses, duplicates, non-positive weights
 * and a threshold outside `1..totalWeight`. Order is preserved.
 */
export function validateRoster(
  entries: readonly (string | SignerEntry)[],
  threshold: number,
): CustodianRoster {
  if (entries.length === 0) {
    throw new ValidationError("INVALID_ROSTER", "Roster must contain at least one custodian");
  }

  const seen = new Set<string>();
  const signers: SignerEntry[] = [];
  let totalWeight = 0;

  for (const entry of entries) {
    const signer: SignerEntry = typeof entry === "string"
      ? { address: entry, weight: 1 }
      : { address: entry.address, weight: entry.weight };

    assertNonZeroAddress(signer.address, "custodian");
    if (!Number.isInteger(signer.weight) || signer.weight < 1) {
      throw new ValidationError(
        "INVALID_ROSTER",
        `Custodian ${signer.address} has invalid weight ${String(signer.weight)}`,
      );
    }
    if (seen.has(signer.address)) {
      throw new ValidationError("DUPLICATE_SIGNER", `Duplicate custodian: ${signer.address}`);
    }

    seen.add(signer.address);
    signers.push(signer);
    totalWeight += signer.weight;
  }

  if (!Number.isInteger(threshold) || threshold < 1 || threshold > totalWeight) {
    throw new ValidationError(
      "INVALID_THRESHOLD",
      `Threshold must be an integer between 1 and ${String(totalWeight)}, got ${String(threshold)}`,
    );
  }

  return { signers, threshold };
}
