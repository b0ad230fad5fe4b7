/**
 * @ledgerline/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint at a fixed scale of
 * AMOUNT_SCALE fractional digits, so one scaled unit is 0.0001.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain decimal strings with at most AMOUNT_SCALE decimals
 * - Formatting shows at least 2 and at most AMOUNT_SCALE decimals
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** Fractional digits kept internally. */
export const AMOUNT_SCALE = 4;

const SCALE_FACTOR = 10n ** BigInt(AMOUNT_SCALE);

/** One cent in scaled units. */
export const CENT_UNITS = SCALE_FACTOR / 100n;

const MIN_DISPLAY_DECIMALS = 2;

// ─── Parse / Format ──────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by AMOUNT_SCALE.
 *
 * "100.50" → 1005000n
 * "-50" → -500000n
 * "0.0001" → 1n
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_SCALE) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_SCALE)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_SCALE, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1005000n → "100.50"
 * 123450n → "12.345"
 * -5n → "-0.0005"
 */
export function formatAmount(scaled: bigint): string {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(AMOUNT_SCALE + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_SCALE);
  let fracPart = str.slice(str.length - AMOUNT_SCALE);

  while (fracPart.length > MIN_DISPLAY_DECIMALS && fracPart.endsWith("0")) {
    fracPart = fracPart.slice(0, -1);
  }

  const result = `${intPart}.${fracPart}`;
  return negative ? `-${result}` : result;
}

/**
 * Canonical form of an amount string ("45" → "45.00").
 */
export function normalizeAmount(amount: string): string {
  return formatAmount(parseAmount(amount));
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addAmounts(a: string, b: string): string {
  return formatAmount(parseAmount(a) + parseAmount(b));
}

export function subtractAmounts(a: string, b: string): string {
  return formatAmount(parseAmount(a) - parseAmount(b));
}

export function negateAmount(amount: string): string {
  return formatAmount(-parseAmount(amount));
}

export function absAmount(amount: string): string {
  return formatAmount(absUnits(parseAmount(amount)));
}

export function sumAmounts(amounts: readonly string[]): string {
  return formatAmount(amounts.reduce((total, a) => total + parseAmount(a), 0n));
}

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isZeroAmount(amount: string): boolean {
  return parseAmount(amount) === 0n;
}

// ─── Scaled-unit helpers ─────────────────────────────────────────────────

export function absUnits(units: bigint): bigint {
  return units < 0n ? -units : units;
}

/**
 * Divide and round half away from zero.
 */
export function divideRounded(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  const negative = numerator < 0n !== denominator < 0n;
  const n = absUnits(numerator);
  const d = absUnits(denominator);
  const quotient = (n * 2n + d) / (d * 2n);
  return negative ? -quotient : quotient;
}

/**
 * Round scaled units to whole cents, half away from zero.
 */
export function roundToCents(units: bigint): bigint {
  return divideRounded(units, CENT_UNITS) * CENT_UNITS;
}

/**
 * Percentage of `part` in `whole`, truncated to two decimals.
 * Returns 0 when `whole` is not positive.
 */
export function percentOf(part: bigint, whole: bigint): number {
  if (whole <= 0n) return 0;
  return Number((part * 10_000n) / whole) / 100;
}
