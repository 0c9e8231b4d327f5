/**
 * @splitledger/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 * - Rounding is half-up and happens only when a share is finalized
 */

import type { Currency, Money } from "@splitledger/types";
import { LedgerError } from "./types.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Validate format: optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
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

/**
 * Build a Money value from a scaled bigint.
 */
export function toMoney(scaled: bigint, currency: Currency, decimals: number): Money {
  return {
    amount: formatAmount(scaled, decimals),
    currency,
    decimals,
  };
}

/**
 * Scaled bigint value of a Money amount.
 */
export function scaledOf(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * An exact rational number, used for percentages and expression results.
 */
export interface Ratio {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Divide with round-half-up (ties away from zero).
 *
 * roundHalfUp(10001n, 2n) → 5001n
 * roundHalfUp(-5n, 2n) → -3n
 */
export function roundHalfUp(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }

  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let quotient = n / d;
  const remainder = n % d;
  if (remainder * 2n >= d) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

/**
 * Parse a non-negative decimal string into an exact ratio.
 *
 * "43" → 43/1, "33.5" → 335/10
 */
export function parseRatio(text: string): Ratio {
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid ratio: "${text}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  return {
    numerator: BigInt(intPart + fracPart),
    denominator: 10n ** BigInt(fracPart.length),
  };
}

/**
 * Take `percent` percent of a Money amount, rounded half-up to the
 * currency's smallest unit.
 *
 * applyPercentage("2100.00", "43") → "903.00"
 * applyPercentage("100.01", "50") → "50.01"
 */
export function applyPercentage(money: Money, percent: string | Ratio): Money {
  const ratio = typeof percent === "string" ? parseRatio(percent) : percent;
  const scaled = scaledOf(money) * ratio.numerator;
  const rounded = roundHalfUp(scaled, ratio.denominator * 100n);
  return toMoney(rounded, money.currency, money.decimals);
}

/**
 * Parse user-facing currency text into a scaled bigint.
 *
 * Accepts "$1,234.50", "1234.5", "-$5.00" and accounting negatives "(12.50)".
 * Returns null for anything that is not an unambiguous amount.
 */
export function parseCurrencyText(text: string, decimals: number): bigint | null {
  let cleaned = text.trim().replace(/[$,\s]/g, "");
  if (cleaned === "" || cleaned === "-") {
    return null;
  }

  let negative = false;
  if (cleaned.startsWith("(") && cleaned.endsWith(")")) {
    negative = true;
    cleaned = cleaned.slice(1, -1);
  }
  if (cleaned.startsWith("-")) {
    negative = !negative;
    cleaned = cleaned.slice(1);
  }

  const match = /^(\d+)(?:\.(\d*))?$/.exec(cleaned);
  if (match === null) {
    return null;
  }

  const intPart = match[1] ?? "0";
  const fracPart = match[2] ?? "";
  if (fracPart.length > decimals) {
    return null;
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 * Throws LedgerError if they differ.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

/**
 * Add two Money values. They must have the same currency.
 */
export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return toMoney(scaledOf(a) + scaledOf(b), a.currency, a.decimals);
}

export function isPositive(money: Money): boolean {
  return scaledOf(money) > 0n;
}

export function isNegative(money: Money): boolean {
  return scaledOf(money) < 0n;
}

/**
 * Create a zero Money value for a given currency.
 */
export function zeroMoney(currency: Currency, decimals: number): Money {
  return toMoney(0n, currency, decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 * They must have the same currency.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = scaledOf(a);
  const vb = scaledOf(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Return the absolute value of a Money amount.
 */
export function absMoney(money: Money): Money {
  const scaled = scaledOf(money);
  return toMoney(scaled < 0n ? -scaled : scaled, money.currency, money.decimals);
}
