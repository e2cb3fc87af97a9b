/**
 * @budgetme/ledger — Dollar arithmetic and formatting.
 *
 * Amounts are plain numbers in dollars. Every stored amount is rounded
 * to whole cents, which keeps sums and differences of stored amounts
 * exact: (b + a) - a === b for any two rounded amounts.
 */

import { LedgerError } from "./types.js";

/**
 * Round to the nearest cent.
 *
 * 12.345 → 12.35, 0.1 + 0.2 → 0.3
 */
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Format dollars with two decimals and the sign in front.
 *
 * 12.5 → "$12.50", -3 → "-$3.00"
 */
export function formatDollars(amount: number): string {
  const sign = amount < 0 ? "-" : "";
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

/**
 * Parse a user-supplied decimal number ("12", "4.50", "-3", "$7.25").
 *
 * @throws LedgerError INVALID_AMOUNT if the text is not a finite number
 */
export function parseAmount(text: string): number {
  const trimmed = text.trim().replace(/^\$/, "");
  if (!/^-?(\d+(\.\d*)?|\.\d+)$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Not a number: "${text}"`);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Not a finite number: "${text}"`);
  }
  return value;
}
