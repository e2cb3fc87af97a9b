/**
 * @budgetme/ledger — Time-based accrual with debt garnishment.
 *
 * The balance grows by `rate` for every local calendar day that has
 * started since the last accrual. While debt is outstanding, up to half
 * of each accrual goes to repaying it.
 *
 * Call exactly once per loaded snapshot, before any other mutation.
 * A second call with a nonzero elapsed count applies the rate twice.
 */

import type { LedgerState } from "@budgetme/types";
import { effectiveRate } from "./ledger.js";
import { roundMoney } from "./money.js";
import type { AccrualResult } from "./types.js";
import { LedgerError } from "./types.js";

const MS_PER_DAY = 86_400_000;
const MS_PER_MINUTE = 60_000;

/**
 * Whole days since the epoch in the local time zone.
 * Two instants on the same local date map to the same day number.
 */
export function calendarDay(ms: number): number {
  const offsetMs = new Date(ms).getTimezoneOffset() * MS_PER_MINUTE;
  return Math.floor((ms - offsetMs) / MS_PER_DAY);
}

/**
 * Number of local calendar days between two instants.
 */
export function elapsedDays(from: number, to: number): number {
  return calendarDay(to) - calendarDay(from);
}

/**
 * Split an accrual between debt repayment and balance.
 *
 * - debt > gross/2 → half of gross repays debt, half reaches the balance
 * - otherwise → the debt is cleared and the remainder reaches the balance
 */
export function garnishAccrual(
  gross: number,
  debt: number,
): { readonly net: number; readonly repaid: number; readonly debt: number } {
  if (debt <= 0 || gross <= 0) {
    return { net: gross, repaid: 0, debt };
  }

  const half = roundMoney(gross / 2);
  if (debt > half) {
    return { net: roundMoney(gross - half), repaid: half, debt: roundMoney(debt - half) };
  }

  return { net: roundMoney(gross - debt), repaid: debt, debt: 0 };
}

/**
 * Advance a ledger to `now`.
 *
 * @param rate Accrual per day; defaults to the ledger's own rate
 * @throws LedgerError CLOCK_SKEW if `now` falls on an earlier local day
 *   than the ledger's last update
 */
export function applyAccrual(
  state: LedgerState,
  now: number = Date.now(),
  rate: number = effectiveRate(state),
): AccrualResult {
  const elapsed = elapsedDays(state.lastUpdated, now);
  if (elapsed < 0) {
    throw new LedgerError(
      "CLOCK_SKEW",
      `Clock is behind the stored ledger: last updated ${new Date(state.lastUpdated).toISOString()}, now ${new Date(now).toISOString()}`,
    );
  }

  if (elapsed === 0) {
    return { state: { ...state, lastUpdated: now }, elapsedDays: 0, gross: 0, repaid: 0 };
  }

  const gross = roundMoney(rate * elapsed);
  const { net, repaid, debt } = garnishAccrual(gross, state.debt);

  return {
    state: {
      ...state,
      balance: roundMoney(state.balance + net),
      debt,
      lastUpdated: now,
    },
    elapsedDays: elapsed,
    gross,
    repaid,
  };
}
