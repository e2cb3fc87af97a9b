/**
 * @budgetme/ledger — Ledger data model.
 *
 * The ledger is a plain readonly value. Every operation in this package
 * takes a LedgerState and returns a new one, so holding on to an earlier
 * state is the same as holding a clone of it.
 *
 * Invariants:
 * - debt >= 0
 * - totalBalance = balance - debt is the spendable figure
 * - history changes by exactly one item per spend/undo/redo
 */

import { canonicalize } from "json-canonicalize";
import type { HistoryItem, LedgerState } from "@budgetme/types";
import { DEFAULT_BALANCE, DEFAULT_RATE, LEDGER_VERSION, LedgerError } from "./types.js";

/**
 * Create a fresh ledger: balance 10, rate 5/day, empty history.
 */
export function createLedger(now: number = Date.now()): LedgerState {
  return {
    version: LEDGER_VERSION,
    history: [],
    redoStack: [],
    balance: DEFAULT_BALANCE,
    debt: 0,
    rate: DEFAULT_RATE,
    lastUpdated: now,
    cringeFactors: {},
    synonyms: {},
  };
}

/**
 * The accrual rate in effect, falling back to the default when unset.
 */
export function effectiveRate(state: LedgerState): number {
  return state.rate ?? DEFAULT_RATE;
}

/**
 * balance - debt.
 */
export function totalBalance(state: LedgerState): number {
  return state.balance - state.debt;
}

export function historyItemsEqual(a: HistoryItem, b: HistoryItem): boolean {
  return (
    a.amount === b.amount &&
    a.reason === b.reason &&
    (a.specific ?? undefined) === (b.specific ?? undefined) &&
    a.time === b.time
  );
}

/**
 * Item-by-item equality of two history sequences.
 */
export function historyEqual(
  a: readonly HistoryItem[],
  b: readonly HistoryItem[],
): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((item, i) => {
    const other = b[i];
    return other !== undefined && historyItemsEqual(item, other);
  });
}

/**
 * Canonical JSON of every field except lastUpdated.
 */
export function canonicalState(state: LedgerState): string {
  // Absent optionals become null so a missing key and an undefined one compare equal.
  const item = (i: HistoryItem) => ({
    amount: i.amount,
    reason: i.reason,
    specific: i.specific ?? null,
    time: i.time,
  });
  return canonicalize({
    version: state.version,
    history: state.history.map(item),
    redoStack: state.redoStack.map(item),
    balance: state.balance,
    debt: state.debt,
    rate: state.rate ?? null,
    cringeFactors: state.cringeFactors,
    synonyms: state.synonyms,
  });
}

/**
 * Structural equality of two ledgers, ignoring the accrual timestamp.
 */
export function ledgersEqual(a: LedgerState, b: LedgerState): boolean {
  return canonicalState(a) === canonicalState(b);
}

/**
 * Change the accrual rate. Takes effect from the next accrual.
 *
 * @throws LedgerError INVALID_RATE for negative or non-finite rates
 */
export function setRate(state: LedgerState, rate: number): LedgerState {
  if (!Number.isFinite(rate) || rate < 0) {
    throw new LedgerError("INVALID_RATE", `Rate must be a non-negative number, got ${String(rate)}`);
  }
  return { ...state, rate };
}
