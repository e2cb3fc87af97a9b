/**
 * @budgetme/ledger — Spending ledger engine.
 *
 * Pure functions over a readonly LedgerState:
 * - Accrual of a daily rate, with half of each accrual garnished to debt
 * - Category cost scaling through cringe factors and synonym groups
 * - Spend / undo / redo / garnish over a two-stack history
 *
 * Design rules:
 * - No I/O
 * - Inputs are never mutated
 * - Fatal preconditions throw LedgerError; refusals are returned
 */

// Data model
export {
  createLedger,
  effectiveRate,
  totalBalance,
  setRate,
  historyItemsEqual,
  historyEqual,
  canonicalState,
  ledgersEqual,
} from "./ledger.js";

// Accrual
export {
  calendarDay,
  elapsedDays,
  garnishAccrual,
  applyAccrual,
} from "./accrual.js";

// Categories
export {
  normalizeKeyword,
  synonymGroup,
  effectiveMultiplier,
  setCringe,
  setSynonym,
} from "./categories.js";

// History
export { spend, undo, redo, garnish } from "./history.js";

// Money
export { roundMoney, formatDollars, parseAmount } from "./money.js";

// Types
export type {
  LedgerErrorCode,
  AccrualResult,
  SpendRequest,
  SpendRefusal,
  SpendOutcome,
  StackMove,
  GarnishOutcome,
} from "./types.js";

export {
  LedgerError,
  LEDGER_VERSION,
  DEFAULT_BALANCE,
  DEFAULT_RATE,
  NEUTRAL_MULTIPLIER,
} from "./types.js";
