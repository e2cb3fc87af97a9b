/**
 * @budgetme/types — Shared domain types for the budgetme stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  HistoryItem,
  CringeFactorTable,
  SynonymTable,
  LedgerState,
} from "./ledger.js";
