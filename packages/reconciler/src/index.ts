/**
 * @budgetme/reconciler — Optimistic write reconciliation.
 *
 * Compares the ledger an invocation is about to write with the ledger
 * currently persisted, and accepts the write only when the difference
 * is explained by this invocation alone:
 * 1. Nothing diverged
 * 2. Local undid exactly the last remote entry
 * 3. Local added exactly one entry on top of remote
 * 4. Only settings differ
 *
 * Everything else is refused. Nothing is merged.
 */

export { Reconciler } from "./reconciler.js";

export type {
  SafeStatus,
  UnsafeStatus,
  ReconciliationStatus,
  ReconciliationReport,
  ReconcileOptions,
  ReconcilerConfig,
} from "./types.js";
