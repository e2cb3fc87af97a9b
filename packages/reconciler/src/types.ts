/**
 * @budgetme/reconciler domain types.
 *
 * A reconciliation compares the ledger computed by this invocation
 * ("local") with whatever is persisted right now ("remote") and decides
 * whether overwriting remote with local would lose concurrent changes.
 */

// =============================================================================
// Status
// =============================================================================

/** Outcomes that allow the write. */
export type SafeStatus =
  | "identical"          // Nothing diverged
  | "undo-detected"      // Remote has one more entry: local undid it
  | "append-detected"    // Local has one more entry: a spend or redo
  | "configuration-only"; // Same history and total balance, settings differ

/** Outcomes that refuse the write. */
export type UnsafeStatus =
  | "diverged"           // History or redo stack sizes differ by more than two
  | "balance-mismatch"   // One-entry difference, but total balances disagree
  | "incompatible"       // Neither history is the other plus one entry
  | "unknown";           // No rule classified the difference

export type ReconciliationStatus = SafeStatus | UnsafeStatus;

// =============================================================================
// Report
// =============================================================================

export interface ReconciliationReport {
  /** Whether local may overwrite remote */
  readonly safe: boolean;
  readonly status: ReconciliationStatus;
  /** Human-readable explanation, suitable for logs */
  readonly message: string;
  readonly localHistoryLength: number;
  /** History length of the remote ledger after accrual */
  readonly remoteHistoryLength: number;
}

// =============================================================================
// Options
// =============================================================================

export interface ReconcileOptions {
  /** The instant local was accrued to; remote is accrued to the same instant */
  readonly now: number;
  /**
   * Rate to accrue remote with. Defaults to local's effective rate.
   * Pass the rate local was accrued with when local's rate was changed
   * after accrual.
   */
  readonly accrualRate?: number | undefined;
}

export interface ReconcilerConfig {
  /**
   * Largest history or redo-stack size difference that is still examined.
   * Larger differences are reported as "diverged".
   */
  readonly maxSizeDifference?: number | undefined;
}
