/**
 * Reconciler — pre-write optimistic concurrency check.
 *
 * Decides whether the ledger computed by this invocation may overwrite
 * the one currently persisted. There is no lock on the store: the
 * persisted ledger is fetched again just before the write and compared
 * with the local one.
 *
 * Only single-entry divergences are accepted, and only when the total
 * balances account for the missing or extra entry. Anything else is
 * refused; nothing is ever merged.
 *
 * Usage:
 *   const reconciler = new Reconciler();
 *   const report = reconciler.reconcile(local, remote, { now });
 *   if (report.safe) await provider.store(local);
 */

import type { HistoryItem, LedgerState } from "@budgetme/types";
import {
  applyAccrual,
  effectiveRate,
  formatDollars,
  historyEqual,
  ledgersEqual,
  roundMoney,
  totalBalance,
} from "@budgetme/ledger";
import type {
  ReconcileOptions,
  ReconcilerConfig,
  ReconciliationReport,
  ReconciliationStatus,
} from "./types.js";

const DEFAULT_MAX_SIZE_DIFFERENCE = 2;

const SAFE_STATUSES = new Set<ReconciliationStatus>([
  "identical",
  "undo-detected",
  "append-detected",
  "configuration-only",
]);

/**
 * If `longer` is `shorter` plus one trailing item, return that item.
 */
function trailingExtra(
  longer: readonly HistoryItem[],
  shorter: readonly HistoryItem[],
): HistoryItem | undefined {
  if (longer.length !== shorter.length + 1) {
    return undefined;
  }
  return historyEqual(longer.slice(0, -1), shorter) ? longer.at(-1) : undefined;
}

function sameTotal(a: number, b: number): boolean {
  return roundMoney(a) === roundMoney(b);
}

export class Reconciler {
  private readonly maxSizeDifference: number;

  constructor(config: ReconcilerConfig = {}) {
    this.maxSizeDifference = config.maxSizeDifference ?? DEFAULT_MAX_SIZE_DIFFERENCE;
  }

  /**
   * Compare local against remote and classify the difference.
   *
   * Remote is first given local's rate and accrued to `options.now`, so
   * both sides describe the same instant.
   *
   * @throws LedgerError CLOCK_SKEW if remote was last updated on a later
   *   local day than `options.now`
   */
  reconcile(
    local: LedgerState,
    remote: LedgerState,
    options: ReconcileOptions,
  ): ReconciliationReport {
    const rate = options.accrualRate ?? effectiveRate(local);
    const aligned = applyAccrual({ ...remote, rate: local.rate }, options.now, rate).state;

    const report = (status: ReconciliationStatus, message: string): ReconciliationReport => ({
      safe: SAFE_STATUSES.has(status),
      status,
      message,
      localHistoryLength: local.history.length,
      remoteHistoryLength: aligned.history.length,
    });

    if (ledgersEqual(local, aligned)) {
      return report("identical", "Local and remote ledgers match");
    }

    const historyGap = Math.abs(aligned.history.length - local.history.length);
    const redoGap = Math.abs(aligned.redoStack.length - local.redoStack.length);
    if (historyGap > this.maxSizeDifference || redoGap > this.maxSizeDifference) {
      return report(
        "diverged",
        `Histories diverge by more than ${String(this.maxSizeDifference)} entries (history ${String(historyGap)}, redo ${String(redoGap)})`,
      );
    }

    if (aligned.history.length > local.history.length) {
      const removed = trailingExtra(aligned.history, local.history);
      if (removed === undefined) {
        return report("incompatible", "Histories are incompatible");
      }
      const expected = totalBalance({ ...aligned, balance: aligned.balance + removed.amount });
      const found = totalBalance(local);
      return sameTotal(expected, found)
        ? report("undo-detected", `Local undid "${removed.reason}" (${formatDollars(removed.amount)})`)
        : report(
            "balance-mismatch",
            `Local is missing an entry but balances disagree (expected ${formatDollars(expected)}, found ${formatDollars(found)})`,
          );
    }

    if (local.history.length > aligned.history.length) {
      const added = trailingExtra(local.history, aligned.history);
      if (added === undefined) {
        return report("incompatible", "Histories are incompatible");
      }
      const expected = totalBalance({ ...aligned, balance: aligned.balance - added.amount });
      const found = totalBalance(local);
      return sameTotal(expected, found)
        ? report("append-detected", `Local added "${added.reason}" (${formatDollars(added.amount)})`)
        : report(
            "balance-mismatch",
            `Local has a new entry but balances disagree (expected ${formatDollars(expected)}, found ${formatDollars(found)})`,
          );
    }

    // Same length from here on: any difference in entries is a concurrent edit.
    if (!historyEqual(local.history, aligned.history)) {
      return report("incompatible", "Histories are incompatible");
    }

    if (sameTotal(totalBalance(local), totalBalance(aligned))) {
      return report("configuration-only", "Only settings differ");
    }

    return report("unknown", "Unknown verification failure");
  }

  /**
   * Whether local may overwrite remote.
   */
  verify(local: LedgerState, remote: LedgerState, options: ReconcileOptions): boolean {
    return this.reconcile(local, remote, options).safe;
  }
}
