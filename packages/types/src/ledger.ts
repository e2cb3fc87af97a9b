/**
 * Ledger Types
 *
 * The persisted spending ledger and its history items.
 *
 * Rules:
 * - All types are readonly; operations return new states
 * - Amounts are plain numbers (dollars), timestamps are epoch milliseconds
 * - Category keywords are stored case-folded
 */

/**
 * One committed spend.
 */
export interface HistoryItem {
  /** The scaled amount actually deducted (after the cringe factor) */
  readonly amount: number;

  /** Category keyword as given by the caller */
  readonly reason: string;

  /** Optional free-text note */
  readonly specific?: string | undefined;

  /** Creation time (epoch ms) */
  readonly time: number;
}

/** Category keyword → multiplier applied to spends in that category. */
export type CringeFactorTable = Readonly<Record<string, number>>;

/**
 * Undirected synonym adjacency: keyword → linked keywords.
 * Neighbour order is insertion order.
 */
export type SynonymTable = Readonly<Record<string, readonly string[]>>;

/**
 * The sole persisted aggregate.
 *
 * `balance` may go negative after a loan spend; `debt` is never negative.
 * The spendable figure once debt exists is `balance - debt`.
 */
export interface LedgerState {
  /** Document format marker */
  readonly version: number;

  /** Committed spends, oldest first */
  readonly history: readonly HistoryItem[];

  /** Undone spends, most recently undone last */
  readonly redoStack: readonly HistoryItem[];

  readonly balance: number;

  readonly debt: number;

  /** Accrual per day. Absent means the default rate. */
  readonly rate?: number | undefined;

  /** Last time accrual was applied (epoch ms) */
  readonly lastUpdated: number;

  readonly cringeFactors: CringeFactorTable;

  readonly synonyms: SynonymTable;
}
