/**
 * @budgetme/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Operations never mutate their input state
 * - Fatal precondition violations throw LedgerError
 * - User input errors come back as "refused" outcomes, never thrown
 */

import type { HistoryItem, LedgerState } from "@budgetme/types";

// ─── Defaults ────────────────────────────────────────────────────────────

/** Current persisted document format. */
export const LEDGER_VERSION = 1;

/** Balance of a freshly created ledger. */
export const DEFAULT_BALANCE = 10;

/** Accrual per day when the ledger carries no rate. */
export const DEFAULT_RATE = 5;

/** Multiplier for categories without a cringe factor. */
export const NEUTRAL_MULTIPLIER = 1;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "CLOCK_SKEW"
  | "NOTHING_TO_UNDO"
  | "NOTHING_TO_REDO"
  | "INVALID_AMOUNT"
  | "INVALID_RATE"
  | "INVALID_FACTOR"
  | "INVALID_KEYWORD";

/**
 * Structured error from the ledger engine.
 * Thrown only for fatal precondition violations.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Accrual ─────────────────────────────────────────────────────────────

/**
 * Result of advancing a ledger to a point in time.
 */
export interface AccrualResult {
  readonly state: LedgerState;
  /** Whole local calendar days since the last accrual */
  readonly elapsedDays: number;
  /** rate × elapsedDays, before garnishment */
  readonly gross: number;
  /** Portion of gross diverted to debt repayment */
  readonly repaid: number;
}

// ─── History Operations ──────────────────────────────────────────────────

/**
 * A spend request as given by the caller.
 */
export interface SpendRequest {
  /** Unscaled amount in dollars */
  readonly amount: number;
  /** Category keyword */
  readonly reason: string;
  readonly specific?: string | undefined;
  /** Allow the balance to go negative */
  readonly loan?: boolean | undefined;
  /** Creation time for the history item (epoch ms). Defaults to now. */
  readonly now?: number | undefined;
}

/** Why a spend was refused. */
export type SpendRefusal = "non-positive-amount" | "over-budget";

export type SpendOutcome =
  | {
      readonly status: "spent";
      readonly state: LedgerState;
      readonly item: HistoryItem;
      /** Cringe factor applied to the requested amount */
      readonly multiplier: number;
    }
  | {
      readonly status: "refused";
      readonly reason: SpendRefusal;
      /** The unchanged input state */
      readonly state: LedgerState;
    };

/**
 * Result of undo/redo: the new state and the item that moved between stacks.
 */
export interface StackMove {
  readonly state: LedgerState;
  readonly item: HistoryItem;
}

export type GarnishOutcome =
  | {
      readonly status: "garnished";
      readonly state: LedgerState;
      /** Magnitude moved from the balance into debt */
      readonly amount: number;
    }
  | {
      readonly status: "noop";
      readonly state: LedgerState;
    };
