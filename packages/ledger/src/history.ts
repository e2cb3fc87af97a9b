/**
 * @budgetme/ledger — Spend / undo / redo / garnish.
 *
 * A two-stack undo model over the ledger's history and redo stack.
 * Each operation keeps `balance_after = balance_before - item.amount`
 * for the item it moves, so an undo/redo pair is balance-neutral.
 *
 * A new spend leaves the redo stack as it is.
 */

import type { HistoryItem, LedgerState } from "@budgetme/types";
import { effectiveMultiplier } from "./categories.js";
import { roundMoney } from "./money.js";
import type { GarnishOutcome, SpendOutcome, SpendRequest, StackMove } from "./types.js";
import { LedgerError } from "./types.js";

/** Binary floating-point noise in `amount * multiplier`, far below a cent. */
const FLOAT_TOLERANCE = 1e-9;

/**
 * Record a spend scaled by its category's cringe factor.
 *
 * Refused (state unchanged) when the scaled amount is not positive once
 * rounded to cents, or when the balance would go negative without `loan`.
 * The recorded amount is rounded to cents.
 */
export function spend(state: LedgerState, request: SpendRequest): SpendOutcome {
  if (!Number.isFinite(request.amount) || request.amount <= 0) {
    return { status: "refused", reason: "non-positive-amount", state };
  }

  const multiplier = effectiveMultiplier(state, request.reason);
  const exact = request.amount * multiplier;
  const scaled = roundMoney(exact);
  if (scaled <= 0) {
    return { status: "refused", reason: "non-positive-amount", state };
  }

  // Checked before rounding, so a fraction of a cent over is still over.
  if (state.balance - exact < -FLOAT_TOLERANCE && request.loan !== true) {
    return { status: "refused", reason: "over-budget", state };
  }
  const balance = roundMoney(state.balance - scaled);

  const item: HistoryItem = {
    amount: scaled,
    reason: request.reason,
    ...(request.specific !== undefined ? { specific: request.specific } : {}),
    time: request.now ?? Date.now(),
  };

  return {
    status: "spent",
    state: { ...state, history: [...state.history, item], balance },
    item,
    multiplier,
  };
}

/**
 * Move the latest spend onto the redo stack and refund it.
 *
 * @throws LedgerError NOTHING_TO_UNDO when history is empty
 */
export function undo(state: LedgerState): StackMove {
  const item = state.history.at(-1);
  if (item === undefined) {
    throw new LedgerError("NOTHING_TO_UNDO", "Nothing to undo: history is empty");
  }

  return {
    state: {
      ...state,
      history: state.history.slice(0, -1),
      redoStack: [...state.redoStack, item],
      balance: roundMoney(state.balance + item.amount),
    },
    item,
  };
}

/**
 * Re-apply the most recently undone spend.
 *
 * @throws LedgerError NOTHING_TO_REDO when the redo stack is empty
 */
export function redo(state: LedgerState): StackMove {
  const item = state.redoStack.at(-1);
  if (item === undefined) {
    throw new LedgerError("NOTHING_TO_REDO", "Nothing to redo: redo stack is empty");
  }

  return {
    state: {
      ...state,
      history: [...state.history, item],
      redoStack: state.redoStack.slice(0, -1),
      balance: roundMoney(state.balance - item.amount),
    },
    item,
  };
}

/**
 * Convert a negative balance into debt, leaving the balance at zero.
 * No-op when the balance is not negative.
 */
export function garnish(state: LedgerState): GarnishOutcome {
  if (state.balance >= 0) {
    return { status: "noop", state };
  }

  const amount = -state.balance;
  return {
    status: "garnished",
    state: { ...state, balance: 0, debt: roundMoney(state.debt + amount) },
    amount,
  };
}
