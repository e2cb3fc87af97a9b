/**
 * Property-Based Tests for @budgetme/reconciler
 *
 * 1. Any ledger reconciles with itself once both sides are accrued to
 *    the same instant
 * 2. A single undo on top of any non-empty ledger is always accepted
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { HistoryItem, LedgerState } from "@budgetme/types";
import { applyAccrual, createLedger, undo } from "@budgetme/ledger";
import { Reconciler } from "../src/reconciler.js";

const BASE = new Date(2024, 0, 15, 8, 0).getTime();

function arbDollars(min: number, max: number): fc.Arbitrary<number> {
  return fc.integer({ min: min * 100, max: max * 100 }).map((cents) => cents / 100);
}

const arbItem: fc.Arbitrary<HistoryItem> = fc.record({
  amount: arbDollars(0, 200).filter((a) => a > 0),
  reason: fc.constantFrom("food", "rent", "games"),
  time: fc.integer({ min: BASE - 86_400_000 * 10, max: BASE }),
});

const arbLedger: fc.Arbitrary<LedgerState> = fc
  .record({
    history: fc.array(arbItem, { maxLength: 5 }),
    redoStack: fc.array(arbItem, { maxLength: 2 }),
    balance: arbDollars(-500, 500),
    debt: arbDollars(0, 500),
    rate: arbDollars(0, 20),
  })
  .map((fields) => ({ ...createLedger(BASE), ...fields }));

const reconciler = new Reconciler();

describe("reconciliation properties", () => {
  it("accepts any ledger against itself after accrual", () => {
    fc.assert(
      fc.property(arbLedger, fc.integer({ min: 0, max: 30 }), (ledger, days) => {
        const now = new Date(2024, 0, 15 + days, 20, 0).getTime();
        const local = applyAccrual(ledger, now).state;

        const report = reconciler.reconcile(local, ledger, { now });
        expect(report.safe).toBe(true);
        expect(report.status).toBe("identical");
      }),
    );
  });

  it("accepts a single undo", () => {
    fc.assert(
      fc.property(
        arbLedger.filter((l) => l.history.length > 0 && l.redoStack.length < 2),
        (ledger) => {
          const now = new Date(2024, 0, 15, 20, 0).getTime();
          const local = undo(applyAccrual(ledger, now).state).state;

          expect(reconciler.verify(local, ledger, { now })).toBe(true);
        },
      ),
    );
  });
});
