/**
 * Property-Based Tests for @budgetme/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY ledger:
 *
 * 1. Accrual within the same local day leaves balance and debt alone
 * 2. Debt never grows and never goes negative under accrual
 * 3. redo(undo(L)) == L
 * 4. A spend one cent over the balance is refused without a loan and
 *    always goes negative with one
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { HistoryItem, LedgerState } from "@budgetme/types";
import { applyAccrual } from "../src/accrual.js";
import { garnish, redo, spend, undo } from "../src/history.js";
import { createLedger, ledgersEqual } from "../src/ledger.js";

// =============================================================================
// Arbitraries
// =============================================================================

const BASE = new Date(2024, 0, 15, 0, 0).getTime();

/** Whole-cent dollar amount in [min, max] dollars. */
function arbDollars(min: number, max: number): fc.Arbitrary<number> {
  return fc.integer({ min: min * 100, max: max * 100 }).map((cents) => cents / 100);
}

const arbItem: fc.Arbitrary<HistoryItem> = fc.record({
  amount: arbDollars(0, 500).filter((a) => a > 0),
  reason: fc.constantFrom("food", "rent", "games", "transit"),
  time: fc.integer({ min: BASE, max: BASE + 86_400_000 * 30 }),
});

const arbLedger: fc.Arbitrary<LedgerState> = fc
  .record({
    history: fc.array(arbItem, { maxLength: 6 }),
    redoStack: fc.array(arbItem, { maxLength: 3 }),
    balance: arbDollars(-1000, 1000),
    debt: arbDollars(0, 1000),
    rate: arbDollars(0, 50),
  })
  .map((fields) => ({ ...createLedger(BASE), ...fields }));

// =============================================================================
// Properties
// =============================================================================

describe("accrual properties", () => {
  it("is a no-op on balance and debt within the same day", () => {
    fc.assert(
      fc.property(arbLedger, fc.integer({ min: 0, max: 12 }), (ledger, hours) => {
        const later = new Date(2024, 0, 15, hours, 30).getTime();
        const { state } = applyAccrual(ledger, later);
        expect(state.balance).toBe(ledger.balance);
        expect(state.debt).toBe(ledger.debt);
      }),
    );
  });

  it("never increases debt and never makes it negative", () => {
    fc.assert(
      fc.property(arbLedger, fc.integer({ min: 0, max: 60 }), (ledger, days) => {
        const later = new Date(2024, 0, 15 + days, 10, 0).getTime();
        const { state } = applyAccrual(ledger, later);
        expect(state.debt).toBeLessThanOrEqual(ledger.debt);
        expect(state.debt).toBeGreaterThanOrEqual(0);
      }),
    );
  });
});

describe("history properties", () => {
  it("redo(undo(L)) equals L", () => {
    fc.assert(
      fc.property(
        arbLedger.filter((l) => l.history.length > 0),
        (ledger) => {
          const roundTrip = redo(undo(ledger).state).state;
          expect(ledgersEqual(roundTrip, ledger)).toBe(true);
        },
      ),
    );
  });

  it("refuses a spend one cent over the balance unless it is a loan", () => {
    fc.assert(
      fc.property(arbDollars(0, 1000), (balance) => {
        const ledger = { ...createLedger(BASE), balance };
        const amount = balance + 0.01;

        const refused = spend(ledger, { amount, reason: "food" });
        expect(refused.status).toBe("refused");
        expect(refused.state).toBe(ledger);

        const loaned = spend(ledger, { amount, reason: "food", loan: true });
        expect(loaned.status).toBe("spent");
        expect(loaned.state.balance).toBeLessThan(0);
      }),
    );
  });

  it("garnish leaves no negative balance and keeps the total balance", () => {
    fc.assert(
      fc.property(arbLedger, (ledger) => {
        const { state } = garnish(ledger);
        expect(state.balance).toBeGreaterThanOrEqual(0);
        expect(state.balance - state.debt).toBeCloseTo(ledger.balance - ledger.debt, 9);
      }),
    );
  });
});
