/**
 * @budgetme/ledger — Category cost scaling.
 *
 * Spends are scaled by a per-category "cringe factor". Keywords linked
 * through the synonym graph share one factor.
 *
 * Resolution is deterministic: the group is walked breadth-first from the
 * queried keyword (neighbours in insertion order) and the first keyword
 * carrying a factor wins.
 */

import type { LedgerState } from "@budgetme/types";
import { LedgerError, NEUTRAL_MULTIPLIER } from "./types.js";

/**
 * Case-fold a category keyword for storage and lookup.
 */
export function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase();
}

function requireKeyword(keyword: string): string {
  const normalized = normalizeKeyword(keyword);
  if (normalized === "") {
    throw new LedgerError("INVALID_KEYWORD", "Category keyword must not be empty");
  }
  return normalized;
}

function ownValue<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * The keyword followed by every keyword reachable through synonyms.
 */
export function synonymGroup(state: LedgerState, keyword: string): readonly string[] {
  const start = normalizeKeyword(keyword);
  const seen = new Set<string>([start]);
  const order: string[] = [start];

  for (let i = 0; i < order.length; i++) {
    const current = order[i];
    if (current === undefined) break;
    for (const next of ownValue(state.synonyms, current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        order.push(next);
      }
    }
  }

  return order;
}

/**
 * Multiplier applied to spends in `category`. 1 when no factor is set
 * anywhere in the category's synonym group.
 */
export function effectiveMultiplier(state: LedgerState, category: string): number {
  for (const keyword of synonymGroup(state, category)) {
    const factor = ownValue(state.cringeFactors, keyword);
    if (factor !== undefined) {
      return factor;
    }
  }
  return NEUTRAL_MULTIPLIER;
}

/**
 * Set the cringe factor for a keyword.
 *
 * If members of the keyword's synonym group already carry factors, all
 * of them are overwritten; otherwise the factor is stored on the keyword.
 */
export function setCringe(state: LedgerState, keyword: string, factor: number): LedgerState {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new LedgerError(
      "INVALID_FACTOR",
      `Cringe factor must be a positive number, got ${String(factor)}`,
    );
  }
  const normalized = requireKeyword(keyword);

  const carriers = synonymGroup(state, normalized).filter(
    (k) => ownValue(state.cringeFactors, k) !== undefined,
  );
  const targets = carriers.length > 0 ? carriers : [normalized];

  const cringeFactors: Record<string, number> = { ...state.cringeFactors };
  for (const target of targets) {
    cringeFactors[target] = factor;
  }

  return { ...state, cringeFactors };
}

/**
 * Link two keywords as synonyms (undirected).
 */
export function setSynonym(state: LedgerState, a: string, b: string): LedgerState {
  const left = requireKeyword(a);
  const right = requireKeyword(b);
  if (left === right) {
    return state;
  }

  const synonyms: Record<string, readonly string[]> = { ...state.synonyms };
  const link = (from: string, to: string): void => {
    const existing = ownValue(synonyms, from) ?? [];
    if (!existing.includes(to)) {
      synonyms[from] = [...existing, to];
    }
  };
  link(left, right);
  link(right, left);

  return { ...state, synonyms };
}
