/**
 * @budgetme/storage — Persisted document codec.
 *
 * The ledger is stored as one JSON document with snake_case fields:
 *
 *   {"version":1,"history":[{"amount":4,"reason":"food","specific":null,"time":1705309200000}],
 *    "redo_stack":[],"balance":6,"debt":0,"rate":5,"last_updated":1705309200000,
 *    "cringe_factors":{},"synonyms":{}}
 *
 * Documents written before debt, categories or versioning existed load
 * with defaults. A document declaring any other version is refused.
 */

import { z } from "zod";
import type { HistoryItem, LedgerState } from "@budgetme/types";
import { StorageError } from "./types.js";

/** Document versions this codec can read. */
export const SUPPORTED_VERSIONS: ReadonlySet<number> = new Set([1]);

/** Version assumed for documents that carry none. */
const LEGACY_VERSION = 1;

// =============================================================================
// Schema
// =============================================================================

const HistoryItemSchema = z.object({
  amount: z.number().finite(),
  reason: z.string(),
  specific: z.string().nullish(),
  time: z.number().int().nonnegative(),
});

export const LedgerDocumentSchema = z.object({
  version: z.number().int().default(LEGACY_VERSION),
  history: z.array(HistoryItemSchema),
  redo_stack: z.array(HistoryItemSchema).default([]),
  balance: z.number().finite(),
  debt: z.number().finite().nonnegative().default(0),
  rate: z.number().finite().nonnegative().nullish(),
  last_updated: z.number().int().nonnegative(),
  cringe_factors: z.record(z.number().finite().positive()).default({}),
  synonyms: z.record(z.array(z.string())).default({}),
});

export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

type HistoryItemDocument = z.infer<typeof HistoryItemSchema>;

// =============================================================================
// Decode
// =============================================================================

function toItem(doc: HistoryItemDocument): HistoryItem {
  return {
    amount: doc.amount,
    reason: doc.reason,
    ...(doc.specific !== null && doc.specific !== undefined ? { specific: doc.specific } : {}),
    time: doc.time,
  };
}

/**
 * Parse a persisted document.
 *
 * @throws StorageError CORRUPT_DOCUMENT for invalid JSON or shape
 * @throws StorageError UNSUPPORTED_VERSION for an unknown version
 */
export function decodeLedger(text: string): LedgerState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StorageError("CORRUPT_DOCUMENT", "Ledger document is not valid JSON", { cause: err });
  }

  const result = LedgerDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StorageError("CORRUPT_DOCUMENT", `Ledger document is malformed: ${issues}`, {
      cause: result.error,
    });
  }

  const doc = result.data;
  if (!SUPPORTED_VERSIONS.has(doc.version)) {
    throw new StorageError(
      "UNSUPPORTED_VERSION",
      `Ledger document version ${String(doc.version)} is not supported by this version of budgetme`,
    );
  }

  return {
    version: doc.version,
    history: doc.history.map(toItem),
    redoStack: doc.redo_stack.map(toItem),
    balance: doc.balance,
    debt: doc.debt,
    rate: doc.rate ?? undefined,
    lastUpdated: doc.last_updated,
    cringeFactors: doc.cringe_factors,
    synonyms: doc.synonyms,
  };
}

// =============================================================================
// Encode
// =============================================================================

function fromItem(item: HistoryItem): HistoryItemDocument {
  return {
    amount: item.amount,
    reason: item.reason,
    specific: item.specific ?? null,
    time: item.time,
  };
}

export function encodeLedger(state: LedgerState): string {
  const doc: LedgerDocument = {
    version: state.version,
    history: state.history.map(fromItem),
    redo_stack: state.redoStack.map(fromItem),
    balance: state.balance,
    debt: state.debt,
    rate: state.rate ?? null,
    last_updated: state.lastUpdated,
    cringe_factors: { ...state.cringeFactors },
    synonyms: Object.fromEntries(
      Object.entries(state.synonyms).map(([keyword, linked]) => [keyword, [...linked]]),
    ),
  };
  return JSON.stringify(doc);
}
