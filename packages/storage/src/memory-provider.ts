/**
 * @budgetme/storage — In-memory provider.
 *
 * Holds the encoded document in a string, so every fetch decodes a fresh
 * copy the way a real store would. Suitable for tests.
 */

import type { LedgerState } from "@budgetme/types";
import { decodeLedger, encodeLedger } from "./codec.js";
import type { StorageProvider } from "./types.js";

export class InMemoryProvider implements StorageProvider {
  readonly description = "in-memory store";
  private _document: string | undefined;
  private _writes = 0;

  constructor(initial?: LedgerState) {
    this._document = initial === undefined ? undefined : encodeLedger(initial);
  }

  async fetch(): Promise<LedgerState | undefined> {
    return this._document === undefined ? undefined : decodeLedger(this._document);
  }

  async store(state: LedgerState): Promise<void> {
    this._document = encodeLedger(state);
    this._writes += 1;
  }

  /** Number of completed writes. */
  get writes(): number {
    return this._writes;
  }

  /** The raw persisted document, if any. */
  get document(): string | undefined {
    return this._document;
  }
}
