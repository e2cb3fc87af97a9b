/**
 * @budgetme/storage — Storage contract and errors.
 *
 * A provider persists exactly one ledger document. Every write replaces
 * the whole document; there is no versioning and no lock.
 */

import type { LedgerState } from "@budgetme/types";

/**
 * Where a ledger lives.
 */
export interface StorageProvider {
  /** Human-readable location, for messages and logs */
  readonly description: string;

  /**
   * Load the persisted ledger.
   *
   * @returns undefined when nothing has been written yet, or when the
   *   store could not be reached
   * @throws StorageError when a document exists but cannot be decoded
   */
  fetch(): Promise<LedgerState | undefined>;

  /**
   * Replace the persisted ledger.
   */
  store(state: LedgerState): Promise<void>;
}

export type StorageErrorCode =
  | "CORRUPT_DOCUMENT"
  | "UNSUPPORTED_VERSION"
  | "WRITE_FAILED";

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}
