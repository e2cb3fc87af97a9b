/**
 * @budgetme/cli — One invocation, start to finish.
 *
 *   load config → provider → fetch (or fresh ledger) → accrue once
 *   → execute → save config → provider (config may have changed)
 *   → re-fetch → reconcile → store, or refuse
 *
 * The store has no lock. The re-fetch just before the write, checked by
 * the Reconciler, is what keeps two invocations from silently
 * overwriting each other.
 */

import type { Logger } from "pino";
import type { LedgerState } from "@budgetme/types";
import { applyAccrual, createLedger, effectiveRate } from "@budgetme/ledger";
import { Reconciler, type ReconciliationReport } from "@budgetme/reconciler";
import { createProvider, type StorageConfig, type StorageProvider } from "@budgetme/storage";
import type { LedgerCommand } from "./args.js";
import { executeCommand } from "./commands.js";
import { loadBudgetConfig, saveBudgetConfig } from "./config.js";
import type { Printer } from "./printer.js";

export const REFUSAL_MESSAGE = "Refusing to overwrite unrelated histories";

export interface SessionOptions {
  readonly command: LedgerCommand;
  /** Directory holding config.json; also the default data directory */
  readonly configDirectory: string;
  readonly printer: Printer;
  readonly logger: Logger;
  readonly clock?: (() => number) | undefined;
  readonly providerFactory?: ((config: StorageConfig) => StorageProvider) | undefined;
  readonly reconciler?: Reconciler | undefined;
}

export type SessionResult =
  | { readonly status: "stored"; readonly exitCode: 0; readonly ledger: LedgerState }
  | { readonly status: "refused"; readonly exitCode: 0; readonly reason: string }
  | { readonly status: "rejected"; readonly exitCode: 1; readonly report: ReconciliationReport };

export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const { printer, logger } = options;
  const clock = options.clock ?? Date.now;
  const reconciler = options.reconciler ?? new Reconciler();
  const providerFor =
    options.providerFactory ?? ((storage: StorageConfig) => createProvider(storage, { logger }));

  const config = await loadBudgetConfig(options.configDirectory);
  const provider = providerFor(config.storage);
  logger.debug({ provider: provider.description }, "Storage provider selected");

  const now = clock();
  const loaded = (await provider.fetch()) ?? createLedger(now);
  const accrualRate = effectiveRate(loaded);
  const accrual = applyAccrual(loaded, now, accrualRate);
  logger.debug(
    { elapsedDays: accrual.elapsedDays, gross: accrual.gross, repaid: accrual.repaid },
    "Accrual applied",
  );

  const result = executeCommand(options.command, {
    ledger: accrual.state,
    config,
    now,
    printer,
    defaultDataDirectory: options.configDirectory,
  });
  if (result.status === "refused") {
    logger.info({ reason: result.reason }, "Command refused; nothing written");
    return { status: "refused", exitCode: 0, reason: result.reason };
  }

  await saveBudgetConfig(options.configDirectory, result.config);

  const target = providerFor(result.config.storage);
  if (target.description !== provider.description) {
    logger.debug({ provider: target.description }, "Storage provider changed");
  }
  const remote = (await target.fetch()) ?? createLedger(now);

  const report = reconciler.reconcile(result.ledger, remote, { now, accrualRate });
  if (!report.safe) {
    logger.error({ status: report.status, detail: report.message }, "Reconciliation failed");
    printer.error(report.message);
    printer.error(REFUSAL_MESSAGE);
    return { status: "rejected", exitCode: 1, report };
  }
  logger.debug({ status: report.status, detail: report.message }, "Reconciliation passed");

  await target.store(result.ledger);
  logger.info({ provider: target.description }, "Ledger stored");
  return { status: "stored", exitCode: 0, ledger: result.ledger };
}
