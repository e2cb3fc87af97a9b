/**
 * End-to-end session tests: configuration on disk, ledgers in memory.
 *
 * Verifies:
 * - Fresh start, accrual, spend, undo across invocations
 * - Refused commands write nothing
 * - A concurrent write is detected and nothing is overwritten
 * - Settings changes reach the right store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { LedgerState } from "@budgetme/types";
import { LedgerError, createLedger } from "@budgetme/ledger";
import { InMemoryProvider, type StorageConfig, type StorageProvider } from "@budgetme/storage";
import type { LedgerCommand } from "../src/args.js";
import { CONFIG_FILE_NAME } from "../src/config.js";
import { REFUSAL_MESSAGE, runSession } from "../src/session.js";
import { T0, recordingPrinter, silentLogger, type RecordingPrinter } from "./helpers.js";

const T3 = new Date(2024, 0, 18, 9, 0).getTime();
const T3_LATER = new Date(2024, 0, 18, 10, 0).getTime();

/** Returns the queued ledgers from successive fetches and records writes. */
class ScriptedProvider implements StorageProvider {
  readonly description = "scripted store";
  readonly stored: LedgerState[] = [];

  constructor(private readonly fetches: (LedgerState | undefined)[]) {}

  async fetch(): Promise<LedgerState | undefined> {
    return this.fetches.shift();
  }

  async store(state: LedgerState): Promise<void> {
    this.stored.push(state);
  }
}

let configDirectory: string;
let local: InMemoryProvider;
let remote: InMemoryProvider;

beforeEach(() => {
  configDirectory = join(tmpdir(), `budgetme-session-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(configDirectory, { recursive: true });
  local = new InMemoryProvider();
  remote = new InMemoryProvider();
});

afterEach(() => {
  rmSync(configDirectory, { recursive: true, force: true });
});

function byKind(storage: StorageConfig): StorageProvider {
  return storage.kind === "local" ? local : remote;
}

async function run(
  command: LedgerCommand,
  clock: number,
  providerFactory: (storage: StorageConfig) => StorageProvider = byKind,
): Promise<RecordingPrinter & { result: Awaited<ReturnType<typeof runSession>> }> {
  const recording = recordingPrinter();
  const result = await runSession({
    command,
    configDirectory,
    printer: recording.printer,
    logger: silentLogger,
    clock: () => clock,
    providerFactory,
  });
  return { ...recording, result };
}

function readConfig(): unknown {
  return JSON.parse(readFileSync(join(configDirectory, CONFIG_FILE_NAME), "utf8"));
}

describe("runSession", () => {
  it("starts a fresh ledger and saves it with the configuration", async () => {
    const { result, out } = await run({ kind: "balance" }, T0);

    expect(result.status).toBe("stored");
    expect(result.exitCode).toBe(0);
    expect(out.lines).toEqual(["Balance: $10.00"]);
    expect(local.writes).toBe(1);
    expect((await local.fetch())?.lastUpdated).toBe(T0);
    expect(readConfig()).toEqual({ storage: { kind: "local", path: configDirectory } });
  });

  it("accrues, spends and undoes across invocations", async () => {
    await local.store(createLedger(T0));

    const spent = await run({ kind: "spend", amount: 5, reason: "food", loan: false }, T3);
    expect(spent.result.status).toBe("stored");
    expect(spent.out.lines).toEqual(["Jan 18 09:00am: $5.00 food", "Balance: $20.00"]);

    const afterSpend = await local.fetch();
    expect(afterSpend?.balance).toBe(20);
    expect(afterSpend?.history).toHaveLength(1);

    const undone = await run({ kind: "undo" }, T3_LATER);
    expect(undone.result.status).toBe("stored");

    const afterUndo = await local.fetch();
    expect(afterUndo?.balance).toBe(25);
    expect(afterUndo?.history).toHaveLength(0);
    expect(afterUndo?.redoStack).toHaveLength(1);
  });

  it("writes nothing when the command is refused", async () => {
    const { result } = await run({ kind: "spend", amount: 50, reason: "food", loan: false }, T0);

    expect(result).toEqual({ status: "refused", exitCode: 0, reason: "Request is over budget!" });
    expect(local.writes).toBe(0);
    expect(existsSync(join(configDirectory, CONFIG_FILE_NAME))).toBe(false);
  });

  it("refuses to overwrite a concurrent spend", async () => {
    const base: LedgerState = {
      ...createLedger(T0),
      history: [{ amount: 2, reason: "games", time: T0 }],
      balance: 8,
    };
    const concurrent: LedgerState = {
      ...base,
      history: [...base.history, { amount: 1, reason: "rent", time: T0 + 1000 }],
      balance: 7,
    };
    const store = new ScriptedProvider([base, concurrent]);

    const { result, err } = await run({ kind: "spend", amount: 1, reason: "food", loan: false }, T0, () => store);

    expect(result.status).toBe("rejected");
    expect(result.exitCode).toBe(1);
    expect(err.lines).toEqual(["Histories are incompatible", REFUSAL_MESSAGE]);
    expect(store.stored).toEqual([]);
  });

  it("reconciles a rate change made after accrual", async () => {
    await local.store(createLedger(T0));

    const { result, out } = await run({ kind: "set", key: "rate", values: ["7"] }, T3);

    expect(result.status).toBe("stored");
    expect(out.lines).toEqual(["Rate is $7.00"]);
    const stored = await local.fetch();
    expect(stored?.rate).toBe(7);
    expect(stored?.balance).toBe(25);
  });

  it("writes to the newly selected provider", async () => {
    const { result } = await run({ kind: "set", key: "provider", values: ["s3"] }, T0);

    expect(result.status).toBe("stored");
    expect(local.writes).toBe(0);
    expect(remote.writes).toBe(1);
    expect(readConfig()).toMatchObject({ storage: { kind: "s3", region: "us-east-1" } });
  });

  it("refuses to carry a history into a store holding a different one", async () => {
    await local.store({
      ...createLedger(T0),
      history: [
        { amount: 1, reason: "food", time: T0 },
        { amount: 1, reason: "food", time: T0 + 1 },
      ],
      balance: 8,
    });

    const { result } = await run({ kind: "set", key: "provider", values: ["s3"] }, T0);

    expect(result.status).toBe("rejected");
    expect(remote.writes).toBe(0);
  });

  it("fails hard when the stored ledger is from a later day", async () => {
    await local.store(createLedger(T3));
    await expect(run({ kind: "balance" }, T0)).rejects.toBeInstanceOf(LedgerError);
    expect(local.writes).toBe(1);
  });
});
