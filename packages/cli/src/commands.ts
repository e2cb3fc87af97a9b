/**
 * @budgetme/cli — Command execution.
 *
 * Applies one parsed command to the (already accrued) ledger and the
 * configuration, printing as it goes. Nothing here touches storage: the
 * session decides what to persist from the returned result.
 *
 * User input problems (over budget, unknown setting, a setting that does
 * not apply to the active backend) come back as "refused" and nothing is
 * persisted. Fatal problems (empty undo stack, unparseable number) throw.
 */

import type { LedgerState } from "@budgetme/types";
import {
  effectiveMultiplier,
  effectiveRate,
  garnish,
  normalizeKeyword,
  parseAmount,
  redo,
  setCringe,
  setRate,
  setSynonym,
  spend,
  synonymGroup,
  undo,
} from "@budgetme/ledger";
import {
  S3StorageConfigSchema,
  defaultLocalConfig,
  defaultS3Config,
  type S3StorageConfig,
  type StorageKind,
} from "@budgetme/storage";
import type { LedgerCommand } from "./args.js";
import { ConfigError, type BudgetConfig } from "./config.js";
import { maskSecret, type Printer } from "./printer.js";

export interface CommandContext {
  readonly ledger: LedgerState;
  readonly config: BudgetConfig;
  readonly now: number;
  readonly printer: Printer;
  /** Data directory `set path none` restores */
  readonly defaultDataDirectory: string;
}

export type CommandResult =
  | {
      readonly status: "ok";
      readonly ledger: LedgerState;
      readonly config: BudgetConfig;
    }
  | {
      readonly status: "refused";
      readonly reason: string;
    };

export const SETTING_KEYS = [
  "rate",
  "provider",
  "path",
  "access-key",
  "secret-key",
  "bucket-name",
  "region",
  "endpoint",
  "cringe",
  "synonym",
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

type S3Field = "accessKey" | "secretKey" | "bucketName" | "region";
type S3SettingKey = "access-key" | "secret-key" | "bucket-name" | "region";

interface S3FieldSpec {
  readonly field: S3Field;
  readonly label: string;
  readonly secret: boolean;
}

const S3_FIELDS: Readonly<Record<S3SettingKey, S3FieldSpec>> = {
  "access-key": { field: "accessKey", label: "Access key", secret: true },
  "secret-key": { field: "secretKey", label: "Secret key", secret: true },
  "bucket-name": { field: "bucketName", label: "Bucket name", secret: false },
  region: { field: "region", label: "Region", secret: false },
};

export function parseSettingKey(key: string): SettingKey | undefined {
  const normalized = key.trim().toLowerCase().replaceAll("_", "-");
  return SETTING_KEYS.find((candidate) => candidate === normalized);
}

/**
 * `local`, `s3`, or `aws` (an alias for s3).
 */
export function parseProvider(value: string): StorageKind | undefined {
  switch (value.trim().toLowerCase()) {
    case "local":
      return "local";
    case "s3":
    case "aws":
      return "s3";
    default:
      return undefined;
  }
}

function requireValues(key: string, values: readonly string[], count: number): void {
  if (values.length < count) {
    throw new ConfigError("INVALID_ARGUMENTS", `Missing value for "${key}"`);
  }
  if (values.length > count) {
    throw new ConfigError("INVALID_ARGUMENTS", `Too many values for "${key}"`);
  }
}

function value(values: readonly string[], index: number): string {
  return values[index] ?? "";
}

// =============================================================================
// Execution
// =============================================================================

export function executeCommand(command: LedgerCommand, ctx: CommandContext): CommandResult {
  const { printer } = ctx;
  const ok = (ledger: LedgerState = ctx.ledger, config: BudgetConfig = ctx.config): CommandResult => ({
    status: "ok",
    ledger,
    config,
  });
  const refuse = (reason: string): CommandResult => {
    printer.warning(reason);
    return { status: "refused", reason };
  };

  switch (command.kind) {
    case "balance":
      printer.balance(ctx.ledger);
      return ok();

    case "list":
      for (const item of ctx.ledger.history) {
        printer.item(item);
      }
      printer.balance(ctx.ledger);
      return ok();

    case "spend": {
      const outcome = spend(ctx.ledger, {
        amount: command.amount,
        reason: command.reason,
        specific: command.specific,
        loan: command.loan,
        now: ctx.now,
      });
      if (outcome.status === "refused") {
        if (outcome.reason === "non-positive-amount") {
          return refuse("Amount must be positive!");
        }
        const result = refuse("Request is over budget!");
        printer.balance(ctx.ledger);
        return result;
      }
      printer.item(outcome.item);
      if (outcome.multiplier !== 1) {
        printer.setting("Cringe factor", String(outcome.multiplier));
      }
      printer.balance(outcome.state);
      return ok(outcome.state);
    }

    case "undo":
    case "redo": {
      const move = command.kind === "undo" ? undo(ctx.ledger) : redo(ctx.ledger);
      printer.item(move.item);
      printer.balance(move.state);
      return ok(move.state);
    }

    case "garnish": {
      const outcome = garnish(ctx.ledger);
      if (outcome.status === "noop") {
        printer.warning("Balance is not negative; nothing to garnish");
      }
      printer.balance(outcome.state, { showDebt: true });
      return ok(outcome.state);
    }

    case "set":
      return executeSet(command.key, command.values, ctx, ok, refuse);

    case "get":
      return executeGet(command.key, command.values, ctx, ok, refuse);
  }
}

type Ok = (ledger?: LedgerState, config?: BudgetConfig) => CommandResult;
type Refuse = (reason: string) => CommandResult;

function withS3(
  ctx: CommandContext,
  key: string,
  refuse: Refuse,
  apply: (storage: S3StorageConfig) => CommandResult,
): CommandResult {
  const storage = ctx.config.storage;
  if (storage.kind !== "s3") {
    return refuse(`Invalid key for ${storage.kind} data provider: ${key}`);
  }
  return apply(storage);
}

function withField(storage: S3StorageConfig, field: S3Field, fieldValue: string): S3StorageConfig {
  switch (field) {
    case "accessKey":
      return { ...storage, accessKey: fieldValue };
    case "secretKey":
      return { ...storage, secretKey: fieldValue };
    case "bucketName":
      return { ...storage, bucketName: fieldValue };
    case "region":
      return { ...storage, region: fieldValue };
  }
}

function withoutEndpoint(storage: S3StorageConfig): S3StorageConfig {
  return {
    kind: "s3",
    accessKey: storage.accessKey,
    secretKey: storage.secretKey,
    bucketName: storage.bucketName,
    region: storage.region,
  };
}

/**
 * @throws ConfigError INVALID_VALUE when the edited configuration is invalid
 */
function validatedS3(candidate: S3StorageConfig): S3StorageConfig {
  const result = S3StorageConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      "INVALID_VALUE",
      `Invalid ${issue?.path.join(".") ?? "value"}: ${issue?.message ?? "rejected"}`,
      { cause: result.error },
    );
  }
  return result.data;
}

function executeSet(
  rawKey: string,
  values: readonly string[],
  ctx: CommandContext,
  ok: Ok,
  refuse: Refuse,
): CommandResult {
  const { printer } = ctx;
  const key = parseSettingKey(rawKey);
  if (key === undefined) {
    return refuse(`Unknown setting "${rawKey}"`);
  }

  switch (key) {
    case "rate": {
      requireValues(key, values, 1);
      const ledger = setRate(ctx.ledger, parseAmount(value(values, 0)));
      printer.rate(effectiveRate(ledger));
      return ok(ledger);
    }

    case "provider": {
      requireValues(key, values, 1);
      const kind = parseProvider(value(values, 0));
      if (kind === undefined) {
        throw new ConfigError(
          "INVALID_VALUE",
          `Invalid provider "${value(values, 0)}", valid are local or s3`,
        );
      }
      const current = ctx.config.storage;
      const storage =
        current.kind === kind
          ? current
          : kind === "local"
            ? defaultLocalConfig(ctx.defaultDataDirectory)
            : defaultS3Config();
      printer.setting("Provider", kind);
      return ok(ctx.ledger, { ...ctx.config, storage });
    }

    case "path": {
      requireValues(key, values, 1);
      const storage = ctx.config.storage;
      if (storage.kind !== "local") {
        return refuse(`Invalid key for ${storage.kind} data provider: ${key}`);
      }
      const requested = value(values, 0);
      const path = requested.trim().toLowerCase() === "none" ? ctx.defaultDataDirectory : requested;
      printer.setting("Data path", path);
      return ok(ctx.ledger, { ...ctx.config, storage: { ...storage, path } });
    }

    case "access-key":
    case "secret-key":
    case "bucket-name":
    case "region": {
      requireValues(key, values, 1);
      const spec = S3_FIELDS[key];
      return withS3(ctx, key, refuse, (current) => {
        const storage = validatedS3(withField(current, spec.field, value(values, 0)));
        const shown = storage[spec.field];
        printer.setting(spec.label, spec.secret ? maskSecret(shown) : shown);
        return ok(ctx.ledger, { ...ctx.config, storage });
      });
    }

    case "endpoint": {
      requireValues(key, values, 1);
      return withS3(ctx, key, refuse, (current) => {
        const requested = value(values, 0);
        const storage =
          requested.trim().toLowerCase() === "none"
            ? withoutEndpoint(current)
            : validatedS3({ ...current, endpoint: requested });
        printer.setting("Endpoint", storage.endpoint ?? "none");
        return ok(ctx.ledger, { ...ctx.config, storage });
      });
    }

    case "cringe": {
      requireValues(key, values, 2);
      const keyword = value(values, 0);
      const ledger = setCringe(ctx.ledger, keyword, parseAmount(value(values, 1)));
      printer.setting(
        `Cringe factor for ${normalizeKeyword(keyword)}`,
        String(effectiveMultiplier(ledger, keyword)),
      );
      return ok(ledger);
    }

    case "synonym": {
      requireValues(key, values, 2);
      const ledger = setSynonym(ctx.ledger, value(values, 0), value(values, 1));
      const group = synonymGroup(ledger, value(values, 0));
      printer.setting(`Synonyms of ${normalizeKeyword(value(values, 0))}`, group.slice(1).join(", "));
      return ok(ledger);
    }
  }
}

function executeGet(
  rawKey: string,
  values: readonly string[],
  ctx: CommandContext,
  ok: Ok,
  refuse: Refuse,
): CommandResult {
  const { printer } = ctx;
  const key = parseSettingKey(rawKey);
  if (key === undefined) {
    return refuse(`Unknown setting "${rawKey}"`);
  }

  switch (key) {
    case "rate":
      requireValues(key, values, 0);
      printer.rate(effectiveRate(ctx.ledger));
      return ok();

    case "provider":
      requireValues(key, values, 0);
      printer.setting("Provider", ctx.config.storage.kind);
      return ok();

    case "path": {
      requireValues(key, values, 0);
      const storage = ctx.config.storage;
      if (storage.kind !== "local") {
        return refuse(`Invalid key for ${storage.kind} data provider: ${key}`);
      }
      printer.setting("Data path", storage.path);
      return ok();
    }

    case "access-key":
    case "secret-key":
    case "bucket-name":
    case "region": {
      requireValues(key, values, 0);
      const spec = S3_FIELDS[key];
      return withS3(ctx, key, refuse, (storage) => {
        const shown = storage[spec.field];
        printer.setting(spec.label, spec.secret ? maskSecret(shown) : shown);
        return ok();
      });
    }

    case "endpoint":
      requireValues(key, values, 0);
      return withS3(ctx, key, refuse, (storage) => {
        printer.setting("Endpoint", storage.endpoint ?? "none");
        return ok();
      });

    case "cringe": {
      requireValues(key, values, 1);
      const keyword = value(values, 0);
      printer.setting(
        `Cringe factor for ${normalizeKeyword(keyword)}`,
        String(effectiveMultiplier(ctx.ledger, keyword)),
      );
      return ok();
    }

    case "synonym": {
      requireValues(key, values, 1);
      const keyword = value(values, 0);
      const group = synonymGroup(ctx.ledger, keyword);
      printer.setting(`Synonyms of ${normalizeKeyword(keyword)}`, group.slice(1).join(", ") || "none");
      return ok();
    }
  }
}
