/**
 * @budgetme/cli — Configuration.
 *
 * Two layers:
 * - Process environment (LOG_LEVEL, NODE_ENV, BUDGETME_CONFIG_DIR),
 *   validated with Zod.
 * - `config.json` in the configuration directory, holding the active
 *   storage backend. Documents written by earlier releases are migrated
 *   on load.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import {
  StorageConfigSchema,
  defaultLocalConfig,
  defaultS3Config,
  type S3StorageConfig,
  type StorageConfig,
} from "@budgetme/storage";

export const APP_DIRECTORY_NAME = "budgetme";
export const CONFIG_FILE_NAME = "config.json";

// =============================================================================
// Errors
// =============================================================================

export type ConfigErrorCode = "INVALID_CONFIG" | "INVALID_VALUE" | "INVALID_ARGUMENTS";

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Environment
// =============================================================================

export const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
  BUDGETME_CONFIG_DIR: z.string().min(1).optional(),
  XDG_CONFIG_HOME: z.string().min(1).optional(),
  APPDATA: z.string().min(1).optional(),
});

export type CliEnv = z.infer<typeof EnvSchema>;

/**
 * Load and validate the environment. Empty variables count as unset.
 *
 * @throws ConfigError INVALID_CONFIG on an invalid value
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): CliEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid environment: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * The platform configuration directory joined with `budgetme`, unless
 * BUDGETME_CONFIG_DIR overrides it.
 */
export function resolveConfigDirectory(
  env: CliEnv,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  if (env.BUDGETME_CONFIG_DIR !== undefined) {
    return env.BUDGETME_CONFIG_DIR;
  }
  switch (platform) {
    case "win32":
      return join(env.APPDATA ?? join(home, "AppData", "Roaming"), APP_DIRECTORY_NAME);
    case "darwin":
      return join(home, "Library", "Application Support", APP_DIRECTORY_NAME);
    default:
      return join(env.XDG_CONFIG_HOME ?? join(home, ".config"), APP_DIRECTORY_NAME);
  }
}

// =============================================================================
// Configuration document
// =============================================================================

export const BudgetConfigSchema = z.object({
  storage: StorageConfigSchema,
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;

export function defaultBudgetConfig(dataDirectory: string): BudgetConfig {
  return { storage: defaultLocalConfig(dataDirectory) };
}

// ─── Legacy documents ────────────────────────────────────────────────────

const LegacyLocalSchema = z.object({
  file_path: z.string().min(1),
});

/** Region was written either as a name or as a [name, endpoint] pair. */
const LegacyRegionSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), z.string().nullable()]),
]);

const LegacyAwsSchema = z.object({
  access_key: z.string().default(""),
  secret_access_key: z.string().default(""),
  bucket_name: z.string().min(1),
  region: LegacyRegionSchema.default("us-east-1"),
});

const LegacyConfigSchema = z.object({
  data_source: z
    .union([z.object({ Local: LegacyLocalSchema }), z.object({ Aws: LegacyAwsSchema })])
    .nullish(),
  local_data_source: LegacyLocalSchema.nullish(),
  aws_data_source: LegacyAwsSchema.nullish(),
  use_local: z.boolean().nullish(),
});

type LegacyAws = z.infer<typeof LegacyAwsSchema>;

function fromLegacyAws(aws: LegacyAws): S3StorageConfig {
  const [region, endpoint]: readonly [string, string | null] =
    typeof aws.region === "string" ? [aws.region, null] : aws.region;
  return {
    kind: "s3",
    accessKey: aws.access_key,
    secretKey: aws.secret_access_key,
    bucketName: aws.bucket_name,
    region,
    ...(endpoint !== null ? { endpoint } : {}),
  };
}

/**
 * Map a legacy document onto the storage sum type.
 *
 * An explicit `data_source` wins; otherwise `use_local` (default true)
 * picks which block becomes active, and a missing block becomes that
 * backend's defaults.
 */
export function migrateLegacyConfig(raw: unknown, dataDirectory: string): BudgetConfig {
  const result = LegacyConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("INVALID_CONFIG", "Configuration file is malformed", {
      cause: result.error,
    });
  }
  const legacy = result.data;

  let storage: StorageConfig;
  if (legacy.data_source !== null && legacy.data_source !== undefined) {
    storage =
      "Local" in legacy.data_source
        ? { kind: "local", path: legacy.data_source.Local.file_path }
        : fromLegacyAws(legacy.data_source.Aws);
  } else if (legacy.use_local ?? true) {
    storage = legacy.local_data_source
      ? { kind: "local", path: legacy.local_data_source.file_path }
      : defaultLocalConfig(dataDirectory);
  } else {
    storage = legacy.aws_data_source ? fromLegacyAws(legacy.aws_data_source) : defaultS3Config();
  }
  return { storage };
}

/**
 * Interpret a parsed `config.json`.
 *
 * @throws ConfigError INVALID_CONFIG
 */
export function parseBudgetConfig(raw: unknown, dataDirectory: string): BudgetConfig {
  if (typeof raw === "object" && raw !== null && "storage" in raw) {
    const result = BudgetConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigError("INVALID_CONFIG", `Configuration file is malformed: ${issues}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
  return migrateLegacyConfig(raw, dataDirectory);
}

// ─── File I/O ────────────────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read `<directory>/config.json`. A missing file yields the default
 * local configuration, with data kept in the same directory.
 */
export async function loadBudgetConfig(directory: string): Promise<BudgetConfig> {
  const path = join(directory, CONFIG_FILE_NAME);
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      return defaultBudgetConfig(directory);
    }
    throw new ConfigError("INVALID_CONFIG", `Could not read ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", `${path} is not valid JSON`, { cause: err });
  }
  return parseBudgetConfig(raw, directory);
}

export async function saveBudgetConfig(directory: string, config: BudgetConfig): Promise<void> {
  await mkdir(directory, { recursive: true });
  await writeFile(join(directory, CONFIG_FILE_NAME), `${JSON.stringify(config, null, 2)}\n`, "utf8");
}
