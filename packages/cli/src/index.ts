/**
 * @budgetme/cli — The budgetme command as a library.
 *
 * `main.ts` is the executable; everything it is built from is exported
 * here for embedding and tests.
 */

export type { Command, LedgerCommand } from "./args.js";
export { USAGE, parseCommand } from "./args.js";

export type { CliEnv, BudgetConfig, ConfigErrorCode } from "./config.js";
export {
  APP_DIRECTORY_NAME,
  CONFIG_FILE_NAME,
  ConfigError,
  EnvSchema,
  BudgetConfigSchema,
  loadEnv,
  resolveConfigDirectory,
  defaultBudgetConfig,
  migrateLegacyConfig,
  parseBudgetConfig,
  loadBudgetConfig,
  saveBudgetConfig,
} from "./config.js";

export type { CommandContext, CommandResult, SettingKey } from "./commands.js";
export { SETTING_KEYS, parseSettingKey, parseProvider, executeCommand } from "./commands.js";

export type { Output, PrinterOptions } from "./printer.js";
export { Printer, formatItemDate, maskSecret } from "./printer.js";

export { createLogger } from "./logger.js";

export type { SessionOptions, SessionResult } from "./session.js";
export { REFUSAL_MESSAGE, runSession } from "./session.js";
