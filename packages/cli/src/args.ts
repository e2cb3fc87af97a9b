/**
 * @budgetme/cli — Command-line parsing.
 *
 *   budgetme                                   print the balance
 *   budgetme list
 *   budgetme spend <amount> <reason> [specific] [--loan|-o]
 *   budgetme undo | redo | garnish
 *   budgetme set <key> <values...>
 *   budgetme get <key> [values...]
 */

import { parseArgs } from "node:util";
import { parseAmount } from "@budgetme/ledger";
import { ConfigError } from "./config.js";

export const USAGE = [
  "Usage: budgetme [command]",
  "",
  "Commands:",
  "  (none)                                 Print the balance",
  "  list                                   Print the spending history, most recent last",
  "  spend <amount> <reason> [specific]     Spend from the balance (--loan, -o: allow going negative)",
  "  undo                                   Undo the most recent spend",
  "  redo                                   Redo the most recent undo",
  "  garnish                                Move a negative balance into debt",
  "  set <key> <values...>                  Change a setting",
  "  get <key> [values...]                  Show a setting",
  "",
  "Keys: rate, provider, path, access-key, secret-key, bucket-name, region, endpoint,",
  "      cringe <keyword> [factor], synonym <keyword> [keyword]",
].join("\n");

export type Command =
  | { readonly kind: "help" }
  | { readonly kind: "balance" }
  | { readonly kind: "list" }
  | { readonly kind: "undo" }
  | { readonly kind: "redo" }
  | { readonly kind: "garnish" }
  | {
      readonly kind: "spend";
      readonly amount: number;
      readonly reason: string;
      readonly specific?: string | undefined;
      readonly loan: boolean;
    }
  | { readonly kind: "set"; readonly key: string; readonly values: readonly string[] }
  | { readonly kind: "get"; readonly key: string; readonly values: readonly string[] };

/** Commands that run against the ledger. */
export type LedgerCommand = Exclude<Command, { readonly kind: "help" }>;

function usageError(message: string): ConfigError {
  return new ConfigError("INVALID_ARGUMENTS", `${message}\n\n${USAGE}`);
}

function expectOperands(name: string, operands: readonly string[], min: number, max: number): void {
  if (operands.length < min) {
    throw usageError(`Missing argument for "${name}"`);
  }
  if (operands.length > max) {
    throw usageError(`Too many arguments for "${name}"`);
  }
}

/**
 * Parse `process.argv.slice(2)` into a command.
 *
 * @throws ConfigError INVALID_ARGUMENTS for unknown commands, options or
 *   operand counts
 * @throws LedgerError INVALID_AMOUNT for an unparseable spend amount
 */
export function parseCommand(argv: readonly string[]): Command {
  let parsed: ReturnType<typeof parseTokens>;
  try {
    parsed = parseTokens(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw usageError(message);
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    return { kind: "help" };
  }

  const [name, ...operands] = positionals;
  if (name === undefined) {
    return { kind: "balance" };
  }

  const command = name.toLowerCase();
  if (values.loan === true && command !== "spend") {
    throw usageError(`--loan only applies to "spend"`);
  }

  switch (command) {
    case "list":
    case "undo":
    case "redo":
    case "garnish":
      expectOperands(command, operands, 0, 0);
      return { kind: command };

    case "spend": {
      expectOperands(command, operands, 2, 3);
      const [amountText = "", reason = "", specific] = operands;
      return {
        kind: "spend",
        amount: parseAmount(amountText),
        reason,
        specific,
        loan: values.loan === true,
      };
    }

    case "set":
    case "get": {
      expectOperands(command, operands, 1, Number.POSITIVE_INFINITY);
      const [key = "", ...rest] = operands;
      return { kind: command, key, values: rest };
    }

    default:
      throw usageError(`Unknown command "${name}"`);
  }
}

function parseTokens(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      loan: { type: "boolean", short: "o" },
      help: { type: "boolean", short: "h" },
    },
  });
}
