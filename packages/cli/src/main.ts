/**
 * @budgetme/cli — Entry point.
 *
 * Parses arguments, loads the environment, runs one session and sets the
 * exit code. Every thrown error ends here: printed in red, logged, exit 1.
 */

import { USAGE, parseCommand } from "./args.js";
import { createLogger } from "./logger.js";
import { loadEnv, resolveConfigDirectory } from "./config.js";
import { Printer } from "./printer.js";
import { runSession } from "./session.js";

async function main(argv: readonly string[]): Promise<number> {
  const printer = new Printer();
  const env = loadEnv();
  const logger = createLogger(env);

  try {
    const command = parseCommand(argv);
    if (command.kind === "help") {
      printer.line(USAGE);
      return 0;
    }
    const result = await runSession({
      command,
      configDirectory: resolveConfigDirectory(env),
      printer,
      logger,
    });
    return result.exitCode;
  } catch (err) {
    printer.error(err instanceof Error ? err.message : String(err));
    logger.error({ err }, "Command failed");
    return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
