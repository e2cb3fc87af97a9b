/**
 * @budgetme/cli — Logger.
 *
 * Structured JSON logs on stderr, so stdout stays clean for ledger
 * output. NODE_ENV=development switches to pino-pretty.
 */

import pino, { type Logger } from "pino";
import type { CliEnv } from "./config.js";

const STDERR = 2;

export function createLogger(env: Pick<CliEnv, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (env.NODE_ENV === "development") {
    return pino({
      level: env.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }
  return pino({ level: env.LOG_LEVEL }, pino.destination({ dest: STDERR, sync: true }));
}
