/**
 * @budgetme/storage — Local file provider.
 *
 * Persists the ledger as `<directory>/data.json`. A leading `~` in the
 * directory is expanded to the user's home directory. Writes go to a
 * temporary file first and are renamed into place, so a crash mid-write
 * leaves the previous document intact.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import pino, { type Logger } from "pino";
import type { LedgerState } from "@budgetme/types";
import { decodeLedger, encodeLedger } from "./codec.js";
import { StorageError, type StorageProvider } from "./types.js";

export const DATA_FILE_NAME = "data.json";

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(home, path.slice(2));
  }
  return path;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export interface LocalFileProviderOptions {
  readonly logger?: Logger | undefined;
}

export class LocalFileProvider implements StorageProvider {
  readonly directory: string;
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(directory: string, options: LocalFileProviderOptions = {}) {
    this.directory = expandHome(directory);
    this.filePath = join(this.directory, DATA_FILE_NAME);
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  get description(): string {
    return `local file ${this.filePath}`;
  }

  async fetch(): Promise<LedgerState | undefined> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        this.logger.info({ path: this.filePath }, "No ledger file yet");
      } else {
        this.logger.warn({ err, path: this.filePath }, "Could not read ledger file");
      }
      return undefined;
    }
    return decodeLedger(text);
  }

  async store(state: LedgerState): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, encodeLedger(state), "utf8");
      await rename(tempPath, this.filePath);
    } catch (err) {
      throw new StorageError("WRITE_FAILED", `Could not write ${this.filePath}`, { cause: err });
    }
    this.logger.debug({ path: this.filePath }, "Ledger written");
  }
}
