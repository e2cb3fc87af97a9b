/**
 * Shared fixtures for CLI tests: a colourless printer that records its
 * output, a fixed clock and a silent logger.
 */

import { Chalk } from "chalk";
import pino from "pino";
import { Printer, type Output } from "../src/printer.js";

export const T0 = new Date(2024, 0, 15, 9, 0).getTime();

export class Recorder implements Output {
  private text = "";

  write(chunk: string): void {
    this.text += chunk;
  }

  get lines(): string[] {
    return this.text.split("\n").filter((line) => line !== "");
  }
}

export interface RecordingPrinter {
  readonly printer: Printer;
  readonly out: Recorder;
  readonly err: Recorder;
}

export function recordingPrinter(now: number = T0): RecordingPrinter {
  const out = new Recorder();
  const err = new Recorder();
  const printer = new Printer({ out, err, chalk: new Chalk({ level: 0 }), now: () => now });
  return { printer, out, err };
}

export const silentLogger = pino({ level: "silent" });
