/**
 * @budgetme/cli — Console output.
 *
 * All user-facing text goes through the Printer so that stdout carries
 * nothing but ledger output (logs go to stderr) and tests can capture it.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { HistoryItem, LedgerState } from "@budgetme/types";
import { formatDollars } from "@budgetme/ledger";

export interface Output {
  write(text: string): unknown;
}

export interface PrinterOptions {
  readonly out?: Output | undefined;
  readonly err?: Output | undefined;
  readonly chalk?: ChalkInstance | undefined;
  /** Current time, for deciding whether dates need a year */
  readonly now?: (() => number) | undefined;
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local-time `Mon DD hh:mmam`, with the year after the day when it is
 * not the current year: "Jan 05 09:30am", "Dec 31 2023 11:15pm".
 */
export function formatItemDate(time: number, now: number): string {
  const date = new Date(time);
  const month = MONTHS[date.getMonth()] ?? "";
  const day = pad2(date.getDate());
  const year = date.getFullYear() === new Date(now).getFullYear() ? "" : ` ${String(date.getFullYear())}`;
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? "am" : "pm";
  return `${month} ${day}${year} ${pad2(hour12)}:${pad2(date.getMinutes())}${meridiem}`;
}

/**
 * Mask a credential for display, keeping the last four characters of
 * long values.
 */
export function maskSecret(secret: string): string {
  if (secret === "") {
    return "(not set)";
  }
  return secret.length > 8 ? `****${secret.slice(-4)}` : "****";
}

export class Printer {
  private readonly out: Output;
  private readonly err: Output;
  private readonly chalk: ChalkInstance;
  private readonly now: () => number;

  constructor(options: PrinterOptions = {}) {
    this.out = options.out ?? process.stdout;
    this.err = options.err ?? process.stderr;
    this.chalk = options.chalk ?? chalk;
    this.now = options.now ?? Date.now;
  }

  line(text: string): void {
    this.out.write(`${text}\n`);
  }

  /** `Label: value`, value highlighted. */
  setting(label: string, value: string): void {
    this.line(`${label}: ${this.chalk.cyan(value)}`);
  }

  money(amount: number): string {
    const text = formatDollars(amount);
    return amount < 0 ? this.chalk.redBright(text) : this.chalk.green(text);
  }

  balance(state: LedgerState, options: { readonly showDebt?: boolean } = {}): void {
    this.line(`Balance: ${this.money(state.balance)}`);
    if (state.debt > 0 || options.showDebt === true) {
      this.line(`Debt: ${this.chalk.redBright(formatDollars(state.debt))}`);
    }
  }

  item(item: HistoryItem): void {
    const date = this.chalk.blue(formatItemDate(item.time, this.now()));
    const amount = this.chalk.redBright(formatDollars(item.amount));
    const specific = item.specific !== undefined ? ` ${this.chalk.gray(item.specific)}` : "";
    this.line(`${date}: ${amount} ${this.chalk.yellow(item.reason)}${specific}`);
  }

  rate(rate: number): void {
    this.line(`Rate is ${this.chalk.green(formatDollars(rate))}`);
  }

  warning(message: string): void {
    this.line(this.chalk.yellow(message));
  }

  error(message: string): void {
    this.err.write(`${this.chalk.red(message)}\n`);
  }
}
