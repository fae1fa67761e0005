// ANSI color codes
export const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m",
};

export type Color = keyof typeof colors;

export function log(message: string, color?: Color): void {
  const c = color ? colors[color] : "";
  console.log(`${c}${message}${color ? colors.reset : ""}`);
}

function clock(now: Date): string {
  return now.toTimeString().slice(0, 8);
}

/** Timestamped progress line, e.g. `[14:03:12] Creating resource group...` */
export function step(message: string, now: Date = new Date()): void {
  log(`[${clock(now)}] ${message}`, "blue");
}

export function success(message: string): void {
  log(`✅ ${message}`, "green");
}

export function warning(message: string): void {
  log(`⚠️ ${message}`, "yellow");
}

export function failure(message: string): void {
  log(`❌ ${message}`, "red");
}

export function banner(title: string): void {
  log("=".repeat(50), "cyan");
  log(title, "cyan");
  log("=".repeat(50), "cyan");
}

/**
 * Raised by a required step. The CLI entry point prints the message and exits 1;
 * nothing after the failing step runs.
 */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
