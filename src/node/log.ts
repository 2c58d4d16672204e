/**
 * Pipe-safe logging for hexmodal.
 *
 * Everything goes to stderr: stdout belongs to the headless runner's
 * output. Lines are prefixed with a short timestamp and the level, coloured
 * when stderr is a terminal. A closed pipe (EPIPE) is ignored.
 */

import chalk from "chalk";

type Level = "info" | "warn" | "error" | "debug";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function parseBoolEnv(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

/** Debug output is enabled by setting HEXMODAL_DEBUG. */
function isDebugMode(): boolean {
  return parseBoolEnv(process.env.HEXMODAL_DEBUG);
}

function supportsColor(): boolean {
  return process.stderr.isTTY ?? false;
}

/** `14:03:27.481` */
function getTimestamp(): string {
  const now = new Date();
  const hh = String(now.getHours()).padStart(2, "0");
  const mm = String(now.getMinutes()).padStart(2, "0");
  const ss = String(now.getSeconds()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${hh}:${mm}:${ss}.${ms}`;
}

function colorLevel(level: Level): string {
  const label = level.toUpperCase().padEnd(5);
  switch (level) {
    case "error":
      return chalk.red(label);
    case "warn":
      return chalk.yellow(label);
    case "debug":
      return chalk.gray(label);
    case "info":
      return chalk.cyan(label);
  }
}

function safePipeLog(level: Level, ...args: unknown[]): void {
  if (level === "debug" && !isDebugMode()) return;

  const timestamp = getTimestamp();
  const useColor = supportsColor();
  const prefix = useColor
    ? `${chalk.dim(timestamp)} ${colorLevel(level)}`
    : `${timestamp} ${level.toUpperCase().padEnd(5)}`;

  try {
    if (level === "error" && useColor) {
      console.error(prefix, ...args.map((arg) => (typeof arg === "string" ? chalk.red(arg) : arg)));
    } else {
      console.error(prefix, ...args);
    }
  } catch (error) {
    const code = error && typeof error === "object" && "code" in error ? error.code : undefined;
    if (code === "EPIPE") return;
    const message = error instanceof Error ? error.message : String(error);
    try {
      process.stderr.write(`${timestamp} console error: ${message}\n`);
    } catch {
      // stderr itself is gone; nowhere left to report to.
    }
  }
}

export const log = {
  info: (...args: unknown[]): void => {
    safePipeLog("info", ...args);
  },

  warn: (...args: unknown[]): void => {
    safePipeLog("warn", ...args);
  },

  error: (...args: unknown[]): void => {
    safePipeLog("error", ...args);
  },

  /** Only printed when HEXMODAL_DEBUG is set. */
  debug: (...args: unknown[]): void => {
    safePipeLog("debug", ...args);
  },

  isDebugMode,
};
