/**
 * User configuration: `$HEXMODAL_HOME/config.jsonc` (default `~/.hexmodal`).
 *
 * The file is JSONC (comments and trailing commas allowed) and validated
 * strictly. A missing file gives the defaults; an unreadable or invalid one
 * is reported with a warning and also gives the defaults.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as jsonc from "jsonc-parser";
import { z } from "zod";
import { Err, Ok, type Result } from "../common/result.ts";
import { log } from "./log.ts";

export const ConfigSchema = z
  .object({
    /** Row width used by up/down movement and row start/end jumps. */
    bytesPerLine: z.number().int().min(1).max(1024).default(16),
    /** Undo steps kept per session; 0 keeps all. */
    historyLimit: z.number().int().min(0).default(0),
  })
  .strict();

export type HexmodalConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: HexmodalConfig = ConfigSchema.parse({});

export function getConfigHome(): string {
  const home = process.env.HEXMODAL_HOME;
  if (home) return home;
  return path.join(os.homedir(), ".hexmodal");
}

export function getConfigPath(): string {
  return path.join(getConfigHome(), "config.jsonc");
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "config";
  return `${where}: ${issue.message}`;
}

/** Parse and validate config text. `source` names the file in errors. */
export function parseConfig(text: string, source: string): Result<HexmodalConfig, string> {
  const errors: jsonc.ParseError[] = [];
  const raw: unknown = jsonc.parse(text, errors, { allowTrailingComma: true });
  const first = errors[0];
  if (first) {
    return Err(`${source}: ${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`);
  }

  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return Err(`${source}: ${parsed.error.issues.map(formatIssue).join("; ")}`);
  }
  return Ok(parsed.data);
}

/** Load the config file at `file` (default: the user config path). */
export function loadConfig(file: string = getConfigPath()): HexmodalConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (error) {
    const code = error && typeof error === "object" && "code" in error ? error.code : undefined;
    if (code !== "ENOENT") log.warn(`Cannot read config ${file}:`, error);
    return DEFAULT_CONFIG;
  }

  const result = parseConfig(text, file);
  if (!result.success) {
    log.warn(`Invalid config, using defaults. ${result.error}`);
    return DEFAULT_CONFIG;
  }
  return result.data;
}
