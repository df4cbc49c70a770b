import fs from "node:fs";
import { ERROR_CODES, preconditionError } from "../errors.js";
import { writeFileCommand, type ShellCommand } from "../shell/command.js";
import type { ConfigurationRecord, StageFlags } from "../types/config.js";
import { CONFIG_FILE_STYLE, formatAssignment, parseAssignments } from "./env-file.js";
import { SETTINGS_SCHEMA } from "./schema.js";
import { validateSettings } from "./validator.js";

export const DEFAULT_CONFIG_PATH = "install.env";

export type LoadedConfig = {
  record: ConfigurationRecord;
  flags: StageFlags;
};

/** Read a configuration file into raw key/values, or null when it does not exist. */
export function readConfigFile(filePath: string): Record<string, string> | null {
  if (!fs.existsSync(filePath)) return null;
  const parsed = parseAssignments(fs.readFileSync(filePath, "utf8"));
  if (parsed.errors.length > 0) {
    throw preconditionError(ERROR_CODES.CONFIG_INVALID, `Cannot parse ${filePath}`, parsed.errors);
  }
  return parsed.values;
}

/**
 * Validate raw values into a Configuration Record. Every problem is listed
 * on the thrown precondition error.
 */
export async function toRecord(
  raw: Readonly<Record<string, string>>,
  source: string,
  profileOverride?: string,
): Promise<LoadedConfig> {
  const result = await validateSettings(raw, profileOverride);
  if (!result.ok) {
    throw preconditionError(ERROR_CODES.CONFIG_INVALID, `Invalid configuration in ${source}`, result.errors);
  }
  return { record: result.record, flags: result.flags };
}

/** Load and validate the configuration file at `filePath`. */
export async function loadConfig(filePath: string, profileOverride?: string): Promise<LoadedConfig> {
  const raw = readConfigFile(filePath);
  if (raw === null) {
    throw preconditionError(ERROR_CODES.CONFIG_MISSING, `Configuration file not found: ${filePath}`);
  }
  return toRecord(raw, filePath, profileOverride);
}

/** Render the record as `KEY="value"` lines: schema keys first, then unknown keys. */
export function renderConfigFile(record: ConfigurationRecord): string {
  const lines = ["# nexusctl install configuration"];
  const seen = new Set<string>();
  for (const field of SETTINGS_SCHEMA) {
    const value = record.raw[field.key];
    if (value === undefined) continue;
    lines.push(formatAssignment(field.key, value, CONFIG_FILE_STYLE));
    seen.add(field.key);
  }
  for (const [key, value] of Object.entries(record.raw)) {
    if (!seen.has(key)) lines.push(formatAssignment(key, value, CONFIG_FILE_STYLE));
  }
  return `${lines.join("\n")}\n`;
}

/** The write that persists the record; secrets inside, so owner-only. */
export function persistCommand(filePath: string, record: ConfigurationRecord): ShellCommand {
  return writeFileCommand(filePath, renderConfigFile(record), { mode: "600" });
}
