import { CONFIG_FILE_STYLE, setKey } from "../config/env-file.js";
import { SCHEMA_KEYS } from "../config/schema.js";
import { errorMessage } from "../errors.js";

export type ConfigSetResult =
  | { ok: true; key: string; known: boolean }
  | { ok: false; error: string };

/** Upsert one key in the installer's configuration file. Unknown keys are kept but flagged. */
export function configSet(opts: { configPath: string; key: string; value: string }): ConfigSetResult {
  try {
    setKey(opts.configPath, opts.key, opts.value, CONFIG_FILE_STYLE);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  return { ok: true, key: opts.key, known: SCHEMA_KEYS.has(opts.key) };
}
