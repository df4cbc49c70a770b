import { readConfigFile } from "../config/loader.js";
import { validateSettings } from "../config/validator.js";
import { errorMessage, InstallerError } from "../errors.js";
import { loadCatalog } from "../host/catalog.js";
import type { ProfileName } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; profile: ProfileName } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, extra?: Pick<Diagnostic, "path">): Diagnostic {
  return { level, code, message, ...extra };
}

function fromError(err: unknown, path?: string): Diagnostic[] {
  if (err instanceof InstallerError) {
    const details = err.details ?? [];
    if (details.length === 0) return [diag("error", err.code, err.message, { path })];
    return details.map((d) => diag("error", err.code, d, { path }));
  }
  return [diag("error", "UNEXPECTED", errorMessage(err), { path })];
}

/** Check the platform catalog and a configuration file without touching the host. */
export async function validateAll(opts: { configPath: string; profile?: string }): Promise<ValidateResult> {
  try {
    await loadCatalog();
  } catch (err) {
    return { ok: false, errors: fromError(err) };
  }

  let raw: Record<string, string> | null;
  try {
    raw = readConfigFile(opts.configPath);
  } catch (err) {
    return { ok: false, errors: fromError(err, opts.configPath) };
  }
  if (raw === null) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_MISSING", `Configuration file not found: ${opts.configPath}`, { path: opts.configPath })],
    };
  }

  try {
    const result = await validateSettings(raw, opts.profile);
    if (!result.ok) {
      return { ok: false, errors: result.errors.map((e) => diag("error", "CONFIG_INVALID", e, { path: opts.configPath })) };
    }
    return { ok: true, profile: result.record.settings.INSTALL_PROFILE };
  } catch (err) {
    return { ok: false, errors: fromError(err, opts.configPath) };
  }
}
