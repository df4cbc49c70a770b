import { checkSchema } from "../schema/ajv.js";
import { parseProfileName, resolveProfile } from "../core/profiles.js";
import type { ConfigurationRecord, InstallSettings, ProfileName, SettingKey, StageFlags } from "../types/config.js";
import { normalizeBoolean, SCHEMA_KEYS, SETTINGS_SCHEMA, type SettingField } from "./schema.js";

export type SettingsValidationResult =
  | { ok: true; record: ConfigurationRecord; flags: StageFlags }
  | { ok: false; errors: string[] };

/** Profile named by an override, the raw INSTALL_PROFILE, or `full`. */
export function profileOf(raw: Readonly<Record<string, string>>, override?: string): string {
  const name = (override ?? raw.INSTALL_PROFILE ?? "").trim();
  return name === "" ? "full" : name;
}

/**
 * Fill defaults in schema order. Blank values count as absent. Booleans that
 * parse are normalized to "true"/"false"; anything else is left for the
 * schema to reject.
 */
export function applyDefaults(
  raw: Readonly<Record<string, string>>,
  flags: StageFlags,
  profile: string,
): Record<string, string> {
  const resolved: Record<string, string> = { INSTALL_PROFILE: profile };
  for (const field of SETTINGS_SCHEMA) {
    if (field.key === "INSTALL_PROFILE") continue;
    const given = (raw[field.key] ?? "").trim();
    let value: string | undefined = given !== "" ? given : undefined;
    if (value === undefined && field.default !== undefined) {
      value = typeof field.default === "string" ? field.default : field.default(resolved, flags);
    }
    if (value === undefined) continue;
    if (field.type === "boolean") value = normalizeBoolean(value) ?? value;
    resolved[field.key] = value;
  }
  return resolved;
}

function propertySchema(field: SettingField): Record<string, unknown> {
  switch (field.type) {
    case "boolean":
      return { type: "string", enum: ["true", "false"] };
    case "integer":
      return { type: "string", pattern: "^[0-9]+$" };
    case "profile":
      return { type: "string", minLength: 1 };
    case "string":
      return {
        type: "string",
        minLength: 1,
        ...(field.format ? { format: field.format } : {}),
        ...(field.pattern ? { pattern: field.pattern } : {}),
      };
  }
}

/** JSON Schema for the resolved settings under a given Stage Flag Set. */
export function buildSettingsSchema(flags: StageFlags, resolved: Readonly<Record<string, string>>): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];
  for (const field of SETTINGS_SCHEMA) {
    properties[field.key] = propertySchema(field);
    if (field.required(flags, resolved)) required.push(field.key);
  }
  return { type: "object", required, properties };
}

function coerceSettings(resolved: Readonly<Record<string, string>>, profile: ProfileName): InstallSettings {
  const s = (key: SettingKey): string => resolved[key] ?? "";
  const n = (key: SettingKey): number | null => {
    const text = resolved[key];
    return text === undefined ? null : Number.parseInt(text, 10);
  };
  const b = (key: SettingKey): boolean => resolved[key] === "true";

  return {
    INSTALL_PROFILE: profile,
    DOMAIN: s("DOMAIN"),
    ADMIN_EMAIL: s("ADMIN_EMAIL"),
    APP_NAME: s("APP_NAME"),
    APP_URL: s("APP_URL"),
    APP_PATH: s("APP_PATH"),
    APP_REPO: s("APP_REPO"),
    SUBS_PATH: s("SUBS_PATH"),
    SUBS_REPO: s("SUBS_REPO"),
    PHP_VERSION: s("PHP_VERSION"),
    SWAP_SIZE: s("SWAP_SIZE"),
    DB_HOST: s("DB_HOST"),
    DB_PORT: n("DB_PORT") ?? 3306,
    DB_DATABASE: s("DB_DATABASE"),
    DB_USERNAME: s("DB_USERNAME"),
    DB_PASSWORD: s("DB_PASSWORD"),
    PW_API_KEY: s("PW_API_KEY"),
    PW_API_MUTATION_KEY: s("PW_API_MUTATION_KEY"),
    PW_ALLIANCE_ID: n("PW_ALLIANCE_ID"),
    NEXUS_API_TOKEN: s("NEXUS_API_TOKEN"),
    PW_API_TOKEN: s("PW_API_TOKEN"),
    NEXUS_API_URL: s("NEXUS_API_URL"),
    ENABLE_SNAPSHOTS: b("ENABLE_SNAPSHOTS"),
    ENABLE_TLS: b("ENABLE_TLS"),
    REDIS_ENABLED: b("REDIS_ENABLED"),
    REDIS_MAXMEMORY: s("REDIS_MAXMEMORY"),
    CREATE_ADMIN_USER: b("CREATE_ADMIN_USER"),
    ADMIN_NAME: s("ADMIN_NAME"),
    ADMIN_PASSWORD: s("ADMIN_PASSWORD"),
    ADMIN_NATION_ID: n("ADMIN_NATION_ID"),
    ADMIN_ROLE_ID: n("ADMIN_ROLE_ID"),
  };
}

/**
 * Validate raw key/values against the settings schema for the selected
 * profile. An unknown profile throws a precondition error; every other
 * problem is reported in `errors`.
 */
export async function validateSettings(
  raw: Readonly<Record<string, string>>,
  profileOverride?: string,
): Promise<SettingsValidationResult> {
  const profile = parseProfileName(profileOf(raw, profileOverride));
  const flags = resolveProfile(profile);
  const resolved = applyDefaults(raw, flags, profile);

  const checked = checkSchema<Record<string, string>>(buildSettingsSchema(flags, resolved), resolved, "config");
  if (!checked.ok) return { ok: false, errors: checked.errors };

  const unknown: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!SCHEMA_KEYS.has(key)) unknown[key] = value;
  }
  const settings = coerceSettings(resolved, profile);
  return { ok: true, record: { settings, raw: { ...unknown, ...resolved } }, flags };
}
