/**
 * Settings schema: every key the installer reads, with its type, default and
 * the profile flags under which it is required. Order matters: defaults may
 * refer to keys resolved before them, and the configuration file is written
 * in this order.
 */
import type { SettingKey, StageFlags } from "../types/config.js";

export type FieldType = "string" | "boolean" | "integer" | "profile";

export type ResolvedValues = Readonly<Record<string, string>>;

export type SettingField = {
  readonly key: SettingKey;
  readonly type: FieldType;
  readonly description: string;
  readonly default?: string | ((resolved: ResolvedValues, flags: StageFlags) => string | undefined);
  readonly required: (flags: StageFlags, resolved: ResolvedValues) => boolean;
  /** Optional keys still worth asking for interactively. */
  readonly askWhen?: (flags: StageFlags) => boolean;
  readonly format?: "hostname" | "email" | "uri";
  readonly pattern?: string;
  readonly secret?: boolean;
};

const always = (): boolean => true;
const never = (): boolean => false;
const anyOf =
  (...names: Array<keyof StageFlags>) =>
  (flags: StageFlags): boolean =>
    names.some((name) => flags[name]);

const TRUE_WORDS = new Set(["true", "yes", "y", "1", "on"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", "off"]);

/** Canonical "true"/"false", or null when the text is not a boolean. */
export function normalizeBoolean(text: string): "true" | "false" | null {
  const lower = text.trim().toLowerCase();
  if (TRUE_WORDS.has(lower)) return "true";
  if (FALSE_WORDS.has(lower)) return "false";
  return null;
}

function isOn(resolved: ResolvedValues, key: SettingKey): boolean {
  return normalizeBoolean(resolved[key] ?? "") === "true";
}

const usesDatabase = anyOf("database", "remoteDatabase", "app");
const seedsAdmin = (flags: StageFlags, resolved: ResolvedValues): boolean =>
  flags.adminUser && isOn(resolved, "CREATE_ADMIN_USER");

export const DEFAULT_APP_REPO = "https://github.com/Yosodog/Nexus-AMS.git";
export const DEFAULT_SUBS_REPO = "https://github.com/Yosodog/Nexus-AMS-Subs.git";

export const SETTINGS_SCHEMA: readonly SettingField[] = [
  { key: "INSTALL_PROFILE", type: "profile", description: "Install profile", default: "full", required: always },
  {
    key: "DOMAIN",
    type: "string",
    description: "Primary domain",
    format: "hostname",
    required: anyOf("webServer", "app"),
  },
  {
    key: "ADMIN_EMAIL",
    type: "string",
    description: "Administrator / certificate contact email",
    format: "email",
    required: anyOf("webServer", "app"),
  },
  { key: "APP_NAME", type: "string", description: "Application name", default: "Nexus AMS", required: anyOf("app") },
  {
    key: "APP_URL",
    type: "string",
    description: "Public application URL",
    format: "uri",
    default: (r) => (r.DOMAIN ? `https://${r.DOMAIN}` : undefined),
    required: anyOf("app"),
  },
  { key: "APP_PATH", type: "string", description: "Application path", default: "/var/www/nexus", required: anyOf("app", "webServer") },
  { key: "APP_REPO", type: "string", description: "Application repository", default: DEFAULT_APP_REPO, required: anyOf("app") },
  { key: "SUBS_PATH", type: "string", description: "Subs service path", default: "/var/www/nexus-subs", required: anyOf("subs") },
  { key: "SUBS_REPO", type: "string", description: "Subs repository", default: DEFAULT_SUBS_REPO, required: anyOf("subs") },
  { key: "PHP_VERSION", type: "string", description: "PHP version", default: "8.4", required: anyOf("app") },
  {
    key: "SWAP_SIZE",
    type: "string",
    description: "Swap file size",
    default: "4G",
    pattern: "^[0-9]+[KMGTkmgt]?$",
    required: anyOf("app", "subs"),
  },
  {
    key: "DB_HOST",
    type: "string",
    description: "Database host",
    default: (_r, flags) => (flags.remoteDatabase ? undefined : "127.0.0.1"),
    required: usesDatabase,
  },
  { key: "DB_PORT", type: "integer", description: "Database port", default: "3306", required: usesDatabase },
  { key: "DB_DATABASE", type: "string", description: "Database name", default: "nexus", required: usesDatabase },
  { key: "DB_USERNAME", type: "string", description: "Database user", default: "nexus", required: usesDatabase },
  { key: "DB_PASSWORD", type: "string", description: "Database password", secret: true, required: usesDatabase },
  { key: "PW_API_KEY", type: "string", description: "Politics & War API key", secret: true, required: anyOf("app") },
  {
    key: "PW_API_MUTATION_KEY",
    type: "string",
    description: "Politics & War mutation key",
    secret: true,
    required: never,
    askWhen: anyOf("app"),
  },
  { key: "PW_ALLIANCE_ID", type: "integer", description: "Alliance ID", required: anyOf("app") },
  { key: "NEXUS_API_TOKEN", type: "string", description: "Nexus API token", secret: true, required: anyOf("app", "subs") },
  { key: "PW_API_TOKEN", type: "string", description: "Politics & War API token for Subs", secret: true, required: anyOf("subs") },
  {
    key: "NEXUS_API_URL",
    type: "string",
    description: "Nexus API URL used by Subs",
    format: "uri",
    default: (r) => (r.APP_URL ? `${r.APP_URL}/api` : r.DOMAIN ? `https://${r.DOMAIN}/api` : undefined),
    required: anyOf("subs"),
  },
  { key: "ENABLE_SNAPSHOTS", type: "boolean", description: "Enable Subs snapshots", default: "false", required: anyOf("subs") },
  { key: "ENABLE_TLS", type: "boolean", description: "Issue a TLS certificate", default: "true", required: anyOf("webServer") },
  { key: "REDIS_ENABLED", type: "boolean", description: "Install Redis", default: "false", required: anyOf("app") },
  {
    key: "REDIS_MAXMEMORY",
    type: "string",
    description: "Redis maxmemory",
    default: "256mb",
    required: (flags, r) => flags.app && isOn(r, "REDIS_ENABLED"),
  },
  { key: "CREATE_ADMIN_USER", type: "boolean", description: "Create an admin user", default: "false", required: anyOf("adminUser") },
  { key: "ADMIN_NAME", type: "string", description: "Admin name", required: seedsAdmin },
  { key: "ADMIN_PASSWORD", type: "string", description: "Admin password", secret: true, required: seedsAdmin },
  { key: "ADMIN_NATION_ID", type: "integer", description: "Admin nation ID", required: seedsAdmin },
  { key: "ADMIN_ROLE_ID", type: "integer", description: "Admin role ID", default: "1", required: seedsAdmin },
];

export const SCHEMA_KEYS: ReadonlySet<string> = new Set(SETTINGS_SCHEMA.map((f) => f.key));
