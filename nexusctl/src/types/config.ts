/** Installer configuration types: the flat settings record and profile flags. */

export const PROFILE_NAMES = [
  "full",
  "app-web-subs-remote-db",
  "web-only",
  "db-only",
  "subs-only",
] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

/**
 * Stage enablement flags derived from a profile.
 * `database` and `remoteDatabase` are mutually exclusive.
 */
export type StageFlags = {
  database: boolean;
  remoteDatabase: boolean;
  webServer: boolean;
  app: boolean;
  subs: boolean;
  supervisor: boolean;
  cron: boolean;
  initialJobs: boolean;
  adminUser: boolean;
};

export type StageFlag = keyof StageFlags;

/** Typed view of the configuration file after defaults and validation. */
export type InstallSettings = {
  INSTALL_PROFILE: ProfileName;
  DOMAIN: string;
  ADMIN_EMAIL: string;
  APP_NAME: string;
  APP_URL: string;
  APP_PATH: string;
  APP_REPO: string;
  SUBS_PATH: string;
  SUBS_REPO: string;
  PHP_VERSION: string;
  SWAP_SIZE: string;
  DB_HOST: string;
  DB_PORT: number;
  DB_DATABASE: string;
  DB_USERNAME: string;
  DB_PASSWORD: string;
  PW_API_KEY: string;
  PW_API_MUTATION_KEY: string;
  PW_ALLIANCE_ID: number | null;
  NEXUS_API_TOKEN: string;
  PW_API_TOKEN: string;
  NEXUS_API_URL: string;
  ENABLE_SNAPSHOTS: boolean;
  ENABLE_TLS: boolean;
  REDIS_ENABLED: boolean;
  REDIS_MAXMEMORY: string;
  CREATE_ADMIN_USER: boolean;
  ADMIN_NAME: string;
  ADMIN_PASSWORD: string;
  ADMIN_NATION_ID: number | null;
  ADMIN_ROLE_ID: number | null;
};

export type SettingKey = keyof InstallSettings;

/**
 * Configuration Record: the typed settings plus every raw key/value as it was
 * loaded or prompted (unknown keys included, so they survive a re-persist).
 */
export type ConfigurationRecord = {
  settings: InstallSettings;
  raw: Record<string, string>;
};
