import { ERROR_CODES, preconditionError } from "../errors.js";
import { PROFILE_NAMES, type ProfileName, type StageFlags } from "../types/config.js";

const ALL_OFF: StageFlags = {
  database: false,
  remoteDatabase: false,
  webServer: false,
  app: false,
  subs: false,
  supervisor: false,
  cron: false,
  initialJobs: false,
  adminUser: false,
};

/** The `full` profile: everything on, database local. */
const BASELINE: StageFlags = {
  database: true,
  remoteDatabase: false,
  webServer: true,
  app: true,
  subs: true,
  supervisor: true,
  cron: true,
  initialJobs: true,
  adminUser: true,
};

export const PROFILE_TABLE: Readonly<Record<ProfileName, Readonly<StageFlags>>> = {
  full: BASELINE,
  "app-web-subs-remote-db": { ...BASELINE, database: false, remoteDatabase: true },
  "web-only": { ...BASELINE, database: false, remoteDatabase: true, subs: false },
  "db-only": { ...ALL_OFF, database: true },
  "subs-only": { ...ALL_OFF, subs: true, supervisor: true },
};

export const PROFILE_DESCRIPTIONS: Readonly<Record<ProfileName, string>> = {
  full: "Everything on one host (database, web, app, subs)",
  "app-web-subs-remote-db": "Web, app and subs; database on another host",
  "web-only": "Web and app; database on another host, no subs",
  "db-only": "Database server only",
  "subs-only": "Subs service only",
};

export function isProfileName(name: string): name is ProfileName {
  return PROFILE_NAMES.some((p) => p === name);
}

export function parseProfileName(name: string): ProfileName {
  if (!isProfileName(name)) {
    throw preconditionError(
      ERROR_CODES.PROFILE_UNKNOWN,
      `Unknown install profile "${name}" (expected one of: ${PROFILE_NAMES.join(", ")})`,
    );
  }
  return name;
}

/** Resolve a profile name to a fresh Stage Flag Set. */
export function resolveProfile(name: string): StageFlags {
  const flags = { ...PROFILE_TABLE[parseProfileName(name)] };
  if (flags.database && flags.remoteDatabase) {
    throw new Error(`Profile ${name} enables both a local and a remote database`);
  }
  return flags;
}
