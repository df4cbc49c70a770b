import { PROFILE_DESCRIPTIONS, resolveProfile } from "../core/profiles.js";
import { PROFILE_NAMES, type ProfileName, type StageFlag, type StageFlags } from "../types/config.js";

export type ProfileRow = { profile: ProfileName; description: string; flags: StageFlags };

const FLAG_ORDER: StageFlag[] = [
  "database",
  "remoteDatabase",
  "webServer",
  "app",
  "subs",
  "supervisor",
  "cron",
  "initialJobs",
  "adminUser",
];

export function listProfiles(): ProfileRow[] {
  return PROFILE_NAMES.map((profile) => ({
    profile,
    description: PROFILE_DESCRIPTIONS[profile],
    flags: resolveProfile(profile),
  }));
}

/** Profile names with the flags each one turns on. */
export function renderProfiles(rows: ProfileRow[]): string {
  const lines = rows.map((row) => {
    const on = FLAG_ORDER.filter((flag) => row.flags[flag]);
    return `${row.profile.padEnd(24)} ${row.description}\n${" ".repeat(25)}on: ${on.join(", ")}`;
  });
  return `${lines.join("\n")}\n`;
}
