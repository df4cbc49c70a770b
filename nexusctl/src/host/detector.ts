import type { Logger } from "pino";
import { ERROR_CODES, preconditionError } from "../errors.js";
import type { Host } from "./host.js";

export type PlatformFamily = "debian" | "rhel";

export type PackageManagerName = "apt-get" | "dnf";

export type Platform = {
  readonly family: PlatformFamily;
  readonly packageManager: PackageManagerName;
  readonly osId: string;
  readonly osName: string;
  readonly osVersion: string;
  /** Service account the web server and application processes run as. */
  readonly webUser: string;
};

export const OS_RELEASE_PATH = "/etc/os-release";

/** Conventional service accounts, in probe order. */
export const WEB_USER_CANDIDATES = ["www-data", "nginx", "apache", "http"] as const;
export const DEFAULT_WEB_USER = "www-data";

const DEBIAN_IDS = ["debian", "ubuntu"];
const RHEL_IDS = ["rhel", "centos", "fedora", "rocky", "almalinux", "alma", "ol"];

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve the family from ID / ID_LIKE; null when neither matches. */
export function resolveFamily(osRelease: Record<string, string>): PlatformFamily | null {
  const ids = [osRelease.ID ?? "", ...(osRelease.ID_LIKE ?? "").split(/\s+/)]
    .map((s) => s.toLowerCase())
    .filter((s) => s.length > 0);
  if (ids.some((id) => DEBIAN_IDS.includes(id))) return "debian";
  if (ids.some((id) => RHEL_IDS.includes(id))) return "rhel";
  return null;
}

/** First conventional web account present in /etc/passwd, else www-data. */
export function detectWebUser(host: Host, logger: Logger): string {
  const passwd = host.readFile("/etc/passwd") ?? "";
  const accounts = new Set(
    passwd
      .split("\n")
      .map((line) => line.split(":")[0])
      .filter((name) => name.length > 0),
  );
  for (const candidate of WEB_USER_CANDIDATES) {
    if (accounts.has(candidate)) return candidate;
  }
  logger.warn(`No web service account found (${WEB_USER_CANDIDATES.join(", ")}); defaulting to ${DEFAULT_WEB_USER}`);
  return DEFAULT_WEB_USER;
}

/**
 * Detect the package-manager family and web process identity.
 * Throws a precondition error when os-release is missing or the OS is not
 * Debian-like or RedHat-like.
 */
export function detectPlatform(host: Host, logger: Logger): Platform {
  const content = host.readFile(OS_RELEASE_PATH);
  if (content === null) {
    throw preconditionError(ERROR_CODES.OS_RELEASE_MISSING, `${OS_RELEASE_PATH} not found. Unsupported OS.`);
  }

  const osRelease = parseOsRelease(content);
  const family = resolveFamily(osRelease);
  if (!family) {
    throw preconditionError(
      ERROR_CODES.OS_UNSUPPORTED,
      `Unsupported OS "${osRelease.ID ?? "unknown"}": only Debian-like and RedHat-like systems are supported.`,
    );
  }

  const platform: Platform = {
    family,
    packageManager: family === "debian" ? "apt-get" : "dnf",
    osId: osRelease.ID ?? family,
    osName: osRelease.PRETTY_NAME ?? osRelease.NAME ?? osRelease.ID ?? family,
    osVersion: osRelease.VERSION_ID ?? "unknown",
    webUser: detectWebUser(host, logger),
  };

  logger.debug({ platform }, "Platform detection complete");
  return platform;
}
