import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { checkSchema } from "../schema/ajv.js";
import { ERROR_CODES, preconditionError } from "../errors.js";
import type { PlatformFamily } from "./detector.js";

/** Directory holding data/, schemas/ and templates/ (one level above src/ or dist/). */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
export const DEFAULT_CATALOG_PATH = path.join(PACKAGE_ROOT, "data", "platforms.yaml");
export const DEFAULT_CATALOG_SCHEMA_PATH = path.join(PACKAGE_ROOT, "schemas", "platforms.schema.json");

export type PackageGroup = "base" | "php" | "database" | "web" | "cache" | "node" | "certbot" | "supervisor";

export type ServiceRole = "php" | "database" | "web" | "cache" | "supervisor" | "cron";

/** Third-party package repository, added only when `marker` matches nothing in `listDir`. */
export type RepositorySpec = {
  listDir: string;
  marker: string;
  add: string[];
};

export type PlatformEntry = {
  packages: Record<PackageGroup, string[]>;
  services: Record<ServiceRole, string>;
  paths: {
    phpFpmSockets: string[];
    redisConfig: string;
    nginxSiteDir: string;
    /** Debian-style sites-enabled directory; absent where the site dir is included directly. */
    nginxEnabledDir?: string;
    supervisorIncludeDir: string;
    supervisorExtension: ".conf" | ".ini";
  };
  repositories: {
    php: RepositorySpec;
    node: RepositorySpec;
  };
};

export type PlatformCatalog = Record<PlatformFamily, PlatformEntry>;

/** Substitute the configured PHP version into "{php}" placeholders. */
export function withPhpVersion(text: string, phpVersion: string): string {
  return text.split("{php}").join(phpVersion);
}

/**
 * Load the per-family catalog (packages, services, paths, repositories) and
 * validate it against its JSON Schema.
 */
export async function loadCatalog(
  catalogPath = DEFAULT_CATALOG_PATH,
  schemaPath = DEFAULT_CATALOG_SCHEMA_PATH,
): Promise<PlatformCatalog> {
  if (!fs.existsSync(catalogPath)) {
    throw preconditionError(ERROR_CODES.CATALOG_INVALID, `Platform catalog not found: ${catalogPath}`);
  }
  const doc: unknown = YAML.parse(fs.readFileSync(catalogPath, "utf8"));
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));

  const checked = checkSchema<PlatformCatalog>(schema, doc, "catalog");
  if (!checked.ok) {
    throw preconditionError(
      ERROR_CODES.CATALOG_INVALID,
      `Platform catalog invalid (${catalogPath}): ${checked.errors.join(", ")}`,
    );
  }
  return checked.value;
}
