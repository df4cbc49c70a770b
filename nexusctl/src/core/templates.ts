import fs from "node:fs";
import path from "node:path";
import { ERROR_CODES, InstallerError } from "../errors.js";
import { PACKAGE_ROOT } from "../host/catalog.js";

export const TEMPLATE_DIR = path.join(PACKAGE_ROOT, "templates");

export type TemplateName =
  | "nginx-site.conf"
  | "nginx-site-tls.conf"
  | "nginx-site-body.conf"
  | "supervisor-worker.conf"
  | "supervisor-subs.conf";

const PLACEHOLDER = /\{\{([A-Z0-9_]+)\}\}/g;

export function loadTemplate(name: TemplateName, dir = TEMPLATE_DIR): string {
  return fs.readFileSync(path.join(dir, name), "utf8");
}

/**
 * Replace `{{KEY}}` placeholders. A placeholder without a value is an error
 * rather than text left in a config file.
 */
export function renderTemplate(text: string, vars: Readonly<Record<string, string>>): string {
  const missing = new Set<string>();
  const out = text.replace(PLACEHOLDER, (whole, key: string) => {
    const value = vars[key];
    if (value === undefined) {
      missing.add(key);
      return whole;
    }
    return value;
  });
  if (missing.size > 0) {
    throw new InstallerError(
      "essential",
      ERROR_CODES.TEMPLATE_INVALID,
      `Template placeholders without a value: ${[...missing].join(", ")}`,
    );
  }
  return out;
}
