import fs from "node:fs";

/**
 * How a `key value` assignment is written.
 * - `separator`: "=" for env-style files, " " for redis.conf-style files.
 * - `quote`: "auto" writes safe values bare and quotes the rest; "always" quotes every value.
 * - `shellSafe`: also escape backticks, for files a shell may `source`.
 */
export type AssignmentStyle = {
  readonly separator: "=" | " ";
  readonly quote: "auto" | "always";
  readonly shellSafe: boolean;
};

/** Application `.env` files (dotenv). */
export const DOTENV_STYLE: AssignmentStyle = { separator: "=", quote: "auto", shellSafe: false };

/** The installer's own `KEY="value"` configuration file. */
export const CONFIG_FILE_STYLE: AssignmentStyle = { separator: "=", quote: "always", shellSafe: true };

/** Space-delimited directives such as redis.conf. */
export const DIRECTIVE_STYLE: AssignmentStyle = { separator: " ", quote: "auto", shellSafe: false };

const SAFE_BARE = /^[A-Za-z0-9_@%+,./:-]+$/;
const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DIRECTIVE_KEY = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export type ParsedAssignments = {
  values: Record<string, string>;
  /** Keys in first-seen order. */
  order: string[];
  errors: string[];
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function quoteValue(value: string, style: AssignmentStyle): string {
  let escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\$/g, "\\$")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
  if (style.shellSafe) escaped = escaped.replace(/`/g, "\\`");
  return `"${escaped}"`;
}

export function formatAssignment(key: string, value: string, style: AssignmentStyle): string {
  const bare = style.quote === "auto" && (SAFE_BARE.test(value) || (value === "" && style.separator === "="));
  return `${key}${style.separator}${bare ? value : quoteValue(value, style)}`;
}

function unquoteDouble(body: string): { value: string; rest: string } | null {
  let value = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "\\" && i + 1 < body.length) {
      const next = body[++i];
      value += next === "n" ? "\n" : next === "r" ? "\r" : next === "t" ? "\t" : next;
      continue;
    }
    if (ch === '"') return { value, rest: body.slice(i + 1) };
    value += ch;
  }
  return null;
}

/** Parse a single value (the text after the separator). */
export function parseValue(text: string): string | null {
  const trimmed = text.trim();
  if (trimmed.startsWith('"')) {
    return unquoteDouble(trimmed.slice(1))?.value ?? null;
  }
  if (trimmed.startsWith("'")) {
    const end = trimmed.indexOf("'", 1);
    return end === -1 ? null : trimmed.slice(1, end);
  }
  const comment = trimmed.search(/\s#/);
  return (comment === -1 ? trimmed : trimmed.slice(0, comment)).trim();
}

/**
 * Parse `KEY=value` lines. Blank lines and `#` comments are ignored, an
 * `export ` prefix is accepted, and the last assignment of a key wins.
 */
export function parseAssignments(content: string): ParsedAssignments {
  const values: Record<string, string> = {};
  const order: string[] = [];
  const errors: string[] = [];

  content.split(/\r?\n/).forEach((raw, idx) => {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) return;
    const match = line.replace(/^export\s+/, "").match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/);
    if (!match) {
      errors.push(`line ${idx + 1}: expected KEY=value`);
      return;
    }
    const value = parseValue(match[2]);
    if (value === null) {
      errors.push(`line ${idx + 1}: unterminated quoted value for ${match[1]}`);
      return;
    }
    if (!(match[1] in values)) order.push(match[1]);
    values[match[1]] = value;
  });

  return { values, order, errors };
}

/** Read one key from assignment text, or null when absent. */
export function readAssignment(content: string, key: string, style: AssignmentStyle = DOTENV_STYLE): string | null {
  const matcher = lineMatcher(key, style);
  for (const line of content.split(/\r?\n/)) {
    if (!matcher.test(line)) continue;
    const body = line.replace(matcher, "");
    return parseValue(body);
  }
  return null;
}

function lineMatcher(key: string, style: AssignmentStyle): RegExp {
  const k = escapeRegExp(key);
  return style.separator === "="
    ? new RegExp(`^\\s*(?:export\\s+)?${k}\\s*=`)
    : new RegExp(`^\\s*${k}(?=\\s|$)`);
}

/**
 * Upsert `key` in assignment text. The first existing assignment is replaced
 * in place and later duplicates are dropped; otherwise one line is appended.
 */
export function upsertAssignment(content: string, key: string, value: string, style: AssignmentStyle = DOTENV_STYLE): string {
  const keyPattern = style.separator === "=" ? ENV_KEY : DIRECTIVE_KEY;
  if (!keyPattern.test(key)) throw new Error(`Invalid key: ${JSON.stringify(key)}`);

  const rendered = formatAssignment(key, value, style);
  const matcher = lineMatcher(key, style);
  const out: string[] = [];
  let replaced = false;

  for (const line of content.split("\n")) {
    if (matcher.test(line)) {
      if (!replaced) out.push(rendered);
      replaced = true;
      continue;
    }
    out.push(line);
  }

  if (!replaced) {
    if (out[out.length - 1] === "") {
      out[out.length - 1] = rendered;
    } else {
      out.push(rendered);
    }
    out.push("");
  }
  return out.join("\n");
}

/** Apply several upserts in order. */
export function upsertAll(content: string, entries: Array<[string, string]>, style: AssignmentStyle = DOTENV_STYLE): string {
  return entries.reduce((acc, [key, value]) => upsertAssignment(acc, key, value, style), content);
}

/** Idempotent key/value upsert into a flat config file (created when missing). */
export function setKey(file: string, key: string, value: string, style: AssignmentStyle = DOTENV_STYLE): void {
  const current = fs.existsSync(file) ? fs.readFileSync(file, "utf8") : "";
  fs.writeFileSync(file, upsertAssignment(current, key, value, style), "utf8");
}
