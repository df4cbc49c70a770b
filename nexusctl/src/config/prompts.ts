import { createInterface } from "node:readline/promises";
import { ERROR_CODES, preconditionError } from "../errors.js";
import { PROFILE_DESCRIPTIONS, resolveProfile } from "../core/profiles.js";
import { PROFILE_NAMES, type ConfigurationRecord, type ProfileName } from "../types/config.js";
import { normalizeBoolean, SETTINGS_SCHEMA, type SettingField } from "./schema.js";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** Terminal prompter over stdin/stdout. */
export class ReadlinePrompter implements Prompter {
  private readonly rl = createInterface({ input: process.stdin, output: process.stdout });

  ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  close(): void {
    this.rl.close();
  }
}

export const MAX_ATTEMPTS = 3;
const MASK = "********";

/** `[y/N]` answers: only y/yes is true. `[Y/n]` answers: only n/no is false. */
export function coerceYesNo(input: string, defaultYes: boolean): boolean {
  const answer = input.trim().toLowerCase();
  if (defaultYes) return !(answer === "n" || answer === "no");
  return answer === "y" || answer === "yes";
}

/** `1`..`5` select a profile, empty selects `full`, anything else is null. */
export function coerceProfileChoice(input: string): ProfileName | null {
  const answer = input.trim();
  if (answer === "") return "full";
  if (!/^[0-9]+$/.test(answer)) return null;
  return PROFILE_NAMES[Number.parseInt(answer, 10) - 1] ?? null;
}

export function isConfirmation(input: string): boolean {
  const answer = input.trim().toLowerCase();
  return answer === "y" || answer === "yes";
}

async function askProfile(prompter: Prompter, write: (text: string) => void): Promise<ProfileName> {
  write("Install profiles:\n");
  PROFILE_NAMES.forEach((name, i) => write(`  ${i + 1}) ${name.padEnd(24)} ${PROFILE_DESCRIPTIONS[name]}\n`));
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const choice = coerceProfileChoice(await prompter.ask("Install profile [1]: "));
    if (choice) return choice;
    write(`Please enter a number between 1 and ${PROFILE_NAMES.length}.\n`);
  }
  throw preconditionError(ERROR_CODES.PROMPT_UNANSWERED, "No valid install profile selected");
}

async function askField(
  prompter: Prompter,
  field: SettingField,
  fallback: string | undefined,
  required: boolean,
  write: (text: string) => void,
): Promise<string | undefined> {
  if (field.type === "boolean") {
    const defaultYes = normalizeBoolean(fallback ?? "") === "true";
    const answer = await prompter.ask(`${field.description}? ${defaultYes ? "[Y/n]" : "[y/N]"}: `);
    return coerceYesNo(answer, defaultYes) ? "true" : "false";
  }

  const shown = fallback === undefined ? "" : field.secret ? ` [${MASK}]` : ` [${fallback}]`;
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const answer = (await prompter.ask(`${field.description}${shown}: `)).trim();
    if (answer === "") {
      if (fallback !== undefined || !required) return fallback;
      write(`${field.key} is required.\n`);
      continue;
    }
    if (field.type === "integer" && !/^[0-9]+$/.test(answer)) {
      write(`${field.key} must be a whole number.\n`);
      continue;
    }
    return answer;
  }
  throw preconditionError(ERROR_CODES.PROMPT_UNANSWERED, `No value given for ${field.key}`);
}

/**
 * Walk the ordered prompt list. Only prompts relevant to the selected
 * profile are asked; `defaults` (an existing configuration, say) take
 * precedence over the schema's own defaults.
 */
export async function promptInteractive(
  prompter: Prompter,
  opts: { defaults?: Readonly<Record<string, string>>; profile?: string; write: (text: string) => void },
): Promise<Record<string, string>> {
  const defaults = opts.defaults ?? {};
  const profile = opts.profile ?? (await askProfile(prompter, opts.write));
  const flags = resolveProfile(profile);
  const answers: Record<string, string> = { ...defaults, INSTALL_PROFILE: profile };

  for (const field of SETTINGS_SCHEMA) {
    if (field.key === "INSTALL_PROFILE") continue;
    const required = field.required(flags, answers);
    if (!required && !(field.askWhen?.(flags) ?? false)) continue;

    const given = defaults[field.key];
    const schemaDefault =
      typeof field.default === "function" ? field.default(answers, flags) : field.default;
    const fallback = given !== undefined && given !== "" ? given : schemaDefault;

    const value = await askField(prompter, field, fallback, required, opts.write);
    if (value !== undefined) answers[field.key] = value;
  }
  return answers;
}

/** Confirmation summary; secret values are masked. */
export function renderConfirmation(record: ConfigurationRecord): string {
  const lines = ["Configuration summary:"];
  for (const field of SETTINGS_SCHEMA) {
    const value = record.raw[field.key];
    if (value === undefined || value === "") continue;
    lines.push(`  ${field.key.padEnd(20)} ${field.secret ? MASK : value}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Show the summary and require an explicit y/yes. */
export async function confirmRecord(
  prompter: Prompter,
  record: ConfigurationRecord,
  write: (text: string) => void,
): Promise<boolean> {
  write(renderConfirmation(record));
  return isConfirmation(await prompter.ask("Proceed with installation? [y/N]: "));
}
