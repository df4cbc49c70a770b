import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { applyDefaults, profileOf, validateSettings } from "../src/config/validator.js";
import { loadConfig, persistCommand, readConfigFile, renderConfigFile } from "../src/config/loader.js";
import { normalizeBoolean, SETTINGS_SCHEMA } from "../src/config/schema.js";
import {
  coerceProfileChoice,
  coerceYesNo,
  confirmRecord,
  isConfirmation,
  promptInteractive,
  renderConfirmation,
} from "../src/config/prompts.js";
import { resolveProfile } from "../src/core/profiles.js";
import { InstallerError } from "../src/errors.js";
import { configText, FULL_CONFIG, ScriptedPrompter } from "./helpers/fixtures.js";

async function expectInstallerError(promise: Promise<unknown>): Promise<InstallerError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof InstallerError) return err;
    throw err;
  }
  throw new Error("expected an InstallerError");
}

describe("settings defaults", () => {
  it("falls back to the full profile", () => {
    expect(profileOf({})).toBe("full");
    expect(profileOf({ INSTALL_PROFILE: "  " })).toBe("full");
    expect(profileOf({ INSTALL_PROFILE: "db-only" })).toBe("db-only");
    expect(profileOf({ INSTALL_PROFILE: "db-only" }, "web-only")).toBe("web-only");
  });

  it("derives URLs from the domain and normalizes booleans", () => {
    const resolved = applyDefaults(
      { DOMAIN: "nexus.example.com", ENABLE_TLS: "no", REDIS_ENABLED: "Yes" },
      resolveProfile("full"),
      "full",
    );
    expect(resolved.APP_URL).toBe("https://nexus.example.com");
    expect(resolved.NEXUS_API_URL).toBe("https://nexus.example.com/api");
    expect(resolved.APP_PATH).toBe("/var/www/nexus");
    expect(resolved.DB_HOST).toBe("127.0.0.1");
    expect(resolved.ENABLE_TLS).toBe("false");
    expect(resolved.REDIS_ENABLED).toBe("true");
  });

  it("leaves DB_HOST unset for remote databases", () => {
    const resolved = applyDefaults({}, resolveProfile("web-only"), "web-only");
    expect(resolved.DB_HOST).toBeUndefined();
  });

  it("treats blank values as absent", () => {
    const resolved = applyDefaults({ PHP_VERSION: "" }, resolveProfile("full"), "full");
    expect(resolved.PHP_VERSION).toBe("8.4");
  });

  it("normalizes boolean words", () => {
    expect(["true", "YES", "y", "1", "on"].map(normalizeBoolean)).toEqual(["true", "true", "true", "true", "true"]);
    expect(["false", "No", "n", "0", "off"].map(normalizeBoolean)).toEqual(["false", "false", "false", "false", "false"]);
    expect(normalizeBoolean("maybe")).toBeNull();
  });
});

describe("validateSettings", () => {
  it("types a complete full configuration", async () => {
    const result = await validateSettings(FULL_CONFIG);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { settings } = result.record;
    expect(settings.INSTALL_PROFILE).toBe("full");
    expect(settings.DB_PORT).toBe(3306);
    expect(settings.PW_ALLIANCE_ID).toBe(1234);
    expect(settings.ADMIN_ROLE_ID).toBe(1);
    expect(settings.ENABLE_TLS).toBe(true);
    expect(settings.ENABLE_SNAPSHOTS).toBe(false);
    expect(settings.PW_API_MUTATION_KEY).toBe("");
    expect(result.flags).toEqual(resolveProfile("full"));
  });

  it("lists every missing required key", async () => {
    const result = await validateSettings({ INSTALL_PROFILE: "full" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toContain("config must have required property 'DOMAIN'");
    expect(result.errors).toContain("config must have required property 'DB_PASSWORD'");
    expect(result.errors).toContain("config must have required property 'PW_API_TOKEN'");
    expect(result.errors).not.toContain("config must have required property 'ADMIN_NAME'");
  });

  it("requires admin fields only when admin creation is on", async () => {
    const result = await validateSettings({ ...FULL_CONFIG, ADMIN_NAME: "", ADMIN_PASSWORD: "" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual([
      "config must have required property 'ADMIN_NAME'",
      "config must have required property 'ADMIN_PASSWORD'",
    ]);

    const off = await validateSettings({ ...FULL_CONFIG, CREATE_ADMIN_USER: "false", ADMIN_NAME: "", ADMIN_PASSWORD: "" });
    expect(off.ok).toBe(true);
  });

  it("rejects malformed values", async () => {
    const result = await validateSettings({ ...FULL_CONFIG, DB_PORT: "33o6", ENABLE_TLS: "maybe", ADMIN_EMAIL: "nobody" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toContain('config/ADMIN_EMAIL must match format "email"');
    expect(result.errors).toContain('config/DB_PORT must match pattern "^[0-9]+$"');
    expect(result.errors).toContain("config/ENABLE_TLS must be equal to one of the allowed values");
  });

  it("accepts swap sizes the allocator understands and nothing else", async () => {
    expect((await validateSettings({ ...FULL_CONFIG, SWAP_SIZE: "512m" })).ok).toBe(true);
    for (const size of ["4GB", "4G; reboot", "$(id)"]) {
      const result = await validateSettings({ ...FULL_CONFIG, SWAP_SIZE: size });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual(['config/SWAP_SIZE must match pattern "^[0-9]+[KMGTkmgt]?$"']);
    }
  });

  it("needs only database settings for db-only", async () => {
    const result = await validateSettings({ INSTALL_PROFILE: "db-only", DB_PASSWORD: "test-secret" });
    expect(result.ok).toBe(true);
  });

  it("keeps unknown keys in the raw record", async () => {
    const result = await validateSettings({ ...FULL_CONFIG, CUSTOM_FLAG: "kept" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.raw.CUSTOM_FLAG).toBe("kept");
  });

  it("applies a profile override", async () => {
    const result = await validateSettings({ ...FULL_CONFIG }, "db-only");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.settings.INSTALL_PROFILE).toBe("db-only");
    expect(result.flags.app).toBe(false);
  });

  it("throws for an unknown profile", async () => {
    const err = await expectInstallerError(validateSettings({ INSTALL_PROFILE: "cluster" }));
    expect(err.code).toBe("PROFILE_UNKNOWN");
  });
});

describe("configuration file", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("returns null for a missing file", () => {
    expect(readConfigFile(path.join(tmp, "install.env"))).toBeNull();
  });

  it("fails with CONFIG_MISSING when there is nothing to load", async () => {
    const err = await expectInstallerError(loadConfig(path.join(tmp, "install.env")));
    expect(err.kind).toBe("precondition");
    expect(err.code).toBe("CONFIG_MISSING");
  });

  it("fails with CONFIG_INVALID listing parse errors", () => {
    const file = path.join(tmp, "install.env");
    fs.writeFileSync(file, 'DOMAIN="nexus.example.com\n');
    try {
      readConfigFile(file);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(InstallerError);
      if (err instanceof InstallerError) {
        expect(err.code).toBe("CONFIG_INVALID");
        expect(err.details).toEqual(["line 1: unterminated quoted value for DOMAIN"]);
      }
    }
  });

  it("fails with CONFIG_INVALID listing validation errors", async () => {
    const file = path.join(tmp, "install.env");
    fs.writeFileSync(file, configText({ INSTALL_PROFILE: "db-only" }));
    const err = await expectInstallerError(loadConfig(file));
    expect(err.code).toBe("CONFIG_INVALID");
    expect(err.details).toEqual(["config must have required property 'DB_PASSWORD'"]);
  });

  it("loads a valid file", async () => {
    const file = path.join(tmp, "install.env");
    fs.writeFileSync(file, configText(FULL_CONFIG));
    const loaded = await loadConfig(file);
    expect(loaded.record.settings.DOMAIN).toBe("nexus.example.com");
    expect(loaded.flags.database).toBe(true);
  });

  it("renders schema keys in order, then unknown keys", async () => {
    const result = await validateSettings({ INSTALL_PROFILE: "db-only", DB_PASSWORD: 'pa"ss', ZZZ_EXTRA: "1" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const lines = renderConfigFile(result.record).trimEnd().split("\n");
    expect(lines[0]).toBe("# nexusctl install configuration");
    expect(lines[1]).toBe('INSTALL_PROFILE="db-only"');
    expect(lines).toContain('DB_PASSWORD="pa\\"ss"');
    expect(lines[lines.length - 1]).toBe('ZZZ_EXTRA="1"');

    const schemaOrder = SETTINGS_SCHEMA.map((f) => f.key);
    const written = lines.slice(1, -1).map((line) => line.split("=")[0]);
    const positions = written.map((key) => schemaOrder.findIndex((k) => k === key));
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("round-trips through the parser", async () => {
    const result = await validateSettings({ ...FULL_CONFIG, ADMIN_PASSWORD: "p$ss `w` \"x\"" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const file = path.join(tmp, "install.env");
    fs.writeFileSync(file, renderConfigFile(result.record));
    const reloaded = await loadConfig(file);
    expect(reloaded.record.settings.ADMIN_PASSWORD).toBe("p$ss `w` \"x\"");
  });

  it("persists with owner-only permissions", async () => {
    const result = await validateSettings({ INSTALL_PROFILE: "db-only", DB_PASSWORD: "test-secret" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const cmd = persistCommand("/etc/nexus/install.env", result.record);
    expect(cmd.line).toBe("mkdir -p /etc/nexus && cat > /etc/nexus/install.env && chmod 600 /etc/nexus/install.env");
    expect(cmd.input).toBe(renderConfigFile(result.record));
  });
});

describe("prompt coercion", () => {
  it("yes/no prompts", () => {
    expect(coerceYesNo("y", false)).toBe(true);
    expect(coerceYesNo("YES", false)).toBe(true);
    expect(coerceYesNo("", false)).toBe(false);
    expect(coerceYesNo("sure", false)).toBe(false);
    expect(coerceYesNo("", true)).toBe(true);
    expect(coerceYesNo("N", true)).toBe(false);
    expect(coerceYesNo("no", true)).toBe(false);
    expect(coerceYesNo("nope", true)).toBe(true);
  });

  it("profile menu", () => {
    expect(coerceProfileChoice("")).toBe("full");
    expect(coerceProfileChoice("1")).toBe("full");
    expect(coerceProfileChoice("2")).toBe("app-web-subs-remote-db");
    expect(coerceProfileChoice("3")).toBe("web-only");
    expect(coerceProfileChoice("4")).toBe("db-only");
    expect(coerceProfileChoice("5")).toBe("subs-only");
    expect(coerceProfileChoice("6")).toBeNull();
    expect(coerceProfileChoice("0")).toBeNull();
    expect(coerceProfileChoice("full")).toBeNull();
  });

  it("confirmation", () => {
    expect(isConfirmation("y")).toBe(true);
    expect(isConfirmation("Yes")).toBe(true);
    expect(isConfirmation("")).toBe(false);
    expect(isConfirmation("yep")).toBe(false);
  });
});

describe("promptInteractive", () => {
  it("asks only the database prompts for db-only", async () => {
    const prompter = new ScriptedPrompter(["4", "", "", "", "", "test-secret"]);
    const out: string[] = [];
    const answers = await promptInteractive(prompter, { write: (t) => out.push(t) });
    expect(prompter.questions).toEqual([
      "Install profile [1]: ",
      "Database host [127.0.0.1]: ",
      "Database port [3306]: ",
      "Database name [nexus]: ",
      "Database user [nexus]: ",
      "Database password: ",
    ]);
    expect(answers).toEqual({
      INSTALL_PROFILE: "db-only",
      DB_HOST: "127.0.0.1",
      DB_PORT: "3306",
      DB_DATABASE: "nexus",
      DB_USERNAME: "nexus",
      DB_PASSWORD: "test-secret",
    });
    expect(out[0]).toBe("Install profiles:\n");
  });

  it("re-asks an invalid profile choice", async () => {
    const prompter = new ScriptedPrompter(["9", "4", "", "", "", "", "test-secret"]);
    const out: string[] = [];
    const answers = await promptInteractive(prompter, { write: (t) => out.push(t) });
    expect(answers.INSTALL_PROFILE).toBe("db-only");
    expect(out).toContain("Please enter a number between 1 and 5.\n");
  });

  it("re-asks a required prompt without a default, then gives up", async () => {
    const prompter = new ScriptedPrompter(["", "", "", "", "", "", "", ""]);
    const err = await expectInstallerError(
      promptInteractive(prompter, { profile: "db-only", write: () => undefined }),
    );
    expect(err.code).toBe("PROMPT_UNANSWERED");
    expect(prompter.questions.filter((q) => q === "Database password: ")).toHaveLength(3);
  });

  it("re-asks integers that do not parse", async () => {
    const prompter = new ScriptedPrompter(["", "port", "3307", "", "", "test-secret"]);
    const out: string[] = [];
    const answers = await promptInteractive(prompter, { profile: "db-only", write: (t) => out.push(t) });
    expect(answers.DB_PORT).toBe("3307");
    expect(out).toContain("DB_PORT must be a whole number.\n");
  });

  it("masks secret defaults and keeps them on empty input", async () => {
    const prompter = new ScriptedPrompter(["", "", "", "", ""]);
    const answers = await promptInteractive(prompter, {
      profile: "db-only",
      defaults: { DB_PASSWORD: "test-secret" },
      write: () => undefined,
    });
    expect(prompter.questions[4]).toBe("Database password [********]: ");
    expect(answers.DB_PASSWORD).toBe("test-secret");
  });

  it("renders a summary with secrets masked and requires y/yes", async () => {
    const result = await validateSettings({ INSTALL_PROFILE: "db-only", DB_PASSWORD: "test-secret" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const summary = renderConfirmation(result.record);
    expect(summary).toContain(`  ${"DB_PASSWORD".padEnd(20)} ********\n`);
    expect(summary).not.toContain("test-secret");

    const out: string[] = [];
    expect(await confirmRecord(new ScriptedPrompter(["yes"]), result.record, (t) => out.push(t))).toBe(true);
    expect(await confirmRecord(new ScriptedPrompter(["no"]), result.record, (t) => out.push(t))).toBe(false);
    expect(out[0]).toBe(summary);
  });
});
