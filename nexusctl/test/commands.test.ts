import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { configSet } from "../src/commands/config-set.js";
import { validateAll } from "../src/commands/validate.js";
import { openRunLog } from "../src/commands/install.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { configText, FULL_CONFIG } from "./helpers/fixtures.js";

describe("config set", () => {
  let tmp: string;
  let file: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl-cmd-"));
    file = path.join(tmp, "install.env");
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("creates the file and upserts quoted values", () => {
    expect(configSet({ configPath: file, key: "DOMAIN", value: "nexus.example.com" })).toEqual({
      ok: true,
      key: "DOMAIN",
      known: true,
    });
    configSet({ configPath: file, key: "DB_PASSWORD", value: "s3cr$t" });
    configSet({ configPath: file, key: "DOMAIN", value: "other.example.com" });
    expect(fs.readFileSync(file, "utf8")).toBe('DOMAIN="other.example.com"\nDB_PASSWORD="s3cr\\$t"\n');
  });

  it("flags keys the installer does not read", () => {
    expect(configSet({ configPath: file, key: "MY_NOTE", value: "x" })).toEqual({ ok: true, key: "MY_NOTE", known: false });
  });

  it("rejects invalid key names", () => {
    const res = configSet({ configPath: file, key: "1BAD", value: "x" });
    expect(res).toEqual({ ok: false, error: 'Invalid key: "1BAD"' });
    expect(fs.existsSync(file)).toBe(false);
  });
});

describe("validate", () => {
  let tmp: string;
  let file: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl-validate-"));
    file = path.join(tmp, "install.env");
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("accepts a complete configuration", async () => {
    fs.writeFileSync(file, configText(FULL_CONFIG));
    expect(await validateAll({ configPath: file })).toEqual({ ok: true, profile: "full" });
  });

  it("honours a profile override", async () => {
    fs.writeFileSync(file, configText({ DB_PASSWORD: "test-secret" }));
    expect(await validateAll({ configPath: file, profile: "db-only" })).toEqual({ ok: true, profile: "db-only" });
  });

  it("reports a missing file", async () => {
    const res = await validateAll({ configPath: file });
    expect(res).toEqual({
      ok: false,
      errors: [{ level: "error", code: "CONFIG_MISSING", message: `Configuration file not found: ${file}`, path: file }],
    });
  });

  it("reports each validation problem", async () => {
    fs.writeFileSync(file, configText({ INSTALL_PROFILE: "db-only", DB_PORT: "abc" }));
    const res = await validateAll({ configPath: file });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors.map((e) => e.message).sort()).toEqual([
      "config must have required property 'DB_PASSWORD'",
      'config/DB_PORT must match pattern "^[0-9]+$"',
    ]);
    expect(res.errors.every((e) => e.code === "CONFIG_INVALID")).toBe(true);
  });

  it("reports an unknown profile", async () => {
    fs.writeFileSync(file, configText({ INSTALL_PROFILE: "cluster" }));
    const res = await validateAll({ configPath: file });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors[0].code).toBe("PROFILE_UNKNOWN");
  });
});

describe("run log", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl-log-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("creates missing log directories and appends", () => {
    const logFile = path.join(tmp, "var", "log", "nexus-install.log");
    openRunLog({ logFile, format: "jsonl" }).logger.info("first");
    openRunLog({ logFile, format: "jsonl" }).logger.info("second");
    const entries = fs
      .readFileSync(logFile, "utf8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: "info", msg: "first", name: "nexusctl" });
    expect(entries[1]).toMatchObject({ level: "info", msg: "second" });
  });
});

describe("exit codes", () => {
  it("distinguishes failures from preconditions and bad arguments", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, STAGE_FAILED: 1, PRECONDITION: 2, INVALID_ARGS: 3 });
  });
});
