#!/usr/bin/env node

import { Command, CommanderError, Option } from "commander";
import { install, openRunLog } from "./commands/install.js";
import { validateAll } from "./commands/validate.js";
import { listProfiles, renderProfiles } from "./commands/profiles.js";
import { configSet } from "./commands/config-set.js";
import { EXIT } from "./commands/exit-codes.js";
import { DEFAULT_CONFIG_PATH } from "./config/loader.js";
import { NodeHost } from "./host/host.js";
import { DEFAULT_LOG_FILE, type OutputFormat } from "./logging/logger.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

function isFormat(value: unknown): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

function formatOf(value: unknown): OutputFormat {
  return isFormat(value) ? value : "human";
}

program
  .name("nexusctl")
  .description("Idempotent installer for Nexus AMS and the Subs service")
  .version("0.1.0")
  .exitOverride();

program
  .command("install")
  .description("Provision this host for the selected install profile")
  .option("--dry-run", "Print every command instead of running it")
  .option("--non-interactive", "Never prompt; fail when the configuration file is missing")
  .option("--config <path>", "Configuration file", DEFAULT_CONFIG_PATH)
  .option("--profile <name>", "Install profile (overrides INSTALL_PROFILE)")
  .option("--log-file <path>", "Append-only run log", DEFAULT_LOG_FILE)
  .addOption(formatOption())
  .action(
    async (opts: {
      dryRun?: boolean;
      nonInteractive?: boolean;
      config: string;
      profile?: string;
      logFile: string;
      format: unknown;
    }) => {
      const format = formatOf(opts.format);
      const log = openRunLog({ logFile: opts.logFile, format });
      const res = await install(
        {
          dryRun: opts.dryRun ?? false,
          nonInteractive: opts.nonInteractive ?? false,
          configPath: opts.config,
          profile: opts.profile,
          format,
        },
        { host: new NodeHost(), log },
      );
      if (res.outcome === "precondition" && format === "jsonl") {
        log.print(JSON.stringify({ level: "error", code: "PRECONDITION", message: res.error, details: res.details }) + "\n");
      }
      process.exitCode = res.exitCode;
    },
  );

program
  .command("profiles")
  .description("List install profiles and the stages they enable")
  .addOption(formatOption())
  .action((opts: { format: unknown }) => {
    const rows = listProfiles();
    if (formatOf(opts.format) === "jsonl") {
      for (const row of rows) process.stdout.write(JSON.stringify(row) + "\n");
    } else {
      process.stdout.write(renderProfiles(rows));
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without changing the host")
  .option("--config <path>", "Configuration file", DEFAULT_CONFIG_PATH)
  .option("--profile <name>", "Install profile (overrides INSTALL_PROFILE)")
  .addOption(formatOption())
  .action(async (opts: { config: string; profile?: string; format: unknown }) => {
    const res = await validateAll({ configPath: opts.config, profile: opts.profile });
    const jsonl = formatOf(opts.format) === "jsonl";

    if (!res.ok) {
      for (const err of res.errors) {
        if (jsonl) process.stdout.write(JSON.stringify(err) + "\n");
        else console.error(err.message);
      }
      process.exitCode = EXIT.PRECONDITION;
      return;
    }

    if (jsonl) {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", profile: res.profile }) + "\n");
    } else {
      console.log(`OK (profile ${res.profile})`);
    }
  });

const config = program.command("config").description("Edit the configuration file");

config
  .command("set")
  .description("Set one key in the configuration file (created when missing)")
  .argument("<key>", "Setting name")
  .argument("<value>", "Setting value")
  .option("--config <path>", "Configuration file", DEFAULT_CONFIG_PATH)
  .action((key: string, value: string, opts: { config: string }) => {
    const res = configSet({ configPath: opts.config, key, value });
    if (!res.ok) {
      console.error(res.error);
      process.exitCode = EXIT.INVALID_ARGS;
      return;
    }
    if (!res.known) console.error(`warning: ${key} is not a setting nexusctl reads; kept as-is`);
    console.log(`${key} updated in ${opts.config}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    const benign = err.code === "commander.helpDisplayed" || err.code === "commander.version" || err.code === "commander.help";
    process.exit(benign ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.STAGE_FAILED);
});
