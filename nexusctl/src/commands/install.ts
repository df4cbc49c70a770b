import { confirmRecord, promptInteractive, ReadlinePrompter, type Prompter } from "../config/prompts.js";
import { loadConfig, persistCommand, readConfigFile, toRecord, type LoadedConfig } from "../config/loader.js";
import { Orchestrator } from "../core/orchestrator.js";
import type { Stage, StageContext } from "../core/stage.js";
import { STAGES } from "../core/stages/index.js";
import { ERROR_CODES, errorMessage, InstallerError, preconditionError } from "../errors.js";
import { loadCatalog, type PlatformCatalog } from "../host/catalog.js";
import { detectPlatform } from "../host/detector.js";
import type { Host } from "../host/host.js";
import { createPackageManager } from "../host/package-manager.js";
import { createRunLog, type OutputFormat, type RunLog } from "../logging/logger.js";
import { collectReport, renderReport, type RunReport } from "../report/summary.js";
import { createRunner, type CommandRunner } from "../shell/runner.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type InstallOptions = {
  dryRun: boolean;
  nonInteractive: boolean;
  configPath: string;
  profile?: string;
  format: OutputFormat;
};

export type InstallDeps = {
  host: Host;
  log: RunLog;
  runner?: CommandRunner;
  prompter?: Prompter;
  catalog?: PlatformCatalog;
  stages?: readonly Stage[];
};

export type InstallResult =
  | { outcome: "completed" | "failed"; exitCode: ExitCode; report: RunReport }
  | { outcome: "aborted"; exitCode: ExitCode }
  | { outcome: "precondition"; exitCode: ExitCode; error: string; details: string[] };

/**
 * Open the run log. An unwritable log file (a non-root dry run, say) falls
 * back to console-only logging with a warning.
 */
export function openRunLog(opts: { logFile: string | null; format: OutputFormat }): RunLog {
  if (opts.logFile === null) return createRunLog({ logFile: null, format: opts.format });
  try {
    return createRunLog({ logFile: opts.logFile, format: opts.format });
  } catch (err) {
    const log = createRunLog({ logFile: null, format: opts.format });
    log.logger.warn(`Cannot open log file ${opts.logFile} (${errorMessage(err)}); logging to the console only`);
    return log;
  }
}

type ConfigOutcome = { kind: "loaded"; config: LoadedConfig } | { kind: "aborted" };

async function obtainConfig(
  opts: InstallOptions,
  deps: InstallDeps,
  runner: CommandRunner,
  write: (text: string) => void,
): Promise<ConfigOutcome> {
  const { logger } = deps.log;
  const raw = readConfigFile(opts.configPath);
  if (raw !== null) {
    logger.info(`Using configuration from ${opts.configPath}`);
    return { kind: "loaded", config: await toRecord(raw, opts.configPath, opts.profile) };
  }
  if (opts.nonInteractive) {
    // Raises CONFIG_MISSING.
    return { kind: "loaded", config: await loadConfig(opts.configPath, opts.profile) };
  }

  const prompter = deps.prompter ?? new ReadlinePrompter();
  try {
    const answers = await promptInteractive(prompter, { profile: opts.profile, write });
    const config = await toRecord(answers, "interactive answers");
    if (!(await confirmRecord(prompter, config.record, write))) return { kind: "aborted" };

    const persisted = await runner.execute(persistCommand(opts.configPath, config.record));
    if (persisted.exitCode !== 0) {
      throw preconditionError(ERROR_CODES.CONFIG_INVALID, `Could not write ${opts.configPath} (exit ${persisted.exitCode})`);
    }
    logger.info(`Configuration saved to ${opts.configPath}`);
    return { kind: "loaded", config };
  } finally {
    prompter.close();
  }
}

/**
 * The install pipeline: preconditions → configuration → platform → stages
 * → summary. Precondition failures end the run before any stage starts.
 */
export async function install(opts: InstallOptions, deps: InstallDeps): Promise<InstallResult> {
  const { host, log } = deps;
  const { logger } = log;
  const runner = deps.runner ?? createRunner(opts.dryRun, log);
  const write = (text: string): void => log.print(text);

  let ctx: StageContext;
  try {
    if (!host.isRoot()) {
      if (!opts.dryRun) throw preconditionError(ERROR_CODES.NOT_ROOT, "Please run as root (sudo).");
      logger.warn("Not running as root; continuing because this is a dry run");
    }

    const platform = detectPlatform(host, logger);
    logger.info(`Detected ${platform.osName} (${platform.family}, ${platform.packageManager}); web user ${platform.webUser}`);
    const catalog = deps.catalog ?? (await loadCatalog());

    const obtained = await obtainConfig(opts, deps, runner, write);
    if (obtained.kind === "aborted") {
      logger.info("Installation aborted by user; nothing was changed");
      return { outcome: "aborted", exitCode: EXIT.SUCCESS };
    }
    const { record, flags } = obtained.config;
    logger.info(`Profile: ${record.settings.INSTALL_PROFILE}${opts.dryRun ? " (dry run)" : ""}`);

    ctx = {
      settings: record.settings,
      flags,
      platform,
      catalog: catalog[platform.family],
      packages: createPackageManager(platform.family),
      host,
      runner,
      logger,
      derived: {},
    };
  } catch (err) {
    if (err instanceof InstallerError && err.kind === "precondition") {
      const details = err.details ?? [];
      logger.error(err.message);
      for (const detail of details) logger.error(`  ${detail}`);
      return { outcome: "precondition", exitCode: EXIT.PRECONDITION, error: err.message, details };
    }
    throw err;
  }

  const result = await new Orchestrator(deps.stages ?? STAGES, ctx).run();
  if (result.success) {
    logger.info(opts.dryRun ? "Dry run finished; no changes were made" : "Installation finished");
  } else {
    logger.error(`Installation stopped at ${result.failedStage ?? "unknown stage"}: ${result.error ?? "unknown error"}`);
  }

  const report = await collectReport(ctx, result, log.logFile);
  if (opts.format === "jsonl") {
    write(`${JSON.stringify({ level: "info", code: "REPORT", report })}\n`);
  } else {
    log.echo(`\n${renderReport(report)}`);
  }

  return {
    outcome: result.success ? "completed" : "failed",
    exitCode: result.success ? EXIT.SUCCESS : EXIT.STAGE_FAILED,
    report,
  };
}
