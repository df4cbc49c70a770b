import { errorMessage } from "../errors.js";
import type { OrchestratorResult } from "../core/orchestrator.js";
import type { StageContext, StageResult } from "../core/stage.js";

export const DRY_RUN_PLACEHOLDER = "(dry-run: not queried)";
export const UNAVAILABLE = "unavailable";
export const NOT_APPLICABLE = "n/a";

export type CheckoutReport = { path: string; revision: string };

export type RunReport = {
  success: boolean;
  failedStage: string | null;
  dryRun: boolean;
  profile: string;
  platform: string;
  webUser: string;
  domain: string;
  app: CheckoutReport | null;
  subs: CheckoutReport | null;
  database: string;
  features: { tls: string; redis: string; adminUser: string; snapshots: string };
  stages: Array<Pick<StageResult, "id" | "status" | "reason">>;
  supervisorStatus: string;
  nginxCheck: string;
  logFile: string | null;
};

async function checkout(ctx: StageContext, dir: string): Promise<CheckoutReport> {
  try {
    const sha = await ctx.host.headRevision(dir);
    return { path: dir, revision: sha ? sha.slice(0, 12) : "not checked out" };
  } catch (err) {
    ctx.logger.debug({ err: errorMessage(err) }, `revision lookup failed for ${dir}`);
    return { path: dir, revision: UNAVAILABLE };
  }
}

// supervisorctl status exits 0-3 for per-process states; anything higher means it could not report.
const SUPERVISOR_STATUS_MAX_EXIT = 3;

async function supervisorStatus(ctx: StageContext): Promise<string> {
  if (!ctx.flags.supervisor) return NOT_APPLICABLE;
  if (ctx.runner.dryRun) return DRY_RUN_PLACEHOLDER;
  try {
    const outcome = await ctx.runner.execute({ line: "supervisorctl status" });
    const text = outcome.output.trim();
    if (outcome.exitCode > SUPERVISOR_STATUS_MAX_EXIT || text === "") return UNAVAILABLE;
    return text;
  } catch (err) {
    ctx.logger.debug({ err: errorMessage(err) }, "supervisorctl status failed");
    return UNAVAILABLE;
  }
}

async function nginxCheck(ctx: StageContext): Promise<string> {
  if (!ctx.flags.webServer) return NOT_APPLICABLE;
  if (ctx.runner.dryRun) return DRY_RUN_PLACEHOLDER;
  try {
    const outcome = await ctx.runner.execute({ line: "nginx -t" });
    return outcome.exitCode === 0 ? "OK" : "FAIL";
  } catch (err) {
    ctx.logger.debug({ err: errorMessage(err) }, "nginx -t failed to start");
    return UNAVAILABLE;
  }
}

function onOff(applies: boolean, value: boolean): string {
  if (!applies) return NOT_APPLICABLE;
  return value ? "on" : "off";
}

function databaseTarget(ctx: StageContext): string {
  const { flags, settings } = ctx;
  if (!flags.database && !flags.remoteDatabase && !flags.app) return NOT_APPLICABLE;
  const where = flags.database ? "local" : "remote";
  return `${settings.DB_DATABASE} as ${settings.DB_USERNAME} on ${settings.DB_HOST}:${settings.DB_PORT} (${where})`;
}

/** Gather the end-of-run report. Probes that fail show as unavailable. */
export async function collectReport(
  ctx: StageContext,
  result: OrchestratorResult,
  logFile: string | null,
): Promise<RunReport> {
  const { flags, settings, platform } = ctx;
  return {
    success: result.success,
    failedStage: result.failedStage ?? null,
    dryRun: ctx.runner.dryRun,
    profile: settings.INSTALL_PROFILE,
    platform: `${platform.osName} (${platform.family}, ${platform.packageManager})`,
    webUser: platform.webUser,
    domain: flags.webServer || flags.app ? settings.DOMAIN : NOT_APPLICABLE,
    app: flags.app ? await checkout(ctx, settings.APP_PATH) : null,
    subs: flags.subs ? await checkout(ctx, settings.SUBS_PATH) : null,
    database: databaseTarget(ctx),
    features: {
      tls: onOff(flags.webServer, settings.ENABLE_TLS),
      redis: onOff(flags.app, settings.REDIS_ENABLED),
      adminUser: onOff(flags.adminUser, settings.CREATE_ADMIN_USER),
      snapshots: onOff(flags.subs, settings.ENABLE_SNAPSHOTS),
    },
    stages: result.stages.map(({ id, status, reason }) => ({ id, status, reason })),
    supervisorStatus: await supervisorStatus(ctx),
    nginxCheck: await nginxCheck(ctx),
    logFile,
  };
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(22)}${value}`;
}

function stageLine(stage: RunReport["stages"][number]): string {
  const status = stage.reason ? `${stage.status} (${stage.reason})` : stage.status;
  return `  ${stage.id.padEnd(18)} ${status}`;
}

export function renderReport(report: RunReport): string {
  const checkoutText = (c: CheckoutReport | null): string => (c ? `${c.path} (${c.revision})` : NOT_APPLICABLE);
  const lines = [
    "====================  SUMMARY  ====================",
    row("Result", report.success ? "success" : `FAILED at ${report.failedStage ?? "unknown stage"}`),
    row("Mode", report.dryRun ? "dry-run (nothing was changed)" : "live"),
    row("Profile", report.profile),
    row("Platform", report.platform),
    row("Web user", report.webUser),
    row("Domain", report.domain),
    row("App path", checkoutText(report.app)),
    row("Subs path", checkoutText(report.subs)),
    row("Database", report.database),
    row("TLS", report.features.tls),
    row("Redis", report.features.redis),
    row("Admin user", report.features.adminUser),
    row("Snapshots", report.features.snapshots),
    "Stages:",
    ...report.stages.map(stageLine),
    "Supervisor processes:",
    ...report.supervisorStatus.split("\n").map((l) => `  ${l}`),
    row("Nginx test", report.nginxCheck),
    row("Log file", report.logFile ? `${report.logFile} (appends each run)` : "none"),
  ];
  return `${lines.join("\n")}\n`;
}
