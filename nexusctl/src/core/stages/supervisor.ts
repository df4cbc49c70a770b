import path from "node:path";
import { appendFileCommand, shellQuote, writeFileCommand } from "../../shell/command.js";
import { restartService } from "../../host/package-manager.js";
import { loadTemplate, renderTemplate } from "../templates.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { enableStep, installStep, owner, serviceOf } from "./helpers.js";

export const CRONTAB = "/etc/crontab";

export type SupervisorProgram = {
  name: string;
  content: string;
  logDir: string;
};

export function appLogDir(ctx: StageContext): string {
  return path.posix.join(ctx.settings.APP_PATH, "storage", "logs");
}

/** Subs logs beside the app's when both run here, under the Subs tree otherwise. */
export function subsLogDir(ctx: StageContext): string {
  return ctx.flags.app ? appLogDir(ctx) : path.posix.join(ctx.settings.SUBS_PATH, "logs");
}

/** Programs for this host: queue workers with the app, the Subs process with subs. */
export function supervisorPrograms(ctx: StageContext): SupervisorProgram[] {
  const webUser = ctx.platform.webUser;
  const programs: SupervisorProgram[] = [];

  if (ctx.flags.app) {
    const logDir = appLogDir(ctx);
    const worker = loadTemplate("supervisor-worker.conf");
    const workers = [
      { name: "nexus-worker", queue: "default", procs: 2, log: "worker" },
      { name: "nexus-worker-sync", queue: "sync", procs: 1, log: "worker-sync" },
    ];
    for (const w of workers) {
      programs.push({
        name: w.name,
        logDir,
        content: renderTemplate(worker, {
          PROGRAM: w.name,
          APP_PATH: ctx.settings.APP_PATH,
          QUEUE: w.queue,
          NUMPROCS: String(w.procs),
          WEB_USER: webUser,
          LOG_DIR: logDir,
          LOG_NAME: w.log,
        }),
      });
    }
  }

  if (ctx.flags.subs) {
    const logDir = subsLogDir(ctx);
    programs.push({
      name: "nexus-subs",
      logDir,
      content: renderTemplate(loadTemplate("supervisor-subs.conf"), {
        PROGRAM: "nexus-subs",
        SUBS_PATH: ctx.settings.SUBS_PATH,
        WEB_USER: webUser,
        LOG_DIR: logDir,
      }),
    });
  }
  return programs;
}

export const supervisorStage: Stage = {
  id: "supervisor",
  title: "Supervisor processes",
  gate: (ctx) => (ctx.flags.supervisor ? ENABLED : disabled("no supervised processes for this profile")),
  async plan(ctx: StageContext) {
    const { supervisorIncludeDir: includeDir, supervisorExtension: ext } = ctx.catalog.paths;
    const programs = supervisorPrograms(ctx);
    const logDirs = [...new Set(programs.map((p) => p.logDir))].map(shellQuote).join(" ");

    const steps: Step[] = [installStep(ctx, "supervisor", "Install Supervisor"), enableStep(ctx, "supervisor")];
    for (const program of programs) {
      const file = path.posix.join(includeDir, `${program.name}${ext}`);
      steps.push(step("file-write", `Write ${file}`, writeFileCommand(file, program.content)));
    }
    if (programs.length > 0) {
      steps.push(
        step("filesystem", "Create process log directories", {
          line: `mkdir -p ${logDirs} && chown -R ${owner(ctx)} ${logDirs}`,
        }),
      );
    }
    steps.push(
      step("supervisor-reload", "Re-read Supervisor configuration", { line: "supervisorctl reread" }),
      step("supervisor-reload", "Apply Supervisor configuration", { line: "supervisorctl update" }),
      ...programs.map((p) => step("supervisor-start", `Start ${p.name}`, { line: `supervisorctl start '${p.name}:*'` })),
      step("status-query", "Supervisor status", { line: "supervisorctl status" }),
    );
    return { steps, notes: [] };
  },
};

/** The scheduler entry, in system crontab format (with a user field). */
export function cronLine(ctx: StageContext): string {
  const app = ctx.settings.APP_PATH;
  const log = path.posix.join(appLogDir(ctx), "cron.log");
  return `* * * * * ${ctx.platform.webUser} /usr/bin/php ${app}/artisan schedule:run >> ${log} 2>&1`;
}

export const cronStage: Stage = {
  id: "cron",
  title: "Laravel scheduler",
  gate: (ctx) => {
    if (!ctx.flags.cron) return disabled("scheduler not enabled for this profile");
    return ctx.flags.app ? ENABLED : disabled("app not installed on this host");
  },
  async plan(ctx: StageContext) {
    const line = cronLine(ctx);
    const crontab = ctx.host.readFile(CRONTAB) ?? "";
    const notes: string[] = [];
    const steps: Step[] = [];

    if (crontab.split("\n").some((l) => l.trim() === line)) {
      notes.push(`Scheduler already registered in ${CRONTAB}`);
    } else {
      const prefix = crontab === "" || crontab.endsWith("\n") ? "" : "\n";
      steps.push(step("schedule-register", `Register scheduler in ${CRONTAB}`, appendFileCommand(CRONTAB, `${prefix}${line}\n`)));
    }
    const unit = serviceOf(ctx, "cron");
    steps.push(step("scheduler-restart", `Restart ${unit}`, restartService(unit)));
    return { steps, notes };
  },
};
