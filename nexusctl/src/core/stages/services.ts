import { DIRECTIVE_STYLE, upsertAll } from "../../config/env-file.js";
import { withPhpVersion } from "../../host/catalog.js";
import { restartService } from "../../host/package-manager.js";
import { writeFileCommand } from "../../shell/command.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { enableStep, installStep, repositorySteps, serviceOf } from "./helpers.js";

export const REDIS_EVICTION_POLICY = "allkeys-lru";

/** First PHP-FPM socket that exists, else the family's conventional one. */
export function resolvePhpFpmSocket(ctx: StageContext): string {
  const candidates = ctx.catalog.paths.phpFpmSockets.map((p) => withPhpVersion(p, ctx.settings.PHP_VERSION));
  return candidates.find((p) => ctx.host.exists(p)) ?? candidates[0];
}

export const phpStage: Stage = {
  id: "php",
  title: "PHP and PHP-FPM",
  gate: (ctx) => (ctx.flags.app ? ENABLED : disabled("app not installed on this host")),
  async plan(ctx: StageContext) {
    const notes: string[] = [];
    const steps: Step[] = [
      ...repositorySteps(ctx, ctx.catalog.repositories.php, "PHP", notes),
      installStep(ctx, "php", `Install PHP ${ctx.settings.PHP_VERSION}`),
      enableStep(ctx, "php"),
    ];
    ctx.derived.phpFpmSocket = resolvePhpFpmSocket(ctx);
    notes.push(`PHP-FPM socket: ${ctx.derived.phpFpmSocket}`);
    return { steps, notes };
  },
};

export const databaseServerStage: Stage = {
  id: "database-server",
  title: "Database server",
  gate: (ctx) => (ctx.flags.database ? ENABLED : disabled("database not hosted here")),
  async plan(ctx: StageContext) {
    return {
      steps: [installStep(ctx, "database", "Install database server"), enableStep(ctx, "database")],
      notes: [],
    };
  },
};

export const webServerStage: Stage = {
  id: "web-server",
  title: "Nginx",
  gate: (ctx) => (ctx.flags.webServer ? ENABLED : disabled("web server not enabled for this profile")),
  async plan(ctx: StageContext) {
    return {
      steps: [installStep(ctx, "web", "Install Nginx"), enableStep(ctx, "web")],
      notes: [],
    };
  },
};

export const cacheStoreStage: Stage = {
  id: "cache-store",
  title: "Redis",
  gate: (ctx) => {
    if (!ctx.flags.app) return disabled("app not installed on this host");
    return ctx.settings.REDIS_ENABLED ? ENABLED : disabled("REDIS_ENABLED=false");
  },
  async plan(ctx: StageContext) {
    const configPath = ctx.catalog.paths.redisConfig;
    const unit = serviceOf(ctx, "cache");

    // The config file comes with the package, so it is read once the install step has run.
    const writeConfig = () => {
      const current = ctx.host.readFile(configPath) ?? "";
      const next = upsertAll(
        current,
        [
          ["maxmemory", ctx.settings.REDIS_MAXMEMORY],
          ["maxmemory-policy", REDIS_EVICTION_POLICY],
        ],
        DIRECTIVE_STYLE,
      );
      return next === current ? null : writeFileCommand(configPath, next);
    };

    return {
      steps: [
        installStep(ctx, "cache", "Install Redis"),
        step("file-write", `Set maxmemory in ${configPath}`, writeConfig),
        enableStep(ctx, "cache"),
        step("service-reload", `Restart ${unit}`, restartService(unit)),
      ],
      notes: [],
    };
  },
};
