import path from "node:path";
import { DOTENV_STYLE, readAssignment, upsertAll } from "../../config/env-file.js";
import type { InstallSettings } from "../../types/config.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { chownCommand, envFileStep } from "./helpers.js";

const appOnly = (ctx: StageContext) => (ctx.flags.app ? ENABLED : disabled("app not installed on this host"));

/** Keys the installer owns in the application's `.env`. */
export function appEnvEntries(settings: InstallSettings): Array<[string, string]> {
  const entries: Array<[string, string]> = [
    ["APP_NAME", settings.APP_NAME],
    ["APP_ENV", "production"],
    ["APP_DEBUG", "false"],
    ["APP_URL", settings.APP_URL],
    ["DB_CONNECTION", "mysql"],
    ["DB_HOST", settings.DB_HOST],
    ["DB_PORT", String(settings.DB_PORT)],
    ["DB_DATABASE", settings.DB_DATABASE],
    ["DB_USERNAME", settings.DB_USERNAME],
    ["DB_PASSWORD", settings.DB_PASSWORD],
    ["PW_API_KEY", settings.PW_API_KEY],
    ["PW_API_MUTATION_KEY", settings.PW_API_MUTATION_KEY],
    ["NEXUS_API_TOKEN", settings.NEXUS_API_TOKEN],
    ["PW_ALLIANCE_ID", settings.PW_ALLIANCE_ID === null ? "" : String(settings.PW_ALLIANCE_ID)],
  ];
  if (settings.REDIS_ENABLED) {
    entries.push(["REDIS_HOST", "127.0.0.1"], ["CACHE_STORE", "redis"]);
  }
  return entries;
}

export function subsEnvEntries(settings: InstallSettings): Array<[string, string]> {
  return [
    ["PW_API_TOKEN", settings.PW_API_TOKEN],
    ["NEXUS_API_URL", settings.NEXUS_API_URL],
    ["NEXUS_API_TOKEN", settings.NEXUS_API_TOKEN],
    ["ENABLE_SNAPSHOTS", settings.ENABLE_SNAPSHOTS ? "true" : "false"],
  ];
}

/** True when the `.env` the backend stage leaves behind has no APP_KEY yet. */
function needsAppKey(ctx: StageContext, entries: Array<[string, string]>): boolean {
  const dir = ctx.settings.APP_PATH;
  const base =
    ctx.host.readFile(path.posix.join(dir, ".env")) ?? ctx.host.readFile(path.posix.join(dir, ".env.example")) ?? "";
  const key = readAssignment(upsertAll(base, entries, DOTENV_STYLE), "APP_KEY");
  return key === null || key === "";
}

export const backendStage: Stage = {
  id: "backend",
  title: "Laravel .env & backend",
  gate: appOnly,
  async plan(ctx: StageContext) {
    const cwd = ctx.settings.APP_PATH;
    const notes: string[] = [];
    const entries = appEnvEntries(ctx.settings);
    const steps: Step[] = [
      ...envFileStep(ctx, cwd, entries, notes),
      step("dependency-install", "Install PHP dependencies", {
        line: "COMPOSER_ALLOW_SUPERUSER=1 composer install --no-dev --optimize-autoloader --no-interaction",
        cwd,
      }),
    ];
    if (needsAppKey(ctx, entries)) {
      steps.push(step("key-generation", "Generate application key", { line: "php artisan key:generate --force", cwd }));
    } else {
      notes.push("APP_KEY already set");
    }
    steps.push(
      step("migration", "Run database migrations", { line: "php artisan migrate --force", cwd }),
      step("migration", "Seed the database", { line: "php artisan db:seed --force", cwd }),
    );
    return { steps, notes };
  },
};

export const frontendStage: Stage = {
  id: "frontend",
  title: "Frontend dependencies & Vite build",
  gate: appOnly,
  async plan(ctx: StageContext) {
    const cwd = ctx.settings.APP_PATH;
    return {
      steps: [
        step("dependency-install", "Install frontend dependencies", { line: "npm ci", cwd }),
        step("filesystem", "Make bundled esbuild binaries executable", {
          line: "find node_modules -path '*/@esbuild/*/bin/esbuild' -type f -exec chmod +x {} +",
          cwd,
        }),
        step("asset-build", "Build frontend assets", { line: "npm run build", cwd }),
        step("filesystem", "Hand the build directory to the web user", {
          line: chownCommand(ctx, [path.posix.join(cwd, "public", "build")]),
        }),
      ],
      notes: [],
    };
  },
};

export const subsStage: Stage = {
  id: "subs",
  title: "Subs .env & install",
  gate: (ctx) => (ctx.flags.subs ? ENABLED : disabled("subs not installed on this host")),
  async plan(ctx: StageContext) {
    const cwd = ctx.settings.SUBS_PATH;
    const notes: string[] = [];
    return {
      steps: [
        ...envFileStep(ctx, cwd, subsEnvEntries(ctx.settings), notes),
        step("dependency-install", "Install Subs dependencies", { line: "npm ci", cwd }),
        step("filesystem", `Hand ${cwd} to the web user`, { line: chownCommand(ctx, [cwd]) }),
      ],
      notes,
    };
  },
};
