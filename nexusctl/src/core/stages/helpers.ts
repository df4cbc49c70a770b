import path from "node:path";
import { minimatch } from "minimatch";
import { upsertAll, DOTENV_STYLE } from "../../config/env-file.js";
import { withPhpVersion, type PackageGroup, type RepositorySpec, type ServiceRole } from "../../host/catalog.js";
import { enableService } from "../../host/package-manager.js";
import { shellQuote, writeFileCommand } from "../../shell/command.js";
import { step, type StageContext, type Step } from "../stage.js";

export function packagesOf(ctx: StageContext, group: PackageGroup): string[] {
  return ctx.catalog.packages[group].map((name) => withPhpVersion(name, ctx.settings.PHP_VERSION));
}

export function serviceOf(ctx: StageContext, role: ServiceRole): string {
  return withPhpVersion(ctx.catalog.services[role], ctx.settings.PHP_VERSION);
}

export function installStep(ctx: StageContext, group: PackageGroup, description: string): Step {
  return step("package-install", description, ctx.packages.install(packagesOf(ctx, group)));
}

export function enableStep(ctx: StageContext, role: ServiceRole): Step {
  const unit = serviceOf(ctx, role);
  return step("service-enable", `Enable ${unit}`, enableService(unit));
}

/** Names in the repository listing directory that match the marker glob. */
export function repositoryMarkers(ctx: StageContext, spec: RepositorySpec): string[] {
  return ctx.host.listDir(spec.listDir).filter((name) => minimatch(name, spec.marker));
}

/**
 * Steps that add a third-party repository, or none (with a note) when its
 * marker is already present.
 */
export function repositorySteps(
  ctx: StageContext,
  spec: RepositorySpec,
  label: string,
  notes: string[],
): Step[] {
  const found = repositoryMarkers(ctx, spec);
  if (found.length > 0) {
    notes.push(`${label} repository already configured (${found[0]})`);
    return [];
  }
  return spec.add.map((line) =>
    step("repository-add", `Add ${label} repository`, { line: withPhpVersion(line, ctx.settings.PHP_VERSION) }),
  );
}

export function owner(ctx: StageContext): string {
  const user = ctx.platform.webUser;
  return `${user}:${user}`;
}

export function chownCommand(ctx: StageContext, paths: string[]): string {
  return `chown -R ${owner(ctx)} ${paths.map(shellQuote).join(" ")}`;
}

/**
 * Upsert `entries` into `<dir>/.env`, starting from `.env.example` when the
 * file does not exist yet. Returns no step when the file already holds every
 * value.
 */
export function envFileStep(
  ctx: StageContext,
  dir: string,
  entries: Array<[string, string]>,
  notes: string[],
): Step[] {
  const envPath = path.posix.join(dir, ".env");
  const current = ctx.host.readFile(envPath);
  const base = current ?? ctx.host.readFile(path.posix.join(dir, ".env.example")) ?? "";
  const next = upsertAll(base, entries, DOTENV_STYLE);
  if (current !== null && next === current) {
    notes.push(`${envPath} already up to date`);
    return [];
  }
  return [step("file-write", `Write ${envPath}`, writeFileCommand(envPath, next, { mode: "600" }))];
}
