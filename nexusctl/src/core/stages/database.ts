import type { InstallSettings, StageFlags } from "../../types/config.js";
import { disabled, ENABLED, step, type Stage, type StageContext } from "../stage.js";

export const ROOT_CLIENT = "mysql -uroot";
export const SUDO_CLIENT = "sudo mysql";

/** Backtick-quoted SQL identifier. */
export function sqlIdentifier(name: string): string {
  return `\`${name.replace(/`/g, "``")}\``;
}

/** Single-quoted SQL string literal. */
export function sqlString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "''")}'`;
}

/**
 * Host part of the application account: local when the app runs beside the
 * database, any host when the database is served to other machines.
 */
export function accountHost(flags: StageFlags): string {
  return flags.app ? "localhost" : "%";
}

export function provisioningSql(settings: InstallSettings, flags: StageFlags): string {
  const db = sqlIdentifier(settings.DB_DATABASE);
  const account = `${sqlString(settings.DB_USERNAME)}@${sqlString(accountHost(flags))}`;
  return [
    `CREATE DATABASE IF NOT EXISTS ${db} CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;`,
    `CREATE USER IF NOT EXISTS ${account} IDENTIFIED BY ${sqlString(settings.DB_PASSWORD)};`,
    `GRANT ALL PRIVILEGES ON ${db}.* TO ${account};`,
    "FLUSH PRIVILEGES;",
    "",
  ].join("\n");
}

/**
 * `mysql -uroot` when root can log in over the socket, else `sudo mysql`.
 * Cached per run. A dry run never probes and plans with `mysql -uroot`.
 */
export async function databaseClient(ctx: StageContext): Promise<string> {
  if (ctx.derived.databaseClient) return ctx.derived.databaseClient;
  if (ctx.runner.dryRun) {
    ctx.derived.databaseClient = ROOT_CLIENT;
    return ROOT_CLIENT;
  }
  const probe = await ctx.host.query(`${ROOT_CLIENT} -e "SELECT 1"`);
  if (probe.exitCode !== 0) {
    ctx.logger.warn("Root socket login failed; using sudo mysql");
  }
  ctx.derived.databaseClient = probe.exitCode === 0 ? ROOT_CLIENT : SUDO_CLIENT;
  return ctx.derived.databaseClient;
}

export const databaseStage: Stage = {
  id: "database",
  title: "Database & application account",
  gate: (ctx) => (ctx.flags.database ? ENABLED : disabled("database not hosted here")),
  async plan(ctx: StageContext) {
    const client = await databaseClient(ctx);
    return {
      steps: [
        step("database-create", `Create database ${ctx.settings.DB_DATABASE} and user ${ctx.settings.DB_USERNAME}`, {
          line: client,
          input: provisioningSql(ctx.settings, ctx.flags),
        }),
      ],
      notes: [],
    };
  },
};
