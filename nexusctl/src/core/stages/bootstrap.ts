import { asUser } from "../../shell/command.js";
import type { InstallSettings } from "../../types/config.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { chownCommand } from "./helpers.js";

/** One-time artisan commands, in the order they must run. */
export const INITIAL_JOBS = [
  "military:sign-in",
  "sync:nations",
  "sync:alliances",
  "sync:wars",
  "sync:treaties",
  "taxes:collect",
  "trades:update",
] as const;

export const initialJobsStage: Stage = {
  id: "initial-jobs",
  title: "Initial Laravel jobs",
  gate: (ctx) => {
    if (!ctx.flags.initialJobs) return disabled("initial jobs not enabled for this profile");
    return ctx.flags.app ? ENABLED : disabled("app not installed on this host");
  },
  async plan(ctx: StageContext) {
    const cwd = ctx.settings.APP_PATH;
    return {
      steps: INITIAL_JOBS.map((job) =>
        step("data-sync", `Run ${job}`, { line: asUser(ctx.platform.webUser, `/usr/bin/php artisan ${job}`), cwd }),
      ),
      notes: [],
    };
  },
};

function phpString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function phpInt(value: number | null): string {
  return value === null ? "null" : String(value);
}

/**
 * Script fed to `php artisan tinker`: creates the admin through the User
 * model (so the app's own hashing and model events apply) only when no user
 * with that email exists, then attaches the role.
 */
export function adminSeedScript(settings: InstallSettings): string {
  return [
    `$user = \\App\\Models\\User::firstOrNew(['email' => ${phpString(settings.ADMIN_EMAIL)}]);`,
    "if (! $user->exists) {",
    "    $user->forceFill([",
    `        'name' => ${phpString(settings.ADMIN_NAME)},`,
    `        'password' => \\Illuminate\\Support\\Facades\\Hash::make(${phpString(settings.ADMIN_PASSWORD)}),`,
    `        'nation_id' => ${phpInt(settings.ADMIN_NATION_ID)},`,
    "        'is_admin' => true,",
    "        'verified_at' => now(),",
    "    ])->save();",
    "}",
    `\\Illuminate\\Support\\Facades\\DB::table('role_user')->insertOrIgnore(['user_id' => $user->id, 'role_id' => ${phpInt(settings.ADMIN_ROLE_ID)}]);`,
    "",
  ].join("\n");
}

export const adminUserStage: Stage = {
  id: "admin-user",
  title: "Admin user",
  gate: (ctx) => {
    if (!ctx.flags.adminUser) return disabled("admin seeding not enabled for this profile");
    return ctx.settings.CREATE_ADMIN_USER ? ENABLED : disabled("CREATE_ADMIN_USER=false");
  },
  async plan(ctx: StageContext) {
    return {
      steps: [
        step("admin-seed", `Create admin user ${ctx.settings.ADMIN_NAME}`, {
          line: asUser(ctx.platform.webUser, "/usr/bin/php artisan tinker"),
          input: adminSeedScript(ctx.settings),
          cwd: ctx.settings.APP_PATH,
        }),
      ],
      notes: [],
    };
  },
};

export const permissionsStage: Stage = {
  id: "permissions",
  title: "Final permissions",
  gate: (ctx) => (ctx.flags.app || ctx.flags.subs ? ENABLED : disabled("no app or subs on this host")),
  async plan(ctx: StageContext) {
    const trees: string[] = [];
    if (ctx.flags.app) trees.push(ctx.settings.APP_PATH);
    if (ctx.flags.subs) trees.push(ctx.settings.SUBS_PATH);
    const steps: Step[] = [step("permissions-fixup", "Hand application trees to the web user", { line: chownCommand(ctx, trees) })];
    return { steps, notes: [] };
  },
};
