import path from "node:path";
import { shellQuote } from "../../shell/command.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { installStep, repositorySteps } from "./helpers.js";

export const COMPOSER_BIN = "/usr/local/bin/composer";

/** Directory name `git clone` picks for a repository URL. */
export function cloneDirName(repo: string): string {
  const last = repo.replace(/\/+$/, "").split(/[/:]/).pop() ?? repo;
  return last.replace(/\.git$/, "");
}

type Checkout = { label: string; repo: string; dest: string };

function checkoutsFor(ctx: StageContext): Checkout[] {
  const out: Checkout[] = [];
  if (ctx.flags.app) out.push({ label: "Nexus AMS", repo: ctx.settings.APP_REPO, dest: ctx.settings.APP_PATH });
  if (ctx.flags.subs) out.push({ label: "Subs", repo: ctx.settings.SUBS_REPO, dest: ctx.settings.SUBS_PATH });
  return out;
}

async function checkoutSteps(ctx: StageContext, target: Checkout, notes: string[]): Promise<Step[]> {
  const { host } = ctx;
  if (await host.isGitCheckout(target.dest)) {
    notes.push(`${target.label} already checked out at ${target.dest}`);
    return [];
  }

  const parent = path.posix.dirname(target.dest);
  const cloned = path.posix.join(parent, cloneDirName(target.repo));
  const steps: Step[] = [step("filesystem", `Create ${parent}`, { line: `mkdir -p ${shellQuote(parent)}` })];

  if (cloned !== target.dest && (await host.isGitCheckout(cloned))) {
    notes.push(`${target.label} already cloned at ${cloned}`);
  } else {
    steps.push(
      step("source-checkout", `Clone ${target.label}`, {
        line: `git clone ${shellQuote(target.repo)} ${shellQuote(path.posix.basename(cloned))}`,
        cwd: parent,
      }),
    );
  }

  if (cloned !== target.dest) {
    if (host.exists(target.dest)) {
      if (host.listDir(target.dest).length > 0) {
        throw new Error(`${target.dest} exists and is not a git checkout; move it aside and re-run`);
      }
      steps.push(step("filesystem", `Remove empty ${target.dest}`, { line: `rmdir ${shellQuote(target.dest)}` }));
    }
    steps.push(
      step("filesystem", `Move checkout to ${target.dest}`, {
        line: `mv ${shellQuote(cloned)} ${shellQuote(target.dest)}`,
      }),
    );
  }
  return steps;
}

export const sourceCheckoutStage: Stage = {
  id: "source-checkout",
  title: "Clone Nexus AMS and Subs",
  gate: (ctx) => (ctx.flags.app || ctx.flags.subs ? ENABLED : disabled("no app or subs on this host")),
  async plan(ctx: StageContext) {
    const notes: string[] = [];
    const steps: Step[] = [];
    for (const target of checkoutsFor(ctx)) {
      steps.push(...(await checkoutSteps(ctx, target, notes)));
    }
    return { steps, notes };
  },
};

export const runtimeToolingStage: Stage = {
  id: "runtime-tooling",
  title: "Node.js LTS & Composer",
  gate: (ctx) => (ctx.flags.app || ctx.flags.subs ? ENABLED : disabled("no app or subs on this host")),
  async plan(ctx: StageContext) {
    const notes: string[] = [];
    const steps: Step[] = [
      ...repositorySteps(ctx, ctx.catalog.repositories.node, "Node.js", notes),
      installStep(ctx, "node", "Install Node.js"),
    ];

    if (ctx.flags.app) {
      if (ctx.host.exists(COMPOSER_BIN)) {
        notes.push(`Composer already installed at ${COMPOSER_BIN}`);
      } else {
        steps.push(
          step("tooling-install", "Install Composer", {
            line: [
              `php -r "copy('https://getcomposer.org/installer', 'composer-setup.php');"`,
              `php composer-setup.php --install-dir=${path.posix.dirname(COMPOSER_BIN)} --filename=composer`,
              `php -r "unlink('composer-setup.php');"`,
            ].join(" && "),
            cwd: "/tmp",
          }),
        );
      }
    }
    return { steps, notes };
  },
};
