import { appendFileCommand, shellQuote } from "../../shell/command.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { installStep } from "./helpers.js";

export const SWAP_FILE = "/swapfile";
export const FSTAB = "/etc/fstab";
export const SWAP_FSTAB_LINE = `${SWAP_FILE} none swap sw 0 0`;

export const basePackagesStage: Stage = {
  id: "base-packages",
  title: "System update & base packages",
  gate: () => ENABLED,
  async plan(ctx: StageContext) {
    const steps: Step[] = [
      step("package-index", "Refresh package index", ctx.packages.update()),
      step("package-install", "Upgrade installed packages", ctx.packages.upgrade()),
      installStep(ctx, "base", "Install base packages"),
    ];
    if (ctx.flags.webServer) {
      steps.unshift(
        step("port-check", "Check that ports 80/443 are free", {
          line: "! ss -tln | grep -Eq ':(80|443)[[:space:]]'",
        }),
      );
    }
    return { steps, notes: [] };
  },
};

/** `4G` → 4096, `512M` → 512, `1T` → 1048576. Null when the size is not `<digits>[KMGT]`. */
export function swapSizeMiB(size: string): number | null {
  const match = size.trim().match(/^([0-9]+)([KMGT]?)$/i);
  if (!match) return null;
  const n = Number.parseInt(match[1], 10);
  switch (match[2].toUpperCase()) {
    case "K":
      return Math.max(1, Math.ceil(n / 1024));
    case "G":
      return n * 1024;
    case "T":
      return n * 1024 * 1024;
    default:
      return n;
  }
}

export const swapStage: Stage = {
  id: "swap",
  title: "Swap file",
  gate: (ctx) => (ctx.flags.app || ctx.flags.subs ? ENABLED : disabled("no app or subs on this host")),
  async plan(ctx: StageContext) {
    const active = await ctx.host.query("swapon --show=NAME --noheadings");
    if (active.exitCode === 0 && active.stdout.split("\n").some((line) => line.trim() === SWAP_FILE)) {
      return { steps: [], notes: [`${SWAP_FILE} already active`] };
    }

    const size = ctx.settings.SWAP_SIZE;
    const mib = swapSizeMiB(size);
    if (mib === null) throw new Error(`Invalid SWAP_SIZE "${size}" (expected digits with an optional K, M, G or T suffix)`);
    const allocate = `fallocate -l ${shellQuote(size)} ${SWAP_FILE} || dd if=/dev/zero of=${SWAP_FILE} bs=1M count=${mib} status=progress`;

    const steps: Step[] = [
      step("swap", `Allocate ${size} swap file`, { line: allocate }),
      step("filesystem", "Restrict swap file permissions", { line: `chmod 600 ${SWAP_FILE}` }),
      step("swap", "Format swap file", { line: `mkswap ${SWAP_FILE}` }),
      step("swap", "Activate swap file", { line: `swapon ${SWAP_FILE}` }),
    ];

    const notes: string[] = [];
    const fstab = ctx.host.readFile(FSTAB) ?? "";
    if (fstab.split("\n").some((line) => line.trim().split(/\s+/)[0] === SWAP_FILE)) {
      notes.push(`${SWAP_FILE} already registered in ${FSTAB}`);
    } else {
      const prefix = fstab === "" || fstab.endsWith("\n") ? "" : "\n";
      steps.push(step("file-write", `Register swap in ${FSTAB}`, appendFileCommand(FSTAB, `${prefix}${SWAP_FSTAB_LINE}\n`)));
    }
    return { steps, notes };
  },
};
