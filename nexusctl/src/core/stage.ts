import type { Logger } from "pino";
import type { Host } from "../host/host.js";
import type { Platform } from "../host/detector.js";
import type { PlatformEntry } from "../host/catalog.js";
import type { PackageManager } from "../host/package-manager.js";
import type { CommandRunner } from "../shell/runner.js";
import type { ShellCommand } from "../shell/command.js";
import type { InstallSettings, StageFlags } from "../types/config.js";
import type { FailurePolicy, StepKind } from "./step-policy.js";

export const STAGE_IDS = [
  "base-packages",
  "swap",
  "php",
  "database-server",
  "web-server",
  "cache-store",
  "source-checkout",
  "runtime-tooling",
  "database",
  "backend",
  "frontend",
  "subs",
  "reverse-proxy",
  "supervisor",
  "cron",
  "initial-jobs",
  "admin-user",
  "permissions",
] as const;

export type StageId = (typeof STAGE_IDS)[number];

/** Values worked out by one stage and reused by later ones within a run. */
export type DerivedValues = {
  phpFpmSocket?: string;
  /** Database client invocation, e.g. `mysql -uroot` or `sudo mysql`. */
  databaseClient?: string;
};

export type StageContext = {
  readonly settings: InstallSettings;
  readonly flags: StageFlags;
  readonly platform: Platform;
  readonly catalog: PlatformEntry;
  readonly packages: PackageManager;
  readonly host: Host;
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly derived: DerivedValues;
};

export type Gate = { enabled: true } | { enabled: false; reason: string };

/** Built right before the step runs, from what earlier steps left behind; null when nothing is left to do. */
export type DeferredCommand = () => ShellCommand | null;

export type Step = {
  readonly kind: StepKind;
  readonly description: string;
  readonly command: ShellCommand | DeferredCommand;
};

export type StagePlan = {
  readonly steps: Step[];
  /** Parts of the stage already in place. */
  readonly notes: string[];
};

export interface Stage {
  readonly id: StageId;
  readonly title: string;
  gate(ctx: StageContext): Gate;
  /** Probe the host (read-only) and return the steps still needed. */
  plan(ctx: StageContext): Promise<StagePlan>;
}

export type StageStatus = "completed" | "satisfied" | "skipped" | "failed" | "not-run";

export type StepRecord = {
  kind: StepKind;
  description: string;
  policy: FailurePolicy;
  exitCode: number;
  simulated: boolean;
};

export type StageResult = {
  id: StageId;
  title: string;
  status: StageStatus;
  /** Skip reason, or the failure message. */
  reason?: string;
  notes: string[];
  steps: StepRecord[];
  warnings: string[];
  durationMs: number;
};

export const ENABLED: Gate = { enabled: true };

export function disabled(reason: string): Gate {
  return { enabled: false, reason };
}

export function step(kind: StepKind, description: string, command: ShellCommand | DeferredCommand): Step {
  return { kind, description, command };
}
