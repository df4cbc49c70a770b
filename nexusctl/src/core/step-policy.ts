/** What kind of work a step does; its failure policy follows from the kind. */
export const STEP_KINDS = [
  "package-index",
  "package-install",
  "repository-add",
  "service-enable",
  "file-write",
  "filesystem",
  "swap",
  "source-checkout",
  "tooling-install",
  "database-create",
  "dependency-install",
  "key-generation",
  "migration",
  "asset-build",
  "config-validation",
  "service-reload",
  "supervisor-reload",
  "schedule-register",
  "port-check",
  "certificate-issue",
  "certificate-renew-test",
  "supervisor-start",
  "status-query",
  "data-sync",
  "scheduler-restart",
  "admin-seed",
  "permissions-fixup",
] as const;

export type StepKind = (typeof STEP_KINDS)[number];

/**
 * essential: a failure aborts the run.
 * advisory: a failure is logged as a warning and the run continues.
 */
export type FailurePolicy = "essential" | "advisory";

export const STEP_POLICY: Readonly<Record<StepKind, FailurePolicy>> = {
  "package-index": "essential",
  "package-install": "essential",
  "repository-add": "essential",
  "service-enable": "essential",
  "file-write": "essential",
  filesystem: "essential",
  swap: "essential",
  "source-checkout": "essential",
  "tooling-install": "essential",
  "database-create": "essential",
  "dependency-install": "essential",
  "key-generation": "essential",
  migration: "essential",
  "asset-build": "essential",
  "config-validation": "essential",
  "service-reload": "essential",
  "supervisor-reload": "essential",
  "schedule-register": "essential",
  "port-check": "advisory",
  "certificate-issue": "advisory",
  "certificate-renew-test": "advisory",
  "supervisor-start": "advisory",
  "status-query": "advisory",
  "data-sync": "advisory",
  "scheduler-restart": "advisory",
  "admin-seed": "advisory",
  "permissions-fixup": "advisory",
};

export function policyFor(kind: StepKind): FailurePolicy {
  return STEP_POLICY[kind];
}
