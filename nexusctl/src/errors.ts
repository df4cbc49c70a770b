export type InstallerErrorKind = "precondition" | "essential" | "aborted";

export const ERROR_CODES = {
  NOT_ROOT: "NOT_ROOT",
  OS_RELEASE_MISSING: "OS_RELEASE_MISSING",
  OS_UNSUPPORTED: "OS_UNSUPPORTED",
  CONFIG_MISSING: "CONFIG_MISSING",
  CONFIG_INVALID: "CONFIG_INVALID",
  PROFILE_UNKNOWN: "PROFILE_UNKNOWN",
  PROMPT_UNANSWERED: "PROMPT_UNANSWERED",
  USER_ABORTED: "USER_ABORTED",
  CATALOG_INVALID: "CATALOG_INVALID",
  TEMPLATE_INVALID: "TEMPLATE_INVALID",
} as const;

export type InstallerErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class InstallerError extends Error {
  readonly kind: InstallerErrorKind;
  readonly code: InstallerErrorCode;
  readonly details?: string[];

  constructor(kind: InstallerErrorKind, code: InstallerErrorCode, message: string, details?: string[]) {
    super(message);
    this.name = "InstallerError";
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function preconditionError(code: InstallerErrorCode, message: string, details?: string[]): InstallerError {
  return new InstallerError("precondition", code, message, details);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
