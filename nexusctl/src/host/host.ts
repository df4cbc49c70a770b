import fs from "node:fs";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { GitOperations } from "../git/operations.js";

const pExecFile = promisify(execFile);

export type QueryResult = {
  readonly exitCode: number;
  readonly stdout: string;
};

/**
 * Read-only view of the host used by idempotency checks. Probes run in dry-run
 * mode too, so a simulated run takes exactly the decisions a real one would.
 */
export interface Host {
  exists(p: string): boolean;
  isSymlink(p: string): boolean;
  readFile(p: string): string | null;
  listDir(p: string): string[];
  isRoot(): boolean;
  query(line: string): Promise<QueryResult>;
  isGitCheckout(dir: string): Promise<boolean>;
  headRevision(dir: string): Promise<string | null>;
}

function numericCode(err: unknown): number {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "number") return err.code;
  return 1;
}

function capturedStdout(err: unknown): string {
  if (typeof err === "object" && err !== null && "stdout" in err && typeof err.stdout === "string") return err.stdout;
  return "";
}

export class NodeHost implements Host {
  constructor(private readonly git = new GitOperations()) {}

  exists(p: string): boolean {
    return fs.existsSync(p);
  }

  isSymlink(p: string): boolean {
    try {
      return fs.lstatSync(p).isSymbolicLink();
    } catch {
      return false;
    }
  }

  readFile(p: string): string | null {
    try {
      return fs.readFileSync(p, "utf8");
    } catch {
      return null;
    }
  }

  listDir(p: string): string[] {
    if (!fs.existsSync(p) || !fs.statSync(p).isDirectory()) return [];
    return fs.readdirSync(p).sort();
  }

  isRoot(): boolean {
    return typeof process.getuid === "function" && process.getuid() === 0;
  }

  async query(line: string): Promise<QueryResult> {
    try {
      const { stdout } = await pExecFile("bash", ["-c", line], {
        maxBuffer: 10 * 1024 * 1024,
        timeout: 30_000,
      });
      return { exitCode: 0, stdout };
    } catch (err) {
      return { exitCode: numericCode(err), stdout: capturedStdout(err) };
    }
  }

  isGitCheckout(dir: string): Promise<boolean> {
    return this.git.isCheckoutRoot(path.resolve(dir));
  }

  headRevision(dir: string): Promise<string | null> {
    return this.git.headRevision(path.resolve(dir));
  }
}
