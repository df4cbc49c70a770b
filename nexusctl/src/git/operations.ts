import { simpleGit, CheckRepoActions, type SimpleGit } from "simple-git";
import fs from "node:fs";
import path from "node:path";

/**
 * Read-only git queries used by idempotency checks and the run report.
 * Cloning itself goes through the Command Runner like every other mutation.
 */
export class GitOperations {
  constructor(private readonly factory: (dir: string) => SimpleGit = (dir) => simpleGit(dir)) {}

  /** True when `dir` carries its own version-control metadata. */
  async isCheckoutRoot(dir: string): Promise<boolean> {
    if (!fs.existsSync(path.join(dir, ".git"))) return false;
    try {
      return await this.factory(dir).checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch {
      // .git exists but git itself is not installed yet: treat the metadata as present.
      return true;
    }
  }

  /** HEAD commit of the checkout, or null when it cannot be read. */
  async headRevision(dir: string): Promise<string | null> {
    if (!fs.existsSync(path.join(dir, ".git"))) return null;
    try {
      const sha = await this.factory(dir).revparse(["HEAD"]);
      return sha.trim() || null;
    } catch {
      return null;
    }
  }
}
