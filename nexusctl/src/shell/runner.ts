// Command Runner: the only path by which the installer mutates the host.
// ShellRunner executes through bash and tees output into the run log;
// DryRunRunner records and prints the same command lines without running them.
import { spawn } from "node:child_process";
import type { RunLog } from "../logging/logger.js";
import type { ShellCommand } from "./command.js";

export type CommandOutcome = {
  readonly exitCode: number;
  /** Combined stdout and stderr. Empty for simulated runs. */
  readonly output: string;
  readonly simulated: boolean;
  readonly durationMs: number;
};

export interface CommandRunner {
  readonly dryRun: boolean;
  execute(command: ShellCommand): Promise<CommandOutcome>;
}

function describe(cmd: ShellCommand): string {
  const where = cmd.cwd ? ` (in ${cmd.cwd})` : "";
  const stdin = cmd.input !== undefined ? ` (${Buffer.byteLength(cmd.input, "utf8")} bytes on stdin)` : "";
  return `${cmd.line}${where}${stdin}`;
}

export class ShellRunner implements CommandRunner {
  readonly dryRun = false;

  constructor(
    private readonly log: RunLog,
    private readonly shell = "bash",
  ) {}

  async execute(cmd: ShellCommand): Promise<CommandOutcome> {
    this.log.logger.info(`$ ${describe(cmd)}`);
    const start = performance.now();

    return new Promise<CommandOutcome>((resolve) => {
      let output = "";
      let settled = false;
      const finish = (exitCode: number): void => {
        if (settled) return;
        settled = true;
        const durationMs = Math.round(performance.now() - start);
        this.log.logger.debug({ exitCode, durationMs }, `exit ${exitCode}: ${cmd.line}`);
        resolve({ exitCode, output, simulated: false, durationMs });
      };

      const child = spawn(this.shell, ["-c", cmd.line], {
        cwd: cmd.cwd,
        env: process.env,
        stdio: ["pipe", "pipe", "pipe"],
      });

      const onData = (buf: Buffer): void => {
        const text = buf.toString("utf8");
        output += text;
        this.log.echo(text);
      };
      child.stdout.on("data", onData);
      child.stderr.on("data", onData);

      child.on("error", (err) => {
        output += `${err.message}\n`;
        this.log.echo(`${err.message}\n`);
        finish(127);
      });
      child.on("close", (code, signal) => {
        if (signal) output += `terminated by ${signal}\n`;
        finish(code ?? 1);
      });

      // A command that never reads stdin closes the pipe early.
      child.stdin.on("error", (err) => {
        this.log.logger.debug({ err: err.message }, "stdin closed before input was consumed");
      });
      child.stdin.end(cmd.input ?? "");
    });
  }
}

export class DryRunRunner implements CommandRunner {
  readonly dryRun = true;
  readonly planned: ShellCommand[] = [];

  constructor(private readonly log: RunLog) {}

  async execute(cmd: ShellCommand): Promise<CommandOutcome> {
    this.planned.push(cmd);
    this.log.logger.info(`[dry-run] ${describe(cmd)}`);
    return { exitCode: 0, output: "", simulated: true, durationMs: 0 };
  }
}

export function createRunner(dryRun: boolean, log: RunLog): CommandRunner {
  return dryRun ? new DryRunRunner(log) : new ShellRunner(log);
}
