import path from "node:path";

/**
 * A command line handed to the Command Runner. Everything that mutates the
 * host is expressed as one of these, including file writes (content on stdin).
 */
export type ShellCommand = {
  readonly line: string;
  readonly input?: string;
  readonly cwd?: string;
};

/** Quote a value for bash using single quotes. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Run `line` as another user (login shell not required). */
export function asUser(user: string, line: string): string {
  return `sudo -u ${shellQuote(user)} ${line}`;
}

/** Overwrite `filePath` with `content`, creating the parent directory. */
export function writeFileCommand(filePath: string, content: string, opts?: { mode?: string }): ShellCommand {
  const dir = shellQuote(path.posix.dirname(filePath));
  const file = shellQuote(filePath);
  const chmod = opts?.mode ? ` && chmod ${opts.mode} ${file}` : "";
  return { line: `mkdir -p ${dir} && cat > ${file}${chmod}`, input: content };
}

/** Append `content` to `filePath`. */
export function appendFileCommand(filePath: string, content: string): ShellCommand {
  return { line: `cat >> ${shellQuote(filePath)}`, input: content };
}
