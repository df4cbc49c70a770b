import pino, { type DestinationStream, type Logger, type StreamEntry } from "pino";

export type OutputFormat = "human" | "jsonl";

/** Well-known run log; every run appends to it. */
export const DEFAULT_LOG_FILE = "/var/log/nexus-install.log";

export type RunLog = {
  logger: Logger;
  /** Copy raw child-process output to the console and the run log. */
  echo(chunk: string): void;
  /** Write user-facing text (menus, summaries, jsonl records) to stdout and the run log. */
  print(text: string): void;
  logFile: string | null;
};

const MARKERS: Record<string, string> = {
  trace: "   ",
  debug: "   ",
  info: "==>",
  warn: "[!]",
  error: "[ERROR]",
  fatal: "[ERROR]",
};

function stringField(entry: object, key: string): string | undefined {
  const value: unknown = Reflect.get(entry, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Console destination that renders pino's JSON lines as `==> msg`,
 * `[!] msg` and `[ERROR] msg`.
 */
export function humanConsole(write: (text: string) => void): DestinationStream {
  return {
    write(line: string): void {
      let entry: unknown;
      try {
        entry = JSON.parse(line);
      } catch {
        write(line);
        return;
      }
      if (typeof entry !== "object" || entry === null) {
        write(line);
        return;
      }
      const level = stringField(entry, "level") ?? "info";
      const msg = stringField(entry, "msg") ?? "";
      write(`${MARKERS[level] ?? "==>"} ${msg}\n`);
    },
  };
}

/**
 * Build the run logger: console output (human or JSON lines) plus the
 * append-only log file. The file destination is synchronous so entries land in
 * exactly the order the installer produced them.
 */
export function createRunLog(opts: {
  logFile: string | null;
  format?: OutputFormat;
  level?: string;
  stdout?: (text: string) => void;
}): RunLog {
  const format = opts.format ?? "human";
  const stdout = opts.stdout ?? ((text: string) => void process.stdout.write(text));

  const consoleStream: DestinationStream = format === "human" ? humanConsole(stdout) : { write: stdout };
  const streams: StreamEntry[] = [{ level: "info", stream: consoleStream }];

  let file: DestinationStream | null = null;
  if (opts.logFile) {
    file = pino.destination({ dest: opts.logFile, append: true, sync: true, mkdir: true });
    streams.push({ level: "debug", stream: file });
  }

  const logger = pino(
    {
      name: "nexusctl",
      level: opts.level ?? process.env.LOG_LEVEL ?? "debug",
      formatters: { level: (label) => ({ level: label }) },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  // Raw command output goes to stderr in jsonl mode so stdout stays parseable.
  const consoleEcho =
    format === "human" ? stdout : (text: string) => void process.stderr.write(text);

  return {
    logger,
    echo(chunk: string): void {
      consoleEcho(chunk);
      file?.write(chunk);
    },
    print(text: string): void {
      stdout(text);
      file?.write(text);
    },
    logFile: opts.logFile,
  };
}
