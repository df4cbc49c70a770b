import type { Prompter } from "../../src/config/prompts.js";
import { validateSettings } from "../../src/config/validator.js";
import type { StageContext } from "../../src/core/stage.js";
import { loadCatalog } from "../../src/host/catalog.js";
import { detectPlatform } from "../../src/host/detector.js";
import { createPackageManager } from "../../src/host/package-manager.js";
import { createRunLog, type RunLog } from "../../src/logging/logger.js";
import type { CommandRunner } from "../../src/shell/runner.js";
import { MemoryHost } from "./memory-host.js";

export const FULL_CONFIG: Readonly<Record<string, string>> = {
  INSTALL_PROFILE: "full",
  DOMAIN: "nexus.example.com",
  ADMIN_EMAIL: "admin@example.com",
  DB_PASSWORD: "test-secret",
  PW_API_KEY: "test-api-key",
  PW_ALLIANCE_ID: "1234",
  NEXUS_API_TOKEN: "test-token",
  PW_API_TOKEN: "test-pw-token",
  ENABLE_TLS: "true",
  REDIS_ENABLED: "true",
  CREATE_ADMIN_USER: "true",
  ADMIN_NAME: "Admin",
  ADMIN_PASSWORD: "test-secret",
  ADMIN_NATION_ID: "42",
};

export function configText(values: Readonly<Record<string, string>>): string {
  return Object.entries(values)
    .map(([key, value]) => `${key}="${value}"\n`)
    .join("");
}

export type CapturedLog = { log: RunLog; output: string[]; text(): string };

/** Console-only run log whose output lands in `output`. */
export function captureLog(): CapturedLog {
  const output: string[] = [];
  const log = createRunLog({ logFile: null, stdout: (text) => output.push(text) });
  return { log, output, text: () => output.join("") };
}

/** Answers questions from a fixed script, recording every question. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`No scripted answer for: ${question}`);
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

export const APP_KEY = "base64:dGVzdC1rZXk=";

/**
 * Side effects of the third-party tools a full install calls: repository
 * setup leaves its listing file behind, the app clone ships a .env.example,
 * Composer lands in /usr/local/bin, key:generate fills APP_KEY and Certbot
 * leaves a certificate.
 */
export function withProvisioningEffects(mem: MemoryHost): MemoryHost {
  return mem
    .onCommand(/^add-apt-repository ppa:ondrej\/php/, () => {
      mem.files.set("/etc/apt/sources.list.d/ondrej-ubuntu-php-noble.sources", "");
    })
    .onCommand(/deb\.nodesource\.com\/setup_lts\.x/, () => {
      mem.files.set("/etc/apt/sources.list.d/nodesource.list", "");
    })
    .onCommand(/^git clone \S+ Nexus-AMS$/, (_m, cmd) => {
      mem.files.set(`${cmd.cwd ?? ""}/Nexus-AMS/.env.example`, "APP_NAME=Laravel\nAPP_KEY=\nDB_CONNECTION=sqlite\n");
    })
    .onCommand(/composer-setup\.php --install-dir/, () => {
      mem.files.set("/usr/local/bin/composer", "");
    })
    .onCommand(/^php artisan key:generate/, (_m, cmd) => {
      const envPath = `${cmd.cwd ?? ""}/.env`;
      const current = mem.files.get(envPath) ?? "";
      mem.files.set(envPath, current.replace(/^APP_KEY=.*$/m, `APP_KEY="${APP_KEY}"`));
    })
    .onCommand(/^certbot --nginx -d (\S+)/, (m) => {
      mem.files.set(`/etc/letsencrypt/live/${m[1]}/fullchain.pem`, "");
    });
}

/** A StageContext over a memory host for the given raw configuration. */
export async function contextFor(
  raw: Readonly<Record<string, string>>,
  opts?: { host?: MemoryHost; runner?: CommandRunner; log?: RunLog },
): Promise<StageContext> {
  const host = opts?.host ?? new MemoryHost();
  const log = opts?.log ?? captureLog().log;
  const result = await validateSettings(raw);
  if (!result.ok) throw new Error(result.errors.join("; "));
  const platform = detectPlatform(host, log.logger);
  const catalog = await loadCatalog();
  return {
    settings: result.record.settings,
    flags: result.flags,
    platform,
    catalog: catalog[platform.family],
    packages: createPackageManager(platform.family),
    host,
    runner: opts?.runner ?? host,
    logger: log.logger,
    derived: {},
  };
}
