import path from "node:path";
import { reloadService } from "../../host/package-manager.js";
import { shellQuote, writeFileCommand } from "../../shell/command.js";
import { loadTemplate, renderTemplate } from "../templates.js";
import { disabled, ENABLED, step, type Stage, type StageContext, type Step } from "../stage.js";
import { installStep, owner, serviceOf } from "./helpers.js";
import { resolvePhpFpmSocket } from "./services.js";

export const SITE_NAME = "nexus";
export const FASTCGI_CACHE_DIR = "/var/cache/nginx/nexus";
export const FASTCGI_CACHE_ZONE = "nexus_cache";

export function certificatePath(domain: string): string {
  return `/etc/letsencrypt/live/${domain}/fullchain.pem`;
}

/** The session cookie Laravel derives from APP_NAME when SESSION_COOKIE is unset. */
export function sessionCookieName(appName: string): string {
  const slug = appName
    .toLowerCase()
    .replace(/-/g, "_")
    .replace(/@/g, "_at_")
    .replace(/[^a-z0-9_\s]+/g, "")
    .replace(/[_\s]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${slug === "" ? "laravel" : slug}_session`;
}

export type SitePaths = { site: string; enabled?: string };

/** Debian keeps sites-available + a sites-enabled symlink; RedHat includes conf.d directly. */
export function sitePaths(ctx: StageContext): SitePaths {
  const { nginxSiteDir, nginxEnabledDir } = ctx.catalog.paths;
  if (nginxEnabledDir) {
    return {
      site: path.posix.join(nginxSiteDir, SITE_NAME),
      enabled: path.posix.join(nginxEnabledDir, SITE_NAME),
    };
  }
  return { site: path.posix.join(nginxSiteDir, `${SITE_NAME}.conf`) };
}

/** The site file: the TLS variant once a certificate exists, plain HTTP before. */
export function renderSite(ctx: StageContext, tls: boolean): string {
  const vars = {
    DOMAIN: ctx.settings.DOMAIN,
    APP_PATH: ctx.settings.APP_PATH,
    PHP_FPM_SOCKET: ctx.derived.phpFpmSocket ?? resolvePhpFpmSocket(ctx),
    CACHE_DIR: FASTCGI_CACHE_DIR,
    CACHE_ZONE: FASTCGI_CACHE_ZONE,
    SESSION_COOKIE: sessionCookieName(ctx.settings.APP_NAME),
  };
  const body = renderTemplate(loadTemplate("nginx-site-body.conf"), vars).trimEnd();
  const outer = loadTemplate(tls ? "nginx-site-tls.conf" : "nginx-site.conf");
  return renderTemplate(outer, { ...vars, SITE_BODY: body });
}

export const reverseProxyStage: Stage = {
  id: "reverse-proxy",
  title: "Nginx site & TLS",
  gate: (ctx) => (ctx.flags.webServer ? ENABLED : disabled("web server not enabled for this profile")),
  async plan(ctx: StageContext) {
    const { settings, host } = ctx;
    const notes: string[] = [];
    const paths = sitePaths(ctx);
    const web = serviceOf(ctx, "web");
    const hasCertificate = host.exists(certificatePath(settings.DOMAIN));

    const validateAndReload = (): Step[] => [
      step("config-validation", "Validate Nginx configuration", { line: "nginx -t" }),
      step("service-reload", `Reload ${web}`, reloadService(web)),
    ];

    const steps: Step[] = [
      step("filesystem", "Create FastCGI cache directory", {
        line: `mkdir -p ${FASTCGI_CACHE_DIR} && chown ${owner(ctx)} ${FASTCGI_CACHE_DIR}`,
      }),
      step(
        "file-write",
        `Write ${hasCertificate ? "TLS" : "HTTP"} site for ${settings.DOMAIN}`,
        writeFileCommand(paths.site, renderSite(ctx, hasCertificate)),
      ),
    ];

    if (paths.enabled) {
      if (host.isSymlink(paths.enabled)) {
        notes.push(`Site already enabled (${paths.enabled})`);
      } else {
        steps.push(
          step("filesystem", "Enable site", {
            line: `ln -sf ${shellQuote(paths.site)} ${shellQuote(paths.enabled)}`,
          }),
        );
      }
    }
    steps.push(...validateAndReload());

    if (!settings.ENABLE_TLS) {
      notes.push("TLS disabled (ENABLE_TLS=false)");
      return { steps, notes };
    }

    steps.push(
      installStep(ctx, "certbot", "Install Certbot"),
      step("certificate-issue", `Issue certificate for ${settings.DOMAIN}`, {
        line: [
          "certbot --nginx",
          `-d ${shellQuote(settings.DOMAIN)}`,
          "--non-interactive --agree-tos",
          `-m ${shellQuote(settings.ADMIN_EMAIL)}`,
          "--redirect",
        ].join(" "),
      }),
      step("certificate-renew-test", "Test certificate renewal", { line: "certbot renew --dry-run" }),
      ...validateAndReload(),
    );
    return { steps, notes };
  },
};
