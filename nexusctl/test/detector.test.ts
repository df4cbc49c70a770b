import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_CATALOG_PATH, DEFAULT_CATALOG_SCHEMA_PATH, loadCatalog, PACKAGE_ROOT } from "../src/host/catalog.js";
import { detectPlatform, detectWebUser, parseOsRelease, resolveFamily } from "../src/host/detector.js";
import { InstallerError } from "../src/errors.js";
import { captureLog } from "./helpers/fixtures.js";
import { MemoryHost, ROCKY_OS_RELEASE } from "./helpers/memory-host.js";

function detectionError(host: MemoryHost): InstallerError {
  try {
    detectPlatform(host, captureLog().log.logger);
  } catch (err) {
    if (err instanceof InstallerError) return err;
    throw err;
  }
  throw new Error("expected detection to fail");
}

describe("parseOsRelease", () => {
  it("strips quotes and ignores other lines", () => {
    expect(parseOsRelease('NAME="Debian GNU/Linux"\nID=debian\n# comment\nVERSION_ID=\'12\'\n')).toEqual({
      NAME: "Debian GNU/Linux",
      ID: "debian",
      VERSION_ID: "12",
    });
  });
});

describe("resolveFamily", () => {
  it("maps IDs and ID_LIKE to a family", () => {
    expect(resolveFamily({ ID: "ubuntu" })).toBe("debian");
    expect(resolveFamily({ ID: "linuxmint", ID_LIKE: "ubuntu debian" })).toBe("debian");
    expect(resolveFamily({ ID: "almalinux" })).toBe("rhel");
    expect(resolveFamily({ ID: "ol", ID_LIKE: "fedora" })).toBe("rhel");
    expect(resolveFamily({ ID: "arch" })).toBeNull();
  });
});

describe("detectPlatform", () => {
  it("detects Ubuntu with apt-get and www-data", () => {
    const platform = detectPlatform(new MemoryHost(), captureLog().log.logger);
    expect(platform).toEqual({
      family: "debian",
      packageManager: "apt-get",
      osId: "ubuntu",
      osName: "Ubuntu 24.04 LTS",
      osVersion: "24.04",
      webUser: "www-data",
    });
  });

  it("detects Rocky with dnf and the nginx account", () => {
    const host = new MemoryHost({
      osRelease: ROCKY_OS_RELEASE,
      passwd: "root:x:0:0:root:/root:/bin/bash\nnginx:x:990:990::/var/lib/nginx:/sbin/nologin\n",
    });
    const platform = detectPlatform(host, captureLog().log.logger);
    expect(platform.family).toBe("rhel");
    expect(platform.packageManager).toBe("dnf");
    expect(platform.osName).toBe("Rocky Linux");
    expect(platform.webUser).toBe("nginx");
  });

  it("fails without /etc/os-release", () => {
    const err = detectionError(new MemoryHost({ osRelease: null }));
    expect(err.kind).toBe("precondition");
    expect(err.code).toBe("OS_RELEASE_MISSING");
  });

  it("fails for unsupported distributions", () => {
    const err = detectionError(new MemoryHost({ osRelease: "ID=arch\n" }));
    expect(err.code).toBe("OS_UNSUPPORTED");
    expect(err.message).toBe('Unsupported OS "arch": only Debian-like and RedHat-like systems are supported.');
  });
});

describe("detectWebUser", () => {
  it("prefers www-data over later candidates", () => {
    const host = new MemoryHost({ passwd: "apache:x:48:48::/:/sbin/nologin\nwww-data:x:33:33::/:/sbin/nologin\n" });
    expect(detectWebUser(host, captureLog().log.logger)).toBe("www-data");
  });

  it("warns and falls back to www-data", () => {
    const captured = captureLog();
    const host = new MemoryHost({ passwd: "root:x:0:0:root:/root:/bin/bash\n" });
    expect(detectWebUser(host, captured.log.logger)).toBe("www-data");
    expect(captured.text()).toBe(
      "[!] No web service account found (www-data, nginx, apache, http); defaulting to www-data\n",
    );
  });
});

describe("platform catalog", () => {
  it("resolves the package root as a plain filesystem path", () => {
    expect(PACKAGE_ROOT).toBe(path.resolve(path.dirname(fileURLToPath(import.meta.url)), ".."));
    expect(fs.existsSync(DEFAULT_CATALOG_PATH)).toBe(true);
  });

  it("loads from a directory whose name has spaces", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl catalog "));
    try {
      const catalogPath = path.join(dir, "platforms.yaml");
      const schemaPath = path.join(dir, "platforms.schema.json");
      fs.copyFileSync(DEFAULT_CATALOG_PATH, catalogPath);
      fs.copyFileSync(DEFAULT_CATALOG_SCHEMA_PATH, schemaPath);
      const catalog = await loadCatalog(catalogPath, schemaPath);
      expect(Object.keys(catalog).sort()).toEqual(["debian", "rhel"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("rejects a catalog that does not match its schema", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "nexusctl-catalog-"));
    try {
      const catalogPath = path.join(dir, "platforms.yaml");
      fs.writeFileSync(catalogPath, "debian: {}\n");
      await expect(loadCatalog(catalogPath)).rejects.toThrow(/^Platform catalog invalid \(.*platforms\.yaml\): catalog/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
