// Package-manager command builders, one per supported family.
// Stages never spell out apt-get/dnf invocations themselves; they ask the
// PackageManager for a ShellCommand and hand it to the Command Runner.
import { shellQuote, type ShellCommand } from "../shell/command.js";
import type { PlatformFamily } from "./detector.js";

export interface PackageManager {
  /** Refresh the package index. */
  update(): ShellCommand;
  upgrade(): ShellCommand;
  install(packages: string[]): ShellCommand;
}

function names(packages: string[]): string {
  return packages.map(shellQuote).join(" ");
}

/** Debian/Ubuntu. */
export class AptPackageManager implements PackageManager {
  private readonly prefix = "DEBIAN_FRONTEND=noninteractive apt-get";

  update(): ShellCommand {
    return { line: `${this.prefix} update` };
  }

  upgrade(): ShellCommand {
    return { line: `${this.prefix} upgrade -y` };
  }

  install(packages: string[]): ShellCommand {
    return { line: `${this.prefix} install -y ${names(packages)}` };
  }
}

/** RHEL/Rocky/Alma/Fedora. */
export class DnfPackageManager implements PackageManager {
  update(): ShellCommand {
    return { line: "dnf makecache -y" };
  }

  upgrade(): ShellCommand {
    return { line: "dnf upgrade -y" };
  }

  install(packages: string[]): ShellCommand {
    return { line: `dnf install -y ${names(packages)}` };
  }
}

export function createPackageManager(family: PlatformFamily): PackageManager {
  switch (family) {
    case "debian":
      return new AptPackageManager();
    case "rhel":
      return new DnfPackageManager();
  }
}

export function enableService(unit: string): ShellCommand {
  return { line: `systemctl enable --now ${shellQuote(unit)}` };
}

export function reloadService(unit: string): ShellCommand {
  return { line: `systemctl reload ${shellQuote(unit)}` };
}

export function restartService(unit: string): ShellCommand {
  return { line: `systemctl restart ${shellQuote(unit)}` };
}
