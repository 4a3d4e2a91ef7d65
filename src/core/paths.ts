/**
 * Path inference for hostloom
 *
 * Finds the hosts and class-modules directories by convention when they are
 * not set explicitly.
 */

import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { ResolvedAutoSettings } from "./config.js";
import { ConfigurationError } from "./errors.js";

export const HOSTS_DIR_CANDIDATES = ["hosts", "systems"] as const;
export const MODULES_DIR_CANDIDATES = ["modules", "module", "classes", "class"] as const;

export interface InferredPaths {
  hostsDir: string | null;
  modulesDir: string | null;
  systemsFilter: readonly string[] | null;
}

export function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/** Return the first candidate that exists, or null. */
export function findFirstPath(
  candidates: readonly string[],
  exists: (path: string) => boolean = isDirectory
): string | null {
  return candidates.find((candidate) => exists(candidate)) ?? null;
}

/**
 * Resolve the directories discovery works from.
 *
 * Nothing touches the filesystem while auto discovery is disabled. Once it
 * is enabled a hosts directory is required; a modules directory is not.
 */
export function inferPaths(
  auto: ResolvedAutoSettings,
  root: string,
  options: { verbose?: boolean } = {}
): InferredPaths {
  if (!auto.enable) {
    return { hostsDir: null, modulesDir: null, systemsFilter: null };
  }

  let hostsDir: string;
  if (auto.hostsDir) {
    hostsDir = resolve(root, auto.hostsDir);
  } else {
    const candidates = HOSTS_DIR_CANDIDATES.map((name) => resolve(root, name));
    const found = findFirstPath(candidates);
    if (found === null) {
      throw new ConfigurationError(
        `auto: no hosts directory found; set auto.hostsDir or create ${HOSTS_DIR_CANDIDATES.map((c) => `./${c}`).join(" or ")} under ${root}`,
        { code: "HOSTS_DIR_NOT_FOUND", subject: "auto.hostsDir" }
      );
    }
    hostsDir = found;
  }

  const modulesDir = auto.modulesDir
    ? resolve(root, auto.modulesDir)
    : findFirstPath(MODULES_DIR_CANDIDATES.map((name) => resolve(root, name)));

  if (options.verbose) {
    console.log(`[hostloom] Hosts directory: ${hostsDir}`);
    console.log(`[hostloom] Modules directory: ${modulesDir ?? "(none)"}`);
  }

  return { hostsDir, modulesDir, systemsFilter: auto.systems ?? null };
}
