/**
 * Filesystem discovery for hostloom
 *
 * Implements:
 * - Host discovery: `{hostsDir}/{name}.<ext>` and `{hostsDir}/{name}/default.<ext>`
 * - Shared layer: `{hostsDir}/default.<ext>` or `{hostsDir}/default/default.<ext>`
 * - Class modules: `{modulesDir}/{class}.<ext>` or `{modulesDir}/{class}/default.<ext>`
 */

import { readdirSync, readFileSync, statSync, type Dirent } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { ConfigLayer, HostClass, HostCollection, HostRecord, ModuleRef } from "./types.js";
import { EMPTY_LAYER, SHARED_HOST_NAME } from "./types.js";
import { parseHostSettings, parseLayerSettings, toHostRecord } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { findFirstPath } from "./paths.js";

/** File suffixes recognized as modules, in lookup order. Each loads under plain Node. */
export const MODULE_SUFFIXES = [".js", ".mjs", ".json"] as const;

/** Loads a module file and returns the value it defines. */
export type ModuleLoader = (file: string) => Promise<unknown>;

export interface DiscoverOptions {
  load?: ModuleLoader;
  verbose?: boolean;
}

/** A filesystem entry under the hosts directory that names a host. */
export interface HostEntry {
  name: string;
  /** The file to load */
  file: string;
  /** The entry itself: the file, or the directory holding `file` */
  source: string;
}

// =============================================================================
// Helpers
// =============================================================================

export function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

/** "server.json" -> "server"; null when the suffix is not a module suffix. */
export function stripModuleSuffix(fileName: string): string | null {
  const suffix = MODULE_SUFFIXES.find(
    (s) => fileName.endsWith(s) && fileName.length > s.length
  );
  return suffix === undefined ? null : fileName.slice(0, -suffix.length);
}

/** The `default.<ext>` file of a directory, if it has one. */
export function findEntryPoint(dir: string): string | null {
  return findFirstPath(
    MODULE_SUFFIXES.map((suffix) => join(dir, `${SHARED_HOST_NAME}${suffix}`)),
    isFile
  );
}

/**
 * Default loader: JSON files are parsed, anything else is imported and its
 * default export (or the whole namespace) is used.
 */
export async function loadModuleFile(file: string): Promise<unknown> {
  if (file.endsWith(".json")) {
    return JSON.parse(readFileSync(file, "utf-8"));
  }
  const mod: unknown = await import(pathToFileURL(file).href);
  return typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
}

async function loadFile(file: string, load: ModuleLoader): Promise<unknown> {
  try {
    return await load(file);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to load ${file}: ${reason}`, {
      code: "LOAD_FAILED",
      subject: file,
      cause: err,
    });
  }
}

function anchorPath(ref: string, baseDir: string): string {
  return !isAbsolute(ref) && (ref.startsWith("./") || ref.startsWith("../"))
    ? resolve(baseDir, ref)
    : ref;
}

/** Resolve `./` and `../` module paths against the file that named them. */
function anchorModules(modules: readonly ModuleRef[], baseDir: string): ModuleRef[] {
  return modules.map((ref) => (typeof ref === "string" ? anchorPath(ref, baseDir) : ref));
}

// =============================================================================
// Scanning
// =============================================================================

function describeEntry(entry: Dirent): string {
  return entry.isDirectory() ? `${entry.name}/` : entry.name;
}

/**
 * List the entries of a hosts directory that define a host or the shared
 * layer, sorted by name. Two entries with the same name are an error.
 */
export function scanHostsDir(hostsDir: string, options: { verbose?: boolean } = {}): HostEntry[] {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(hostsDir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigurationError(`Cannot read hosts directory ${hostsDir}`, {
      code: "HOSTS_DIR_NOT_FOUND",
      subject: hostsDir,
      cause: err,
    });
  }
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const seen = new Map<string, Dirent>();
  const entries: HostEntry[] = [];

  for (const dirent of dirents) {
    const path = join(hostsDir, dirent.name);
    let entry: HostEntry | null = null;

    if (dirent.isFile()) {
      const name = stripModuleSuffix(dirent.name);
      if (name !== null) entry = { name, file: path, source: path };
    } else if (dirent.isDirectory()) {
      const file = findEntryPoint(path);
      if (file !== null) {
        entry = { name: dirent.name, file, source: path };
      } else if (options.verbose) {
        console.log(`[hostloom] Skipping ${path}: no default entry point`);
      }
    }
    if (entry === null) continue;

    const previous = seen.get(entry.name);
    if (previous !== undefined) {
      throw new ConfigurationError(
        `Duplicate host "${entry.name}": both ${describeEntry(previous)} and ${describeEntry(dirent)} in ${hostsDir} define it`,
        { code: "DUPLICATE_HOST", subject: entry.name }
      );
    }
    seen.set(entry.name, dirent);
    entries.push(entry);
  }

  return entries;
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Discover the hosts defined under a hosts directory.
 *
 * The reserved `default` entry is the shared layer and is never returned
 * as a host; see discoverSharedLayer.
 */
export async function discoverHosts(
  hostsDir: string,
  options: DiscoverOptions = {}
): Promise<HostCollection> {
  const load = options.load ?? loadModuleFile;
  const hosts: [string, HostRecord][] = [];

  for (const entry of scanHostsDir(hostsDir, options)) {
    if (entry.name === SHARED_HOST_NAME) continue;

    const settings = parseHostSettings(await loadFile(entry.file, load), entry.file);
    const baseDir = dirname(entry.file);
    const record = toHostRecord(
      entry.name,
      {
        ...settings,
        modules: anchorModules(settings.modules, baseDir),
        path: settings.path === undefined ? undefined : anchorPath(settings.path, baseDir),
      },
      entry.source
    );

    if (options.verbose) {
      console.log(`[hostloom] Discovered ${record.class} host ${record.name} (${entry.source})`);
    }
    hosts.push([entry.name, record]);
  }

  return Object.fromEntries(hosts);
}

/** Load the shared layer from the reserved `default` entry, if present. */
export async function discoverSharedLayer(
  hostsDir: string,
  options: DiscoverOptions = {}
): Promise<ConfigLayer> {
  const entry = scanHostsDir(hostsDir).find((e) => e.name === SHARED_HOST_NAME);
  if (entry === undefined) return EMPTY_LAYER;

  const layer = parseLayerSettings(await loadFile(entry.file, options.load ?? loadModuleFile), entry.file);
  if (options.verbose) {
    console.log(`[hostloom] Shared layer: ${entry.file}`);
  }
  return {
    modules: anchorModules(layer.modules, dirname(entry.file)),
    specialArgs: layer.specialArgs,
  };
}

/**
 * Find the auto-loaded module for a class. The module is referenced by path,
 * not loaded; a missing directory or file contributes nothing.
 */
export function discoverClassModules(modulesDir: string | null, hostClass: HostClass): ConfigLayer {
  if (modulesDir === null) return EMPTY_LAYER;

  const file =
    findFirstPath(
      MODULE_SUFFIXES.map((suffix) => join(modulesDir, `${hostClass}${suffix}`)),
      isFile
    ) ?? findEntryPoint(join(modulesDir, hostClass));

  return file === null ? EMPTY_LAYER : { modules: [file], specialArgs: {} };
}
