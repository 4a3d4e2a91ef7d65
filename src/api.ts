/**
 * hostloom User API
 *
 * High-level entry points: evaluate hosts (discovery + merging) and resolve
 * them into built output collections.
 */

import type {
  BuilderProviders,
  CompositionContext,
  ConfigLayer,
  HostCollection,
  HostOutputs,
  HostRecord,
  HostsSettings,
  ModuleLoader,
  ModuleRef,
  ResolvedSettings,
} from "./core/index.js";
import {
  ConfigurationError,
  EMPTY_LAYER,
  SHARED_HOST_NAME,
  assemble,
  discoverClassModules,
  discoverHosts,
  discoverSharedLayer,
  inferPaths,
  isAndroidHostProvider,
  isDarwinProvider,
  isHomeManagerProvider,
  isNixpkgsProvider,
  mergeHost,
  mergeLayers,
  parseSettings,
  toHostRecord,
} from "./core/index.js";

// =============================================================================
// Options
// =============================================================================

export interface EvaluateOptions {
  /** Base directory for relative paths; defaults to $HOSTLOOM_ROOT, then the cwd */
  root?: string;
  /** Log discovery and build steps; defaults to HOSTLOOM_VERBOSE=1 */
  verbose?: boolean;
  /** Loader for host and shared files */
  load?: ModuleLoader;
}

interface ResolvedOptions {
  root: string;
  verbose: boolean;
  load?: ModuleLoader;
}

function resolveOptions(options: EvaluateOptions): ResolvedOptions {
  return {
    root: options.root ?? process.env.HOSTLOOM_ROOT ?? process.cwd(),
    verbose: options.verbose ?? process.env.HOSTLOOM_VERBOSE === "1",
    load: options.load,
  };
}

// =============================================================================
// Evaluation
// =============================================================================

interface Evaluation {
  hosts: HostCollection;
  systemsFilter: readonly string[] | null;
}

async function evaluate(cfg: ResolvedSettings, opts: ResolvedOptions): Promise<Evaluation> {
  const paths = inferPaths(cfg.auto, opts.root, opts);

  let discoveredShared: ConfigLayer = EMPTY_LAYER;
  let discovered: HostCollection = {};
  if (paths.hostsDir !== null) {
    discoveredShared = await discoverSharedLayer(paths.hostsDir, opts);
    discovered = await discoverHosts(paths.hostsDir, opts);
  }

  // Explicit `hosts.default` is layered over the discovered default file
  const explicitShared = cfg.hosts[SHARED_HOST_NAME];
  const shared = mergeLayers([
    discoveredShared,
    explicitShared === undefined
      ? EMPTY_LAYER
      : { modules: explicitShared.modules, specialArgs: explicitShared.specialArgs },
  ]);

  const raw: [string, HostRecord][] = Object.entries(discovered);
  for (const [name, hostSettings] of Object.entries(cfg.hosts)) {
    if (name === SHARED_HOST_NAME) continue;
    const existing = discovered[name];
    if (existing !== undefined) {
      throw new ConfigurationError(
        `Duplicate host "${name}": defined in hosts and discovered at ${existing.source}`,
        { code: "DUPLICATE_HOST", subject: name }
      );
    }
    raw.push([name, toHostRecord(name, hostSettings)]);
  }

  const hosts = raw.map(([name, host]): [string, HostRecord] => [
    name,
    mergeHost(
      host,
      shared,
      cfg.perClass,
      cfg.perArch,
      host.pure ? EMPTY_LAYER : discoverClassModules(paths.modulesDir, host.class)
    ),
  ]);

  return { hosts: Object.fromEntries(hosts), systemsFilter: paths.systemsFilter };
}

/**
 * Discover and merge every host, without building anything.
 *
 * @example
 * ```ts
 * const hosts = await evaluateHosts({ auto: { enable: true } }, { root: "." });
 * console.log(hosts.server.specialArgs);
 * ```
 */
export async function evaluateHosts(
  settings: HostsSettings,
  options: EvaluateOptions = {}
): Promise<HostCollection> {
  return evaluateSettings(parseSettings(settings), options);
}

/**
 * Like evaluateHosts, for settings already validated with parseSettings.
 * Used where the settings arrive untyped, such as a loaded config module.
 */
export async function evaluateSettings(
  cfg: ResolvedSettings,
  options: EvaluateOptions = {}
): Promise<HostCollection> {
  const { hosts } = await evaluate(cfg, resolveOptions(options));
  return hosts;
}

/**
 * Evaluate every host and build it with the builder of its class.
 *
 * @example
 * ```ts
 * const outputs = await resolveHosts(settings, { self, inputs, withSystem });
 * outputs.nixosConfigurations.server;
 * ```
 */
export async function resolveHosts(
  settings: HostsSettings,
  context: CompositionContext,
  options: EvaluateOptions = {}
): Promise<HostOutputs> {
  const opts = resolveOptions(options);
  const { hosts, systemsFilter } = await evaluate(parseSettings(settings), opts);
  const providers = context.providers ?? providersFromInputs(context.inputs);

  return assemble(hosts, systemsFilter, { ...context, providers }, opts);
}

// =============================================================================
// Providers
// =============================================================================

function firstMatching<T>(
  inputs: Record<string, unknown>,
  names: readonly string[],
  guard: (value: unknown) => value is T
): T | null {
  for (const name of names) {
    const value = inputs[name];
    if (guard(value)) return value;
  }
  return null;
}

/**
 * Find builder providers among named inputs.
 *
 * | provider    | input names                          |
 * |-------------|--------------------------------------|
 * | nixpkgs     | nixpkgs                              |
 * | darwin      | nix-darwin, darwin                   |
 * | homeManager | home-manager                         |
 * | androidHost | droid, nixOnDroid, androidHost       |
 *
 * A provider that is not found is null here. Building a host that needs it
 * fails, unless the host brings its own through `builderOverrides`.
 */
export function providersFromInputs(inputs: Record<string, unknown>): BuilderProviders {
  return {
    nixpkgs: firstMatching(inputs, ["nixpkgs"], isNixpkgsProvider),
    darwin: firstMatching(inputs, ["nix-darwin", "darwin"], isDarwinProvider),
    homeManager: firstMatching(inputs, ["home-manager"], isHomeManagerProvider),
    androidHost: firstMatching(inputs, ["droid", "nixOnDroid", "androidHost"], isAndroidHostProvider),
  };
}

// =============================================================================
// Summaries
// =============================================================================

export function describeModule(ref: ModuleRef): string {
  if (typeof ref === "string") return ref;
  if (typeof ref === "function") return `<function ${ref.name || "anonymous"}>`;
  return ref.key === undefined ? "<inline>" : `<inline ${ref.key}>`;
}

export interface HostSummary {
  class: HostRecord["class"];
  arch: HostRecord["arch"];
  platform: HostRecord["platform"];
  pure: boolean;
  deployable: boolean;
  source: string | null;
  modules: string[];
  specialArgs: string[];
}

/** JSON-friendly view of merged hosts: module descriptions and special-arg keys. */
export function summarizeHosts(hosts: HostCollection): Record<string, HostSummary> {
  return Object.fromEntries(
    Object.entries(hosts).map(([name, host]): [string, HostSummary] => [
      name,
      {
        class: host.class,
        arch: host.arch,
        platform: host.platform,
        pure: host.pure,
        deployable: host.deployable,
        source: host.source,
        modules: host.modules.map(describeModule),
        specialArgs: Object.keys(host.specialArgs),
      },
    ])
  );
}
