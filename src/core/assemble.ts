/**
 * Collection assembly for hostloom
 *
 * Implements:
 * - System filtering against an optional allow-list
 * - Builder selection per host class
 * - Standard module injection
 * - Grouping built hosts into one output collection per class
 */

import { fileURLToPath } from "node:url";
import type {
  Builder,
  BuilderProviders,
  CompositionContext,
  HostClass,
  HostCollection,
  HostOutputs,
  HostRecord,
  InlineModule,
  NixpkgsProvider,
  Platform,
  WithSystem,
} from "./types.js";
import { COLLECTION_NAMES, SHARED_HOST_NAME } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { recursiveUpdate } from "./merge.js";
import { mkDefault } from "./system.js";

const MODULE_FILE = fileURLToPath(import.meta.url);

/** Prefix of the identity keys of every injected module */
export const MODULE_KEY_PREFIX = "hostloom#";

// =============================================================================
// Filtering
// =============================================================================

/**
 * Keep hosts whose platform is in `systems`. Hosts without a platform
 * (home, androidHost) have nothing to match and are always kept.
 */
export function filterBySystem(
  hosts: HostCollection,
  systems: readonly string[] | null
): HostCollection {
  if (systems === null) return hosts;
  return Object.fromEntries(
    Object.entries(hosts).filter(
      ([, host]) => host.platform === null || systems.includes(host.platform)
    )
  );
}

// =============================================================================
// Builders
// =============================================================================

function missingProvider(hostClass: HostClass, provider: string): ConfigurationError {
  return new ConfigurationError(
    `${hostClass} hosts require the ${provider} builder provider, but none is configured`,
    { code: "MISSING_PROVIDER", subject: hostClass }
  );
}

/** Select the builder for a class from the available providers. */
export function resolveBuilder(hostClass: HostClass, providers: BuilderProviders): Builder {
  switch (hostClass) {
    case "darwin":
      if (!providers.darwin) throw missingProvider(hostClass, "darwin");
      return providers.darwin.lib.darwinSystem;
    case "home":
      if (!providers.homeManager) throw missingProvider(hostClass, "homeManager");
      return providers.homeManager.lib.homeManagerConfiguration;
    case "androidHost":
      if (!providers.androidHost) throw missingProvider(hostClass, "androidHost");
      return providers.androidHost.lib.androidHostConfiguration;
    case "nixos":
      if (!providers.nixpkgs) throw missingProvider(hostClass, "nixpkgs");
      return providers.nixpkgs.lib.nixosSystem;
  }
}

/** Per-host overrides win over the composition's providers. */
export function hostProviders(host: HostRecord, providers: BuilderProviders): BuilderProviders {
  return {
    nixpkgs: host.builderOverrides.nixpkgs ?? providers.nixpkgs,
    darwin: host.builderOverrides.darwin ?? providers.darwin,
    homeManager: host.builderOverrides.homeManager ?? providers.homeManager,
    androidHost: host.builderOverrides.androidHost ?? providers.androidHost,
  };
}

// =============================================================================
// Standard Modules
// =============================================================================

export interface StandardModuleOptions {
  name: string;
  class: HostClass;
  platform: Platform | null;
  nixpkgs?: NixpkgsProvider | null;
  withSystem: WithSystem;
}

/**
 * Modules every host receives ahead of its own, in this order:
 *
 * 1. `hostloom#specialArgs`: platform-scoped handles (platform hosts only)
 * 2. `hostloom#hostname`: the host name, at default priority
 * 3. `hostloom#nixpkgs`: host platform and flake source (platform hosts only)
 * 4. `hostloom#nixpkgs-darwin`: nixpkgs source (darwin only)
 *
 * Hosts with a platform need the nixpkgs provider; the others do not.
 */
export function makeStandardModules(options: StandardModuleOptions): InlineModule[] {
  const { name, platform, nixpkgs } = options;
  const hostname: InlineModule = {
    key: `${MODULE_KEY_PREFIX}hostname`,
    _file: MODULE_FILE,
    networking: { hostName: mkDefault(name) },
  };

  if (platform === null) return [hostname];
  if (!nixpkgs) throw missingProvider(options.class, "nixpkgs");

  const modules: InlineModule[] = [
    {
      key: `${MODULE_KEY_PREFIX}specialArgs`,
      _file: MODULE_FILE,
      _module: {
        args: options.withSystem(platform, ({ selfScoped, inputsScoped }) => ({
          selfScoped,
          inputsScoped,
        })),
      },
    },
    hostname,
    {
      key: `${MODULE_KEY_PREFIX}nixpkgs`,
      _file: MODULE_FILE,
      nixpkgs: {
        hostPlatform: mkDefault(platform),
        flake: { source: nixpkgs.outPath },
      },
    },
  ];

  if (options.class === "darwin") {
    modules.push({
      key: `${MODULE_KEY_PREFIX}nixpkgs-darwin`,
      _file: MODULE_FILE,
      nixpkgs: { source: mkDefault(nixpkgs.outPath) },
    });
  }

  return modules;
}

// =============================================================================
// Assembly
// =============================================================================

export interface AssembleContext extends CompositionContext {
  providers: BuilderProviders;
}

/** Build one merged host with the builder of its class. */
export function buildHost(
  host: HostRecord,
  context: AssembleContext,
  options: { verbose?: boolean } = {}
): unknown {
  const providers = hostProviders(host, context.providers);
  const builder = resolveBuilder(host.class, providers);

  const modules = [
    ...makeStandardModules({
      name: host.name,
      class: host.class,
      platform: host.platform,
      nixpkgs: providers.nixpkgs,
      withSystem: context.withSystem,
    }),
    ...host.modules,
  ];
  const specialArgs = recursiveUpdate(
    { inputs: context.inputs, self: context.self },
    host.specialArgs
  );

  if (options.verbose) {
    console.log(`[hostloom] Building ${host.class} host ${host.name} (${modules.length} modules)`);
  }
  return builder({ specialArgs, modules });
}

export function emptyOutputs(): HostOutputs {
  return {
    nixosConfigurations: {},
    darwinConfigurations: {},
    homeConfigurations: {},
    androidHostConfigurations: {},
  };
}

/**
 * Filter, build and group merged hosts. Every collection is present in the
 * result; a class without hosts maps to an empty collection.
 */
export function assemble(
  hosts: HostCollection,
  systems: readonly string[] | null,
  context: AssembleContext,
  options: { verbose?: boolean } = {}
): HostOutputs {
  const realHosts = Object.fromEntries(
    Object.entries(hosts).filter(([name]) => name !== SHARED_HOST_NAME)
  );
  const outputs = emptyOutputs();

  for (const [name, host] of Object.entries(filterBySystem(realHosts, systems))) {
    outputs[COLLECTION_NAMES[host.class]][name] = buildHost(host, context, options);
  }

  return outputs;
}
