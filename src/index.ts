/**
 * hostloom - layered host resolution for system builders
 *
 * @packageDocumentation
 *
 * @example
 * ```ts
 * import { defineHosts, resolveHosts } from 'hostloom';
 *
 * const settings = defineHosts({
 *   auto: { enable: true },
 *   perClass: (cls) => ({ specialArgs: { cls } }),
 * });
 *
 * const outputs = await resolveHosts(settings, { self, inputs, withSystem });
 * outputs.nixosConfigurations.server;
 * ```
 */

// Re-export the user-facing API
export {
  /** Discover and merge hosts without building them */
  evaluateHosts,
  /** evaluateHosts for settings already returned by parseSettings */
  evaluateSettings,
  /** Discover, merge and build hosts into per-class collections */
  resolveHosts,
  /** Read builder providers from named inputs */
  providersFromInputs,
  /** JSON-friendly view of merged hosts */
  summarizeHosts,
} from "./api.js";

export type {
  /** Options shared by evaluateHosts and resolveHosts */
  EvaluateOptions,
  HostSummary,
} from "./api.js";

export {
  /** Typed identity helper for settings files */
  defineHosts,
  /** Validate settings and fill in defaults */
  parseSettings,
  /** Give a value default module priority */
  mkDefault,
  /** Give a value an explicit module priority */
  mkOverride,
  /** Platform triple of an (arch, class) pair */
  resolvePlatform,
  /** Error raised for every fatal resolution problem */
  ConfigurationError,
  isConfigurationError,

  /** Lower-level: Resolve hosts and modules directories */
  inferPaths,
  /** Lower-level: Discover hosts under a directory */
  discoverHosts,
  /** Lower-level: Load the shared `default` layer */
  discoverSharedLayer,
  /** Lower-level: Find the auto-loaded module of a class */
  discoverClassModules,
  /** Lower-level: Merge the layers of one host */
  mergeHost,
  /** Lower-level: Overlay special args */
  recursiveUpdate,
  /** Lower-level: Keep hosts matching a systems allow-list */
  filterBySystem,
  /** Lower-level: Build and group merged hosts */
  assemble,
} from "./core/index.js";

// Re-export types
export type {
  HostClass,
  Arch,
  Platform,
  ModuleRef,
  SpecialArgs,
  ConfigLayer,
  HostRecord,
  HostCollection,
  HostOutputs,
  BuilderProviders,
  CompositionContext,
  HostsSettings,
  ResolvedSettings,
  HostSettings,
} from "./core/index.js";
