/**
 * hostloom core exports
 */

// Types
export type {
  HostClass,
  Arch,
  Platform,
  InlineModule,
  ModuleFunction,
  ModuleRef,
  SpecialArgs,
  ConfigLayer,
  LayerInput,
  LayerFn,
  BuilderArgs,
  Builder,
  NixpkgsProvider,
  DarwinProvider,
  HomeManagerProvider,
  AndroidHostProvider,
  BuilderProviders,
  SystemScope,
  WithSystem,
  CompositionContext,
  HostRecord,
  HostCollection,
  CollectionName,
  HostOutputs,
} from "./types.js";

export {
  HOST_CLASSES,
  ARCHES,
  DEFAULT_CLASS,
  DEFAULT_ARCH,
  EMPTY_LAYER,
  SHARED_HOST_NAME,
  COLLECTION_NAMES,
} from "./types.js";

// Errors
export type { ConfigurationErrorCode } from "./errors.js";
export { ConfigurationError, isConfigurationError } from "./errors.js";

// System
export type { Override } from "./system.js";
export { resolvePlatform, mkOverride, mkDefault, DEFAULT_PRIORITY } from "./system.js";

// Settings
export type {
  HostsSettings,
  HostSettings,
  AutoSettings,
  ResolvedSettings,
  ResolvedHostSettings,
  ResolvedAutoSettings,
  LayerSettings,
} from "./config.js";
export {
  hostsSettingsSchema,
  hostSettingsSchema,
  autoSettingsSchema,
  layerSettingsSchema,
  parseSettings,
  parseHostSettings,
  parseLayerSettings,
  defineHosts,
  toHostRecord,
  isNixpkgsProvider,
  isDarwinProvider,
  isHomeManagerProvider,
  isAndroidHostProvider,
} from "./config.js";

// Paths
export type { InferredPaths } from "./paths.js";
export {
  HOSTS_DIR_CANDIDATES,
  MODULES_DIR_CANDIDATES,
  findFirstPath,
  inferPaths,
  isDirectory,
} from "./paths.js";

// Discovery
export type { ModuleLoader, DiscoverOptions, HostEntry } from "./discover.js";
export {
  MODULE_SUFFIXES,
  stripModuleSuffix,
  findEntryPoint,
  loadModuleFile,
  scanHostsDir,
  discoverHosts,
  discoverSharedLayer,
  discoverClassModules,
} from "./discover.js";

// Merging
export { isPlainObject, recursiveUpdate, toLayer, mergeLayers, mergeHost } from "./merge.js";

// Assembly
export type { StandardModuleOptions, AssembleContext } from "./assemble.js";
export {
  MODULE_KEY_PREFIX,
  filterBySystem,
  resolveBuilder,
  hostProviders,
  makeStandardModules,
  buildHost,
  emptyOutputs,
  assemble,
} from "./assemble.js";
