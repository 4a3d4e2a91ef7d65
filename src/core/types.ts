/**
 * Core type definitions for hostloom
 */

// Classes & Architectures
export const HOST_CLASSES = ["nixos", "darwin", "home", "androidHost"] as const;
export type HostClass = (typeof HOST_CLASSES)[number];

export const ARCHES = [
  "x86_64",
  "aarch64",
  "armv6l",
  "armv7l",
  "i686",
  "powerpc64le",
  "riscv64",
] as const;
export type Arch = (typeof ARCHES)[number];

export const DEFAULT_CLASS: HostClass = "nixos";
export const DEFAULT_ARCH: Arch = "x86_64";

/** Target platform triple (e.g., "x86_64-linux") */
export type Platform = `${Arch}-linux` | `${Arch}-darwin`;

// Modules
export interface InlineModule {
  /** Identity used by the module system to reject duplicate imports */
  key?: string;
  _file?: string;
  [option: string]: unknown;
}

export type ModuleFunction = (args: Record<string, unknown>) => unknown;

/** A file path, an inline module, or a module function. Opaque to the engine. */
export type ModuleRef = string | InlineModule | ModuleFunction;

export type SpecialArgs = Record<string, unknown>;

// Layers
export interface ConfigLayer {
  readonly modules: readonly ModuleRef[];
  readonly specialArgs: Readonly<SpecialArgs>;
}

/** What perClass / perArch functions may return; missing fields are empty. */
export interface LayerInput {
  modules?: readonly ModuleRef[];
  specialArgs?: SpecialArgs;
}

export type LayerFn<K extends string> = (key: K) => LayerInput;

export const EMPTY_LAYER: ConfigLayer = Object.freeze({
  modules: Object.freeze([]),
  specialArgs: Object.freeze({}),
});

// Builders
export interface BuilderArgs {
  specialArgs: SpecialArgs;
  modules: ModuleRef[];
}

/** An external system builder. Its result is opaque to hostloom. */
export type Builder = (args: BuilderArgs) => unknown;

export interface NixpkgsProvider {
  lib: { nixosSystem: Builder };
  outPath: string;
}

export interface DarwinProvider {
  lib: { darwinSystem: Builder };
}

export interface HomeManagerProvider {
  lib: { homeManagerConfiguration: Builder };
}

export interface AndroidHostProvider {
  lib: { androidHostConfiguration: Builder };
}

/** Every provider is optional; one is required only when a host needs it. */
export interface BuilderProviders {
  nixpkgs?: NixpkgsProvider | null;
  darwin?: DarwinProvider | null;
  homeManager?: HomeManagerProvider | null;
  androidHost?: AndroidHostProvider | null;
}

// Composition context
export interface SystemScope {
  selfScoped: unknown;
  inputsScoped: Record<string, unknown>;
}

export type WithSystem = <T>(platform: Platform, fn: (scope: SystemScope) => T) => T;

/**
 * The outer composition that hosts are resolved for. Passed explicitly
 * through every call that needs it.
 */
export interface CompositionContext {
  self: unknown;
  inputs: Record<string, unknown>;
  withSystem: WithSystem;
  /** Defaults to the providers found in `inputs` */
  providers?: BuilderProviders;
}

// Hosts
export interface HostRecord {
  readonly name: string;
  readonly class: HostClass;
  readonly arch: Arch;
  /** Derived from arch and class; null for home and androidHost */
  readonly platform: Platform | null;
  readonly pure: boolean;
  readonly deployable: boolean;
  readonly builderOverrides: Partial<BuilderProviders>;
  readonly modules: readonly ModuleRef[];
  readonly specialArgs: Readonly<SpecialArgs>;
  /** File or directory the host was discovered from; null for explicit hosts */
  readonly source: string | null;
}

export type HostCollection = Record<string, HostRecord>;

/** Name reserved for the shared layer; never a host */
export const SHARED_HOST_NAME = "default";

// Outputs
export const COLLECTION_NAMES = {
  nixos: "nixosConfigurations",
  darwin: "darwinConfigurations",
  home: "homeConfigurations",
  androidHost: "androidHostConfigurations",
} as const satisfies Record<HostClass, string>;

export type CollectionName = (typeof COLLECTION_NAMES)[HostClass];

export type HostOutputs = Record<CollectionName, Record<string, unknown>>;
