/**
 * Settings schema for hostloom
 *
 * Everything a caller or a discovered host file provides is validated here
 * with zod, and defaults are filled in, before the engine looks at it.
 */

import { z } from "zod";
import type {
  AndroidHostProvider,
  Arch,
  DarwinProvider,
  HomeManagerProvider,
  HostClass,
  HostRecord,
  InlineModule,
  LayerFn,
  ModuleFunction,
  NixpkgsProvider,
} from "./types.js";
import { ARCHES, DEFAULT_ARCH, DEFAULT_CLASS, HOST_CLASSES } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { isPlainObject } from "./merge.js";
import { resolvePlatform } from "./system.js";

// =============================================================================
// Provider Guards
// =============================================================================

function hasBuilder(value: unknown, name: string): boolean {
  return isPlainObject(value) && isPlainObject(value.lib) && typeof value.lib[name] === "function";
}

export function isNixpkgsProvider(value: unknown): value is NixpkgsProvider {
  return hasBuilder(value, "nixosSystem") && isPlainObject(value) && typeof value.outPath === "string";
}

export function isDarwinProvider(value: unknown): value is DarwinProvider {
  return hasBuilder(value, "darwinSystem");
}

export function isHomeManagerProvider(value: unknown): value is HomeManagerProvider {
  return hasBuilder(value, "homeManagerConfiguration");
}

export function isAndroidHostProvider(value: unknown): value is AndroidHostProvider {
  return hasBuilder(value, "androidHostConfiguration");
}

// =============================================================================
// Schemas
// =============================================================================

const moduleRefSchema = z.union([
  z.string().min(1),
  z.custom<ModuleFunction>((v) => typeof v === "function"),
  z.custom<InlineModule>((v) => isPlainObject(v)),
]);

const specialArgsSchema = z.record(z.unknown());

const builderOverridesSchema = z
  .object({
    nixpkgs: z.custom<NixpkgsProvider>(isNixpkgsProvider, "expected { lib.nixosSystem, outPath }").optional(),
    darwin: z.custom<DarwinProvider>(isDarwinProvider, "expected { lib.darwinSystem }").optional(),
    homeManager: z
      .custom<HomeManagerProvider>(isHomeManagerProvider, "expected { lib.homeManagerConfiguration }")
      .optional(),
    androidHost: z
      .custom<AndroidHostProvider>(isAndroidHostProvider, "expected { lib.androidHostConfiguration }")
      .optional(),
  })
  .strict();

/** Modules and special args, as found in a shared `default` file. */
export const layerSettingsSchema = z
  .object({
    modules: z.array(moduleRefSchema).default([]),
    specialArgs: specialArgsSchema.default({}),
  })
  .strict();

export const hostSettingsSchema = z
  .object({
    class: z.enum(HOST_CLASSES).default(DEFAULT_CLASS),
    arch: z.enum(ARCHES).default(DEFAULT_ARCH),
    pure: z.boolean().default(false),
    deployable: z.boolean().default(false),
    modules: z.array(moduleRefSchema).default([]),
    specialArgs: specialArgsSchema.default({}),
    /** Main module of the host, placed before its other modules */
    path: z.string().min(1).optional(),
    builderOverrides: builderOverridesSchema.default({}),
  })
  .strict();

export const autoSettingsSchema = z
  .object({
    enable: z.boolean().default(false),
    hostsDir: z.string().min(1).nullish(),
    modulesDir: z.string().min(1).nullish(),
    systems: z.array(z.string()).nullish(),
  })
  .strict();

const emptyLayerFn = () => ({});

export const hostsSettingsSchema = z
  .object({
    auto: autoSettingsSchema.default({}),
    hosts: z.record(hostSettingsSchema).default({}),
    perClass: z
      .custom<LayerFn<HostClass>>((v) => typeof v === "function", "expected a function of the host class")
      .default(() => emptyLayerFn),
    perArch: z
      .custom<LayerFn<Arch>>((v) => typeof v === "function", "expected a function of the host arch")
      .default(() => emptyLayerFn),
  })
  .strict();

/** Settings as written by users */
export type HostsSettings = z.input<typeof hostsSettingsSchema>;
export type HostSettings = z.input<typeof hostSettingsSchema>;
export type AutoSettings = z.input<typeof autoSettingsSchema>;

/** Settings after defaults are applied */
export type ResolvedSettings = z.output<typeof hostsSettingsSchema>;
export type ResolvedHostSettings = z.output<typeof hostSettingsSchema>;
export type ResolvedAutoSettings = z.output<typeof autoSettingsSchema>;
export type LayerSettings = z.output<typeof layerSettingsSchema>;

// =============================================================================
// Parsing
// =============================================================================

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, origin: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map(
    (issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
  );
  throw new ConfigurationError(`Invalid configuration in ${origin}:\n${issues.join("\n")}`, {
    code: "INVALID_CONFIG",
    subject: origin,
    cause: result.error,
  });
}

export function parseSettings(input: unknown, origin = "settings"): ResolvedSettings {
  return parseWith(hostsSettingsSchema, input, origin);
}

export function parseHostSettings(input: unknown, origin: string): ResolvedHostSettings {
  return parseWith(hostSettingsSchema, input, origin);
}

export function parseLayerSettings(input: unknown, origin: string): LayerSettings {
  return parseWith(layerSettingsSchema, input, origin);
}

/**
 * Identity helper so config files get type checking.
 *
 * @example
 * ```ts
 * export default defineHosts({
 *   auto: { enable: true },
 *   perClass: (cls) => ({ specialArgs: { cls } }),
 * });
 * ```
 */
export function defineHosts(settings: HostsSettings): HostsSettings {
  return settings;
}

// =============================================================================
// Host Records
// =============================================================================

/**
 * Turn validated host settings into a record carrying the host's explicit
 * layer and its derived platform.
 */
export function toHostRecord(
  name: string,
  settings: ResolvedHostSettings,
  source: string | null = null
): HostRecord {
  return {
    name,
    class: settings.class,
    arch: settings.arch,
    platform: resolvePlatform(settings.arch, settings.class),
    pure: settings.pure,
    deployable: settings.deployable,
    builderOverrides: settings.builderOverrides,
    modules: settings.path === undefined ? settings.modules : [settings.path, ...settings.modules],
    specialArgs: settings.specialArgs,
    source,
  };
}
