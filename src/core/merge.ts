/**
 * Layer merging for hostloom
 *
 * Implements:
 * - recursiveUpdate: depth-first overlay of special args
 * - mergeLayers: fold of module lists and special args
 * - mergeHost: the per-host layer stack with the `pure` opt-out
 *
 * Precedence, lowest to highest:
 *
 *   shared < class < arch < auto class modules < host
 *
 * Modules are concatenated in that order; special args are overlaid in that
 * order, so the host's own keys always win and shared keys never override.
 */

import type {
  Arch,
  ConfigLayer,
  HostClass,
  HostRecord,
  LayerFn,
  LayerInput,
  SpecialArgs,
} from "./types.js";
import { EMPTY_LAYER } from "./types.js";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Overlay `rhs` onto `lhs` without mutating either.
 *
 * When both sides hold a plain object under the same key the two are merged
 * recursively; any other value from `rhs` replaces the one in `lhs` wholesale.
 */
export function recursiveUpdate(
  lhs: Readonly<SpecialArgs>,
  rhs: Readonly<SpecialArgs>
): SpecialArgs {
  const result: SpecialArgs = { ...lhs };
  for (const [key, value] of Object.entries(rhs)) {
    const current = result[key];
    result[key] =
      isPlainObject(current) && isPlainObject(value)
        ? recursiveUpdate(current, value)
        : value;
  }
  return result;
}

export function toLayer(input: LayerInput): ConfigLayer {
  return {
    modules: input.modules ?? [],
    specialArgs: input.specialArgs ?? {},
  };
}

/** Combine layers in order; later layers win special-arg conflicts. */
export function mergeLayers(layers: readonly ConfigLayer[]): ConfigLayer {
  return {
    modules: layers.flatMap((layer) => layer.modules),
    specialArgs: layers.reduce<SpecialArgs>(
      (acc, layer) => recursiveUpdate(acc, layer.specialArgs),
      {}
    ),
  };
}

/**
 * Merge every configuration source for one host.
 *
 * A pure host keeps exactly its own explicit layer; the class and arch
 * functions are not called for it.
 */
export function mergeHost(
  host: HostRecord,
  shared: ConfigLayer,
  perClass: LayerFn<HostClass>,
  perArch: LayerFn<Arch>,
  autoClass: ConfigLayer = EMPTY_LAYER
): HostRecord {
  const own: ConfigLayer = { modules: host.modules, specialArgs: host.specialArgs };

  const merged = host.pure
    ? mergeLayers([own])
    : mergeLayers([
        shared,
        toLayer(perClass(host.class)),
        toLayer(perArch(host.arch)),
        autoClass,
        own,
      ]);

  return { ...host, modules: merged.modules, specialArgs: merged.specialArgs };
}
