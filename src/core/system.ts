/**
 * System utilities for hostloom
 *
 * Implements:
 * - Platform resolution from (arch, class)
 * - Module-system priority wrappers used by injected modules
 */

import type { Arch, HostClass, Platform } from "./types.js";

/**
 * Resolve the platform triple for a host.
 *
 * @example
 * ```ts
 * resolvePlatform("x86_64", "nixos");   // "x86_64-linux"
 * resolvePlatform("aarch64", "darwin"); // "aarch64-darwin"
 * resolvePlatform("x86_64", "home");    // null
 * ```
 */
export function resolvePlatform(arch: Arch, hostClass: HostClass): Platform | null {
  switch (hostClass) {
    case "nixos":
      return `${arch}-linux`;
    case "darwin":
      return `${arch}-darwin`;
    case "home":
    case "androidHost":
      // These builders run without a platform triple
      return null;
  }
}

// =============================================================================
// Priorities
// =============================================================================

export const DEFAULT_PRIORITY = 1000;

/** A value wrapped with a module-system priority (lower number wins). */
export interface Override<T> {
  readonly _type: "override";
  readonly priority: number;
  readonly content: T;
}

export function mkOverride<T>(priority: number, content: T): Override<T> {
  return { _type: "override", priority, content };
}

/** Give a value default priority so any plain definition overrides it. */
export function mkDefault<T>(content: T): Override<T> {
  return mkOverride(DEFAULT_PRIORITY, content);
}
