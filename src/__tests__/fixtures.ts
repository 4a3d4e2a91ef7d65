/**
 * Test fixtures: temporary trees and fabricated builders.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { AssembleContext } from "../core/assemble.js";
import type { BuilderArgs, BuilderProviders, Platform, SystemScope } from "../core/types.js";

/** Create a temp directory holding `files` (JSON-serialized unless strings). */
export function mkTree(files: Record<string, unknown>, prefix = "hostloom-test-"): string {
  const root = mkdtempSync(join(tmpdir(), prefix));
  writeTree(root, files);
  return root;
}

export function writeTree(root: string, files: Record<string, unknown>): void {
  for (const [relative, content] of Object.entries(files)) {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
  }
}

/** What a fabricated builder returns: the builder's name and its arguments. */
export interface FakeArtifact {
  builder: string;
  args: BuilderArgs;
}

export function isFakeArtifact(value: unknown): value is FakeArtifact {
  return typeof value === "object" && value !== null && "builder" in value && "args" in value;
}

const fakeBuilder = (builder: string) => (args: BuilderArgs): FakeArtifact => ({ builder, args });

export function mkProviders(overrides: Partial<BuilderProviders> = {}): BuilderProviders {
  return {
    nixpkgs: { lib: { nixosSystem: fakeBuilder("nixosSystem") }, outPath: "/store/nixpkgs" },
    darwin: { lib: { darwinSystem: fakeBuilder("darwinSystem") } },
    homeManager: { lib: { homeManagerConfiguration: fakeBuilder("homeManagerConfiguration") } },
    androidHost: { lib: { androidHostConfiguration: fakeBuilder("androidHostConfiguration") } },
    ...overrides,
  };
}

export function mkWithSystem() {
  return <T>(platform: Platform, fn: (scope: SystemScope) => T): T =>
    fn({ selfScoped: `self@${platform}`, inputsScoped: { platform } });
}

export function mkContext(overrides: Partial<AssembleContext> = {}): AssembleContext {
  return {
    self: "self-ref",
    inputs: { tag: "inputs-ref" },
    withSystem: mkWithSystem(),
    providers: mkProviders(),
    ...overrides,
  };
}

/** Run `fn` and return what it threw, or undefined. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
