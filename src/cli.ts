#!/usr/bin/env node
/**
 * hostloom CLI
 *
 * Usage:
 *   hostloom show <config> [export]   Show merged hosts of a settings module
 *   hostloom list [hostsDir]          List hosts discovered in a directory
 */

import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  autoSettingsSchema,
  discoverHosts,
  inferPaths,
  isConfigurationError,
  isPlainObject,
  parseSettings,
} from "./core/index.js";
import { evaluateSettings, summarizeHosts } from "./api.js";

const USAGE = `
hostloom - layered host resolution for system builders

Usage:
  hostloom show <config> [export]   Show merged hosts of a settings module
  hostloom list [hostsDir]          List hosts discovered in a directory

Examples:
  hostloom show ./hosts.config.mjs
  hostloom show ./flake.config.js hosts
  hostloom list ./hosts
`;

async function show(file: string, exportName: string): Promise<void> {
  const configPath = resolve(file);
  const mod: unknown = await import(pathToFileURL(configPath).href);
  const value = isPlainObject(mod) ? mod[exportName] : undefined;
  if (value === undefined) {
    throw new Error(`Export '${exportName}' not found in ${file}`);
  }

  const hosts = await evaluateSettings(parseSettings(value, file), { root: dirname(configPath) });
  console.log(JSON.stringify(summarizeHosts(hosts), null, 2));
}

async function list(dir: string | undefined): Promise<void> {
  const { hostsDir } = inferPaths(
    autoSettingsSchema.parse({ enable: true, hostsDir: dir }),
    process.cwd()
  );
  if (hostsDir === null) return;

  const hosts = await discoverHosts(hostsDir);
  for (const host of Object.values(hosts)) {
    console.log(`${host.name}\t${host.class}\t${host.platform ?? "-"}`);
  }
}

async function main() {
  const [, , command, arg, exportName = "default"] = process.argv;

  if (!command) {
    console.log(USAGE);
    process.exit(0);
  }

  switch (command) {
    case "show":
      if (!arg) {
        console.error("Error: No config file specified");
        process.exit(1);
      }
      await show(arg, exportName);
      break;

    case "list":
      await list(arg);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (isConfigurationError(err)) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
