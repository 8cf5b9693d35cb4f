import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "yaml";
import { ConfigSchema, type CheckerOptions, type Config } from "../types/index.js";
import { CONFIG_FILE, DEFAULT_OPTIONS } from "./defaults.js";

/**
 * Parse and validate configuration from a YAML string.
 * An empty document yields an empty config.
 */
export function parseConfig(yamlContent: string): Config {
  const data: unknown = parse(yamlContent) ?? {};
  return ConfigSchema.parse(data);
}

/**
 * Load the component's configuration.
 * An explicitly given file must exist; the default file is optional.
 */
export async function loadConfig(componentPath: string, explicitPath?: string): Promise<Config> {
  const configPath = explicitPath ?? join(componentPath, CONFIG_FILE);

  if (explicitPath === undefined && !existsSync(configPath)) {
    return {};
  }

  const content = await readFile(configPath, "utf-8");
  return parseConfig(content);
}

/**
 * Merge a config over the defaults. Filter lists extend the built-in ones.
 */
export function resolveCheckerOptions(config: Config): CheckerOptions {
  return Object.freeze({
    umbrellaPrefix: config.umbrellaPrefix ?? DEFAULT_OPTIONS.umbrellaPrefix,
    frameworkName: config.frameworkName ?? DEFAULT_OPTIONS.frameworkName,
    filteredPrefixes: [...DEFAULT_OPTIONS.filteredPrefixes, ...(config.filteredPrefixes ?? [])],
    filteredSuffixes: [...DEFAULT_OPTIONS.filteredSuffixes, ...(config.filteredSuffixes ?? [])],
    extensions: config.extensions ?? DEFAULT_OPTIONS.extensions,
  });
}
