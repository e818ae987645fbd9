/**
 * Configuration file loading
 */

import { access, readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { HookvaultConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, isPlainObject, type PlainObject } from "./defaults";
import {
  buildInlineConfig,
  canRunWithoutConfigFile,
  type InlineConfigOptions,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
import { resolveConfig } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "hookvault.config.yaml",
  "hookvault.config.yml",
  "hookvault.config.json",
  "config.json",
];

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Read and parse a config file without validating it
 */
export async function readConfigFile(configPath: string): Promise<PlainObject> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }
  return parsed;
}

/**
 * Merge defaults, validate and resolve a config document
 */
export function buildConfig(document: PlainObject, baseDir: string): HookvaultConfig {
  const merged = deepMerge(DEFAULT_CONFIG, document);
  validateConfig(merged);
  return resolveConfig(merged, baseDir);
}

/**
 * Load and parse a config file, with optional inline overrides on top
 */
export async function loadConfig(
  configPath: string,
  inline: InlineConfigOptions = {},
): Promise<HookvaultConfig> {
  const document = await readConfigFile(configPath);
  const withOverrides = deepMerge(document, buildInlineConfig(inline));
  return buildConfig(withOverrides, path.dirname(path.resolve(configPath)));
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a config file in the given directory, then in /config inside Docker
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  const searchDirs = [startDir];

  if (await exists("/.dockerenv")) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (await exists(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Load the config named on the command line, the first one found on disk,
 * or one built from inline options alone.
 */
export async function findAndLoadConfig(
  configPath?: string,
  inline: InlineConfigOptions = {},
): Promise<HookvaultConfig> {
  if (configPath) {
    return loadConfig(configPath, inline);
  }

  const found = await findConfigFile();
  if (found) {
    return loadConfig(found, inline);
  }

  if (canRunWithoutConfigFile(inline)) {
    return buildConfig(buildInlineConfig(inline), process.cwd());
  }

  const missing = validateInlineOptionsForConfigFreeMode(inline);
  throw new ConfigError(
    [
      "No config file found. Create hookvault.config.yaml or specify --config path.",
      ...missing.map((m) => `  - ${m}`),
    ].join("\n"),
  );
}
