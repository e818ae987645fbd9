/**
 * Turn a validated config document into the runtime configuration
 */

import type { HookvaultConfig } from "../types";
import { resolveFrom } from "../utils/path";
import { parseCadence } from "./cadence";
import type { ValidatedConfig } from "./validator";

export function defaultArchiveName(format: HookvaultConfig["archive"]["format"]): string {
  return `backup.${format}`;
}

/**
 * Resolve relative paths against baseDir (the config file's directory, or the
 * working directory when running from inline options) and derive the cadence.
 */
export function resolveConfig(config: ValidatedConfig, baseDir: string): HookvaultConfig {
  const { format } = config.archive;

  return {
    folderToBackup: resolveFrom(baseDir, config.folderToBackup),
    backupFolder: resolveFrom(baseDir, config.backupFolder),
    webhooks: [...config.webhooks],
    cooldownDuration: config.cooldownDuration,
    cadenceMinutes: parseCadence(config.cooldownDuration),
    archive: {
      format,
      name: config.archive.name ?? defaultArchiveName(format),
    },
    timeouts: { ...config.timeouts },
    ...(config.mention !== undefined && { mention: config.mention }),
  };
}
