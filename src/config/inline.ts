/**
 * Inline configuration parsing and merging utilities
 */

import type { PlainObject } from "./defaults";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory to back up */
  folder?: string;
  /** Directory the artifact is written to */
  backupFolder?: string;
  /** Webhook URLs (can be repeated) */
  webhook?: string[];
  /** Cron-like cadence, e.g. "*\/30 * * * *" */
  cooldown?: string;
  /** Archive format: 7z or tar.gz */
  format?: string;
  /** Tag placed in staged-relay messages */
  mention?: string;
}

/**
 * Inline options that describe a single cycle (for parseArgs)
 */
export const CYCLE_CONFIG_OPTIONS = {
  folder: { type: "string" as const },
  "backup-folder": { type: "string" as const },
  webhook: { type: "string" as const, multiple: true as const },
  format: { type: "string" as const },
  mention: { type: "string" as const },
} as const;

/**
 * CLI option definitions for inline config, cadence included (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  ...CYCLE_CONFIG_OPTIONS,
  cooldown: { type: "string" as const },
} as const;

export interface InlineConfigValues {
  folder?: string;
  "backup-folder"?: string;
  webhook?: string[];
  cooldown?: string;
  format?: string;
  mention?: string;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineConfigValues): InlineConfigOptions {
  return {
    folder: values.folder,
    backupFolder: values["backup-folder"],
    webhook: values.webhook,
    cooldown: values.cooldown,
    format: values.format,
    mention: values.mention,
  };
}

/**
 * Build a partial config document from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): PlainObject {
  return {
    ...(options.folder && { folderToBackup: options.folder }),
    ...(options.backupFolder && { backupFolder: options.backupFolder }),
    ...(options.webhook && options.webhook.length > 0 && { webhooks: options.webhook }),
    ...(options.cooldown && { cooldownDuration: options.cooldown }),
    ...(options.format && { archive: { format: options.format } }),
    ...(options.mention && { mention: options.mention }),
  };
}

export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.keys(buildInlineConfig(options)).length > 0;
}

/**
 * Check whether inline options alone describe a runnable config
 */
export function validateInlineOptionsForConfigFreeMode(options: InlineConfigOptions): string[] {
  const errors: string[] = [];

  if (!options.folder) {
    errors.push("--folder is required when running without a config file");
  }
  if (!options.webhook || options.webhook.length === 0) {
    errors.push("At least one --webhook is required when running without a config file");
  }

  return errors;
}

export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).length === 0;
}
