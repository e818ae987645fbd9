/**
 * Configuration validation
 */

import type { ArchiveFormat, TimeoutConfig } from "../types";
import { MAX_TIMER_DELAY_MS } from "../utils/time";
import { isPlainObject, type PlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ["7z", "tar.gz"];

/**
 * Shape of a config document once defaults are merged in
 */
export interface ValidatedConfig extends PlainObject {
  folderToBackup: string;
  backupFolder: string;
  webhooks: string[];
  cooldownDuration: string;
  archive: { format: ArchiveFormat; name?: string };
  timeouts: TimeoutConfig;
  mention?: string;
}

type Validator = (config: PlainObject) => void;

function isArchiveFormat(value: unknown): value is ArchiveFormat {
  return ARCHIVE_FORMATS.some((format) => format === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const validators: Record<string, Validator> = {
  folderToBackup: (c) => {
    if (typeof c.folderToBackup !== "string" || c.folderToBackup.trim() === "") {
      throw new ConfigError("Config must have a 'folderToBackup' path");
    }
  },

  backupFolder: (c) => {
    if (typeof c.backupFolder !== "string" || c.backupFolder.trim() === "") {
      throw new ConfigError("backupFolder must be a non-empty string");
    }
  },

  webhooks: (c) => {
    if (!Array.isArray(c.webhooks)) {
      throw new ConfigError("Config must have a 'webhooks' array");
    }
    if (c.webhooks.length === 0) {
      throw new ConfigError("Config must have at least one webhook");
    }
    c.webhooks.forEach((webhook: unknown, i) => {
      if (typeof webhook !== "string" || !isHttpUrl(webhook)) {
        throw new ConfigError(`webhooks[${i}] must be an http(s) URL`);
      }
    });
  },

  cooldownDuration: (c) => {
    if (typeof c.cooldownDuration !== "string") {
      throw new ConfigError("cooldownDuration must be a string such as \"*/60 * * * *\"");
    }
  },

  archive: (c) => {
    if (!isPlainObject(c.archive)) {
      throw new ConfigError("archive must be an object");
    }
    if (!isArchiveFormat(c.archive.format)) {
      throw new ConfigError(`archive.format must be one of: ${ARCHIVE_FORMATS.join(", ")}`);
    }
    const name = c.archive.name;
    if (name !== undefined) {
      if (typeof name !== "string" || name.trim() === "") {
        throw new ConfigError("archive.name must be a non-empty string");
      }
      if (/[\\/]/.test(name)) {
        throw new ConfigError("archive.name must be a file name, not a path");
      }
    }
  },

  timeouts: (c) => {
    if (!isPlainObject(c.timeouts)) {
      throw new ConfigError("timeouts must be an object");
    }
    for (const key of ["archiveMs", "requestMs"] as const) {
      const value = c.timeouts[key];
      if (!isPositiveInteger(value)) {
        throw new ConfigError(`timeouts.${key} must be a positive integer`);
      }
      if (value > MAX_TIMER_DELAY_MS) {
        throw new ConfigError(`timeouts.${key} must be at most ${MAX_TIMER_DELAY_MS}`);
      }
    }
  },

  mention: (c) => {
    if (c.mention !== undefined && typeof c.mention !== "string") {
      throw new ConfigError("mention must be a string");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is ValidatedConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
