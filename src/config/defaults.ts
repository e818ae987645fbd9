/**
 * Default configuration values
 */

export type PlainObject = Record<string, unknown>;

export const DEFAULT_BACKUP_FOLDER = "./backups";
export const DEFAULT_COOLDOWN = "*/60 * * * *";

export const DEFAULT_CONFIG: PlainObject = {
  // folderToBackup and webhooks have no defaults
  backupFolder: DEFAULT_BACKUP_FOLDER,
  cooldownDuration: DEFAULT_COOLDOWN,
  archive: {
    format: "7z",
  },
  timeouts: {
    archiveMs: 60 * 60 * 1000,
    requestMs: 10 * 60 * 1000,
  },
};

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
