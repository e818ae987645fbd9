/**
 * Configuration type definitions for hookvault
 */

export type ArchiveFormat = "7z" | "tar.gz";

export interface ArchiveConfig {
  format: ArchiveFormat;
  /** File name of the artifact inside backupFolder */
  name: string;
}

export interface TimeoutConfig {
  /** Upper bound for one archiver run */
  archiveMs: number;
  /** Upper bound for one HTTP request */
  requestMs: number;
}

export interface HookvaultConfig {
  folderToBackup: string;
  backupFolder: string;
  webhooks: string[];
  /** Raw cron-like string as written in the config file */
  cooldownDuration: string;
  /** Minutes between the end of one cycle and the start of the next */
  cadenceMinutes: number;
  archive: ArchiveConfig;
  timeouts: TimeoutConfig;
  /** Tag placed in the staged-relay message, e.g. a chat mention */
  mention?: string;
}
