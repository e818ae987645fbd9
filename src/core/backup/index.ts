/**
 * Backup module exports
 */

export {
  ArchiveError,
  COMPRESSION_LEVEL,
  createArchiver,
  measureArtifact,
  SevenZipArchiver,
  TarGzipArchiver,
} from "./archive-creator";
export { type ArtifactRouter, BackupCycle, type BackupCycleOptions, getArtifactPath } from "./cycle";
export { CycleLock } from "./cycle-lock";
