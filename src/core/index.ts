/**
 * Core module exports
 */

// Backup
export {
  ArchiveError,
  type ArtifactRouter,
  BackupCycle,
  type BackupCycleOptions,
  COMPRESSION_LEVEL,
  CycleLock,
  createArchiver,
  getArtifactPath,
  measureArtifact,
  SevenZipArchiver,
  TarGzipArchiver,
} from "./backup";

// Relay
export {
  buildStagedMessage,
  chooseTransferMode,
  DIRECT_UPLOAD_LIMIT_BYTES,
  EndpointSelector,
  type RandomSource,
  TransferRouter,
  type TransferRouterOptions,
} from "./relay";

// Scheduler
export { type CycleRunner, Scheduler, type SchedulerStatus, type Sleep } from "./scheduler";

// Wiring
export { createBackupCycle } from "./factory";
