/**
 * Centralized type exports for hookvault
 */

// Backup types
export type {
  Archiver,
  Artifact,
  CycleOutcome,
  CycleReport,
  TransferMode,
} from "./backup";
// Config types
export type { ArchiveConfig, ArchiveFormat, HookvaultConfig, TimeoutConfig } from "./config";
// Transport types
export type { TransferBackend, TransferResponse } from "./transport";
