/**
 * Backup cycle type definitions
 */

export interface Artifact {
  path: string;
  sizeBytes: number;
}

export type CycleOutcome =
  | "success"
  | "already_in_progress"
  | "archive_failed"
  | "transfer_failed";

export type TransferMode = "direct" | "staged";

export interface CycleReport {
  outcome: CycleOutcome;
  cycleId: string;
  /** Present once the archive step succeeded */
  artifact: Artifact | null;
  /** SHA-256 of the artifact, hex encoded */
  checksum: string | null;
  transferMode: TransferMode | null;
  startedAt: Date;
  durationMs: number;
}

export interface Archiver {
  readonly format: string;

  /**
   * Compress sourcePath into destinationPath.
   * Rejects with ArchiveError when the tool fails or times out.
   */
  archive(sourcePath: string, destinationPath: string): Promise<Artifact>;
}
