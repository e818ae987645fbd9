/**
 * Backup cycle orchestration: archive, measure, relay.
 */

import * as path from "node:path";
import type { Archiver, Artifact, CycleOutcome, CycleReport, HookvaultConfig } from "../../types";
import { computeFileChecksum, generateUUID } from "../../utils/crypto";
import { formatBytes, formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { chooseTransferMode } from "../relay/router";
import { CycleLock } from "./cycle-lock";

const log = createLogger("cycle");

/** The part of TransferRouter a cycle depends on */
export interface ArtifactRouter {
  route(artifactPath: string, sizeBytes: number): Promise<boolean>;
}

export interface BackupCycleOptions {
  config: Pick<HookvaultConfig, "folderToBackup" | "backupFolder" | "archive">;
  archiver: Archiver;
  router: ArtifactRouter;
  lock?: CycleLock;
  /** Skip hashing the artifact, e.g. in tests with fake artifacts */
  skipChecksum?: boolean;
}

export function getArtifactPath(config: BackupCycleOptions["config"]): string {
  return path.join(config.backupFolder, config.archive.name);
}

export class BackupCycle {
  private readonly lock: CycleLock;

  constructor(private readonly options: BackupCycleOptions) {
    this.lock = options.lock ?? new CycleLock();
  }

  isRunning(): boolean {
    return this.lock.isHeld();
  }

  async runOnce(): Promise<CycleOutcome> {
    const report = await this.execute();
    return report.outcome;
  }

  /**
   * Run one cycle and describe what happened
   */
  async execute(): Promise<CycleReport> {
    const startedAt = new Date();
    const cycleId = generateUUID();
    const report = (
      outcome: CycleOutcome,
      artifact: Artifact | null = null,
      checksum: string | null = null,
    ): CycleReport => ({
      outcome,
      cycleId,
      artifact,
      checksum,
      transferMode: artifact ? chooseTransferMode(artifact.sizeBytes) : null,
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
    });

    if (!this.lock.tryAcquire()) {
      log.warn("Backup is already in progress");
      return report("already_in_progress");
    }

    try {
      const { folderToBackup } = this.options.config;
      const artifactPath = getArtifactPath(this.options.config);

      log.info(`Starting backup ${cycleId}: ${folderToBackup} -> ${artifactPath}`);

      let artifact: Artifact;
      try {
        artifact = await this.options.archiver.archive(folderToBackup, artifactPath);
      } catch (error) {
        log.error("Error creating backup", error);
        return report("archive_failed");
      }

      log.info(`Backup created successfully: ${artifact.path} (${formatBytes(artifact.sizeBytes)})`);

      const checksum = this.options.skipChecksum ? null : await this.checksumOf(artifact.path);

      const relayed = await this.options.router.route(artifact.path, artifact.sizeBytes);
      const result = report(relayed ? "success" : "transfer_failed", artifact, checksum);

      if (relayed) {
        log.info(`Backup ${cycleId} relayed in ${formatDuration(result.durationMs)}`);
      } else {
        log.error(`Backup ${cycleId} could not be relayed`);
      }

      return result;
    } finally {
      this.lock.release();
    }
  }

  private async checksumOf(filePath: string): Promise<string | null> {
    try {
      return await computeFileChecksum(filePath);
    } catch (error) {
      log.warn(`Could not checksum ${filePath}`, error);
      return null;
    }
  }
}
