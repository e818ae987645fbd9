/**
 * Archive creation for backups
 */

import { createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import type { ArchiveConfig, Archiver, Artifact } from "../../types";
import { type CommandResult, runCommand } from "../../utils/command";
import { createLogger } from "../../utils/logger";

const log = createLogger("archive");

/** Both archivers always compress at their maximum level */
export const COMPRESSION_LEVEL = 9;

export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

export interface ArchiverOptions {
  /** Kill the archiving tool after this many milliseconds */
  timeoutMs?: number;
}

export interface SevenZipArchiverOptions extends ArchiverOptions {
  /** Executable to invoke, defaults to `7z` on PATH */
  binary?: string;
}

/**
 * Stat the file an archiver just wrote
 */
export async function measureArtifact(artifactPath: string): Promise<Artifact> {
  try {
    const stats = await stat(artifactPath);
    if (!stats.isFile()) {
      throw new ArchiveError(`Archive path is not a file: ${artifactPath}`);
    }
    return { path: artifactPath, sizeBytes: stats.size };
  } catch (error) {
    if (error instanceof ArchiveError) throw error;
    throw new ArchiveError(`Archive was not created: ${artifactPath}`, { cause: error });
  }
}

function describeFailure(tool: string, result: CommandResult, timeoutMs?: number): string {
  if (result.timedOut) {
    return `${tool} timed out after ${timeoutMs}ms`;
  }
  const detail = result.stderr || result.stdout;
  return `${tool} exited with code ${result.exitCode}${detail ? `: ${detail}` : ""}`;
}

export function sevenZipArgs(sourcePath: string, destinationPath: string): string[] {
  return ["a", destinationPath, sourcePath, `-mx=${COMPRESSION_LEVEL}`];
}

/**
 * Archiver backed by the 7-Zip command line tool
 */
export class SevenZipArchiver implements Archiver {
  readonly format = "7z";
  private readonly binary: string;

  constructor(private readonly options: SevenZipArchiverOptions = {}) {
    this.binary = options.binary ?? "7z";
  }

  async archive(sourcePath: string, destinationPath: string): Promise<Artifact> {
    log.debug(`Creating 7z archive with compression level ${COMPRESSION_LEVEL}`);

    // `7z a` merges into an existing archive
    try {
      await rm(destinationPath, { force: true });
    } catch (error) {
      throw new ArchiveError(`Cannot replace previous archive: ${(error as Error).message}`, {
        cause: error,
      });
    }

    let result: CommandResult;
    try {
      result = await runCommand(this.binary, sevenZipArgs(sourcePath, destinationPath), {
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      throw new ArchiveError(`Failed to start ${this.binary}: ${(error as Error).message}`, {
        cause: error,
      });
    }

    if (!result.success) {
      throw new ArchiveError(describeFailure(this.binary, result, this.options.timeoutMs));
    }

    return measureArtifact(destinationPath);
  }
}

export function tarArgs(sourcePath: string): string[] {
  const resolved = path.resolve(sourcePath);
  return ["-cf", "-", "-C", path.dirname(resolved), path.basename(resolved)];
}

/**
 * Archiver that streams `tar` output through gzip
 */
export class TarGzipArchiver implements Archiver {
  readonly format = "tar.gz";

  constructor(private readonly options: ArchiverOptions = {}) {}

  async archive(sourcePath: string, destinationPath: string): Promise<Artifact> {
    log.debug(`Creating tar.gz archive with compression level ${COMPRESSION_LEVEL}`);

    const gzip = createGzip({ level: COMPRESSION_LEVEL });
    const stopTar = new AbortController();
    let writeError: unknown = null;
    const written = pipeline(gzip, createWriteStream(destinationPath)).catch((error: unknown) => {
      writeError = error;
      stopTar.abort();
    });

    let result: CommandResult;
    try {
      result = await runCommand("tar", tarArgs(sourcePath), {
        timeoutMs: this.options.timeoutMs,
        stdout: gzip,
        signal: stopTar.signal,
      });
    } catch (error) {
      if (!gzip.destroyed && !gzip.writableEnded) gzip.end();
      await written;
      throw new ArchiveError(`Failed to start tar: ${(error as Error).message}`, { cause: error });
    }

    await written;
    if (writeError !== null) {
      const message = writeError instanceof Error ? writeError.message : String(writeError);
      throw new ArchiveError(`Failed to write archive: ${message}`, { cause: writeError });
    }

    if (!result.success) {
      throw new ArchiveError(describeFailure("tar", result, this.options.timeoutMs));
    }

    return measureArtifact(destinationPath);
  }
}

export function createArchiver(config: ArchiveConfig, timeoutMs?: number): Archiver {
  switch (config.format) {
    case "7z":
      return new SevenZipArchiver({ timeoutMs });
    case "tar.gz":
      return new TarGzipArchiver({ timeoutMs });
  }
}
