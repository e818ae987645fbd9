/**
 * Assemble a BackupCycle from configuration
 */

import { HttpBackend } from "../transport/http-backend";
import { StagingUploader } from "../transport/staging";
import type { HookvaultConfig, TransferBackend } from "../types";
import { createArchiver } from "./backup/archive-creator";
import { BackupCycle } from "./backup/cycle";
import { EndpointSelector, type RandomSource } from "./relay/endpoint-selector";
import { TransferRouter } from "./relay/router";

export interface BackupCycleDependencies {
  backend?: TransferBackend;
  random?: RandomSource;
}

export function createBackupCycle(
  config: HookvaultConfig,
  deps: BackupCycleDependencies = {},
): BackupCycle {
  const backend = deps.backend ?? new HttpBackend({ timeoutMs: config.timeouts.requestMs });

  const router = new TransferRouter({
    webhooks: config.webhooks,
    backend,
    selector: new EndpointSelector(deps.random),
    staging: new StagingUploader(backend),
    mention: config.mention,
  });

  return new BackupCycle({
    config,
    archiver: createArchiver(config.archive, config.timeouts.archiveMs),
    router,
  });
}
