/**
 * Size-based transfer routing
 */

import type { StagingUploader } from "../../transport/staging";
import { redactUrl } from "../../transport/http-backend";
import type { TransferBackend, TransferMode } from "../../types";
import { formatBytes } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import type { EndpointSelector } from "./endpoint-selector";
import { buildStagedMessage, type WebhookMessage } from "./message";

const log = createLogger("relay");

/** Largest artifact attached directly to a webhook call: 23 MiB */
export const DIRECT_UPLOAD_LIMIT_BYTES = 23 * 1024 * 1024;

export function chooseTransferMode(sizeBytes: number): TransferMode {
  return sizeBytes < DIRECT_UPLOAD_LIMIT_BYTES ? "direct" : "staged";
}

export interface TransferRouterOptions {
  webhooks: readonly string[];
  backend: TransferBackend;
  selector: EndpointSelector;
  staging: StagingUploader;
  mention?: string;
}

export class TransferRouter {
  constructor(private readonly options: TransferRouterOptions) {}

  /**
   * Relay one artifact to one webhook. Resolves true when the relay succeeded.
   */
  async route(artifactPath: string, sizeBytes: number): Promise<boolean> {
    const webhook = this.options.selector.select(this.options.webhooks);
    if (webhook === undefined) {
      log.error("No webhook configured");
      return false;
    }

    const mode = chooseTransferMode(sizeBytes);
    log.info(`Relaying ${formatBytes(sizeBytes)} via ${mode} upload to ${redactUrl(webhook)}`);

    return mode === "direct"
      ? this.relayDirect(webhook, artifactPath)
      : this.relayStaged(webhook, artifactPath);
  }

  private async relayDirect(webhook: string, artifactPath: string): Promise<boolean> {
    try {
      await this.options.backend.postMultipart(webhook, artifactPath);
      return true;
    } catch (error) {
      log.warn("Direct relay failed", error);
      return false;
    }
  }

  private async relayStaged(webhook: string, artifactPath: string): Promise<boolean> {
    const link = await this.options.staging.upload(artifactPath);
    if (link === null) {
      return false;
    }

    const message: WebhookMessage = {
      content: buildStagedMessage(link, this.options.mention),
    };

    try {
      await this.options.backend.postJson(webhook, message);
      return true;
    } catch (error) {
      log.warn("Staged relay failed", error);
      return false;
    }
  }
}
