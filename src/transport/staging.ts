/**
 * Anonymous staging host for artifacts too large to attach directly
 */

import type { TransferBackend } from "../types";
import { createLogger } from "../utils/logger";
import { ResponseFormatError } from "./errors";
import { redactUrl } from "./http-backend";

const log = createLogger("staging");

/** Uploads expire after one week */
export const STAGING_ENDPOINT = "https://file.io/?expires=1w";

export function extractLink(body: Buffer, url: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf8"));
  } catch (error) {
    throw new ResponseFormatError("Staging response is not JSON", url, { cause: error });
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("link" in parsed) ||
    typeof parsed.link !== "string" ||
    parsed.link.length === 0
  ) {
    throw new ResponseFormatError("Staging response has no link", url);
  }

  return parsed.link;
}

export class StagingUploader {
  constructor(
    private readonly backend: TransferBackend,
    private readonly endpoint: string = STAGING_ENDPOINT,
  ) {}

  /**
   * Upload a file and return its retrieval link, or null on any failure
   */
  async upload(filePath: string): Promise<string | null> {
    try {
      const response = await this.backend.postMultipart(this.endpoint, filePath);
      const link = extractLink(response.body, this.endpoint);
      log.info(`Staged ${filePath} at ${redactUrl(link)}`);
      return link;
    } catch (error) {
      log.warn("Staging upload failed");
      log.debug("Staging failure detail", error);
      return null;
    }
  }
}
