/**
 * HTTP transport interface definitions
 */

export interface TransferResponse {
  status: number;
  body: Buffer;
}

export interface TransferBackend {
  /**
   * POST a file as multipart/form-data with a single file field
   */
  postMultipart(url: string, filePath: string, fieldName?: string): Promise<TransferResponse>;

  /**
   * POST a JSON document
   */
  postJson(url: string, payload: unknown): Promise<TransferResponse>;
}
