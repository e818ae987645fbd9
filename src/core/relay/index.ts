/**
 * Relay module exports
 */

export { EndpointSelector, type RandomSource } from "./endpoint-selector";
export { buildStagedMessage, STAGED_MESSAGE_HEADER, type WebhookMessage } from "./message";
export {
  chooseTransferMode,
  DIRECT_UPLOAD_LIMIT_BYTES,
  TransferRouter,
  type TransferRouterOptions,
} from "./router";
