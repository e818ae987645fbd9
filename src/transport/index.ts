/**
 * Transport module exports
 */

export { RequestTimeoutError, ResponseFormatError, TransportError } from "./errors";
export { DEFAULT_REQUEST_TIMEOUT_MS, HttpBackend, type HttpBackendOptions, redactUrl } from "./http-backend";
export { extractLink, STAGING_ENDPOINT, StagingUploader } from "./staging";
