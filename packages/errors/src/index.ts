export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  EmptyDocumentError,
  InvalidConfigurationError,
  BackendUnavailableError,
  TimeoutError,
  ExternalServiceError,
} from "./errors.js";
export type { BackendUnavailableReason } from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";

export { withTimeout } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";
