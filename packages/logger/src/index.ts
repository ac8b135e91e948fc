/**
 * @quarry/logger
 *
 * Structured logging with secret and PII redaction for the retrieval engine.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactText, REDACT_PATHS } from "./pii-redactor.js";
