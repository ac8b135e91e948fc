import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Raised by ingestion when no text survives normalization.
 */
export class EmptyDocumentError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, options?: ErrorExtras) {
    super({
      message: `Document "${documentId}" has no extractable text`,
      statusCode: 422,
      code: "EMPTY_DOCUMENT",
      details: options?.details,
      cause: options?.cause,
    });
    this.documentId = documentId;
  }
}

/**
 * Raised while resolving engine configuration, never at query time.
 * `fields` maps a dotted config path to its validation message.
 */
export class InvalidConfigurationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Invalid configuration",
    fields: Record<string, string>,
    options?: ErrorExtras,
  ) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_CONFIGURATION",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export type BackendUnavailableReason =
  | "disabled"
  | "not_indexed"
  | "provider_error"
  | "malformed_vector"
  | "timeout"
  | "cancelled"
  | "no_results";

/**
 * Internal signal that the vector path cannot serve a call. Always caught by
 * the retriever and turned into a lexical fallback.
 */
export class BackendUnavailableError extends AppError {
  public readonly reason: BackendUnavailableReason;

  constructor(reason: BackendUnavailableReason, message?: string, options?: ErrorExtras) {
    super({
      message: message ?? `Vector backend unavailable: ${reason}`,
      statusCode: 503,
      code: "BACKEND_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.reason = reason;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(message = "Operation timed out", timeoutMs: number, options?: ErrorExtras) {
    super({
      message,
      statusCode: 504,
      code: "TIMEOUT",
      details: options?.details,
      cause: options?.cause,
    });
    this.timeoutMs = timeoutMs;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}
