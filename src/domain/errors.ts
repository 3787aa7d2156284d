/**
 * Structured errors for the shipment workflow.
 * Every failure that crosses a module boundary is one of these, carried in a CarrierResult.
 */

export type CarrierErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "AUTH_FAILED"
  | "RATE_LIMITED"
  | "INVALID_REQUEST"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "MALFORMED_RESPONSE"
  | "CARRIER_ERROR"
  | "CONFIRMATION_FAILED"
  | "CONFIRMATION_TIMEOUT"
  | "STORAGE_ERROR"
  | "UNEXPECTED_ERROR";

/** Coarse grouping used by callers that only care where a run broke down */
export type CarrierErrorKind = "configuration" | "provider" | "unexpected";

const KIND_BY_CODE: Record<CarrierErrorCode, CarrierErrorKind> = {
  CONFIGURATION_ERROR: "configuration",
  VALIDATION_ERROR: "configuration",
  AUTH_FAILED: "provider",
  RATE_LIMITED: "provider",
  INVALID_REQUEST: "provider",
  NETWORK_ERROR: "provider",
  TIMEOUT: "provider",
  MALFORMED_RESPONSE: "provider",
  CARRIER_ERROR: "provider",
  CONFIRMATION_FAILED: "provider",
  CONFIRMATION_TIMEOUT: "provider",
  STORAGE_ERROR: "unexpected",
  UNEXPECTED_ERROR: "unexpected",
};

export interface CarrierErrorDetails {
  code: CarrierErrorCode;
  message: string;
  /** HTTP status when applicable (4xx, 5xx) */
  httpStatus?: number;
  /** Request URL the failure belongs to */
  endpoint?: string;
  /** ShipX error code (e.g. "validation_failed") and message */
  carrierCode?: string;
  carrierMessage?: string;
  /** Provider error body, parsed when it was JSON */
  responseBody?: unknown;
  /** Underlying cause for logging (e.g. original Error) */
  cause?: unknown;
}

export class CarrierIntegrationError extends Error {
  readonly details: CarrierErrorDetails;

  constructor(details: CarrierErrorDetails) {
    super(details.message);
    this.name = "CarrierIntegrationError";
    this.details = details;
    Object.setPrototypeOf(this, CarrierIntegrationError.prototype);
  }

  get code(): CarrierErrorCode {
    return this.details.code;
  }

  get kind(): CarrierErrorKind {
    return KIND_BY_CODE[this.details.code];
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  /** Copy with the endpoint attached, for errors raised before the URL was known */
  withEndpoint(endpoint: string): CarrierIntegrationError {
    return new CarrierIntegrationError({ ...this.details, endpoint });
  }

  /** Serialize for logging */
  toJSON(): CarrierErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

export function configurationError(message: string, cause?: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "CONFIGURATION_ERROR",
    message,
    cause,
  });
}

/** Validation error (input validation before calling the carrier) */
export function validationError(message: string, cause?: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "VALIDATION_ERROR",
    message,
    cause,
  });
}

export function authError(message: string, httpStatus?: number, responseBody?: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "AUTH_FAILED",
    message,
    httpStatus,
    responseBody,
  });
}

/** Build rate limit error (429) */
export function rateLimitError(
  retryAfter?: number,
  carrierCode?: string,
  carrierMessage?: string,
  responseBody?: unknown
): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "RATE_LIMITED",
    message: retryAfter
      ? `Rate limit exceeded. Retry after ${retryAfter}s`
      : "Rate limit exceeded",
    httpStatus: 429,
    carrierCode,
    carrierMessage,
    responseBody,
  });
}

/** Build invalid request (400, 422) */
export function invalidRequestError(
  message: string,
  httpStatus: number,
  carrierCode?: string,
  carrierMessage?: string,
  responseBody?: unknown
): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "INVALID_REQUEST",
    message,
    httpStatus,
    carrierCode,
    carrierMessage,
    responseBody,
  });
}

/** Build network error */
export function networkError(message: string, cause?: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "NETWORK_ERROR",
    message,
    cause,
  });
}

export function timeoutError(operation: string): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "TIMEOUT",
    message: `Request timed out: ${operation}`,
  });
}

/** Malformed response from carrier */
export function malformedResponseError(
  message: string,
  cause?: unknown
): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "MALFORMED_RESPONSE",
    message,
    cause,
  });
}

/** Generic carrier/server error (5xx or carrier-specific) */
export function carrierError(
  message: string,
  httpStatus?: number,
  carrierCode?: string,
  carrierMessage?: string,
  responseBody?: unknown
): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "CARRIER_ERROR",
    message,
    httpStatus,
    carrierCode,
    carrierMessage,
    responseBody,
  });
}

/** Shipment reached a status configured as terminal failure */
export function confirmationFailedError(shipmentId: string, status: string): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "CONFIRMATION_FAILED",
    message: `Shipment ${shipmentId} reached status "${status}" instead of "confirmed"`,
    carrierCode: status,
  });
}

export function confirmationTimeoutError(
  shipmentId: string,
  attempts: number,
  lastStatus: string
): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "CONFIRMATION_TIMEOUT",
    message: `Shipment ${shipmentId} not confirmed after ${attempts} attempts (last status "${lastStatus}")`,
    carrierCode: lastStatus,
  });
}

export function storageError(message: string, cause?: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "STORAGE_ERROR",
    message,
    cause,
  });
}

export function unexpectedError(cause: unknown): CarrierIntegrationError {
  return new CarrierIntegrationError({
    code: "UNEXPECTED_ERROR",
    message: cause instanceof Error ? cause.message : String(cause),
    cause,
  });
}
