export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "OUT_OF_STOCK"
  | "CONTENTION"
  | "CONFLICT"
  | "NO_ELIGIBLE_INVESTMENTS"
  | "GATEWAY_UNAVAILABLE"
  | "INVALID_SIGNATURE"
  | "AUTH_FAILED"
  | "FORBIDDEN"
  | "RATE_LIMITED"
  | "INTERNAL";

function defaultCode(statusCode: number): ErrorCode {
  if (statusCode === 401) return "AUTH_FAILED";
  if (statusCode === 403) return "FORBIDDEN";
  if (statusCode === 404) return "NOT_FOUND";
  if (statusCode === 409) return "CONFLICT";
  if (statusCode === 400 || statusCode === 422) return "VALIDATION_ERROR";
  if (statusCode === 429) return "RATE_LIMITED";
  return "INTERNAL";
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;
  readonly code: ErrorCode;

  constructor(statusCode: number, message: string, details?: unknown, code?: ErrorCode) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.details = details;
    this.code = code ?? defaultCode(statusCode);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, message, details, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message, undefined, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** The operation is not legal in the entity's current state. */
export class InvalidTransitionError extends HttpError {
  readonly currentState: string;

  constructor(message: string, currentState: string) {
    super(400, message, { currentState }, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
    this.currentState = currentState;
  }
}

export class OutOfStockError extends HttpError {
  readonly packageId: string;

  constructor(packageId: string, message = "No slots available for this package") {
    super(409, message, { packageId, retryable: true }, "OUT_OF_STOCK");
    this.name = "OutOfStockError";
    this.packageId = packageId;
  }
}

export class ContentionError extends HttpError {
  constructor(message = "The resource is busy, retry the request") {
    super(409, message, { retryable: true }, "CONTENTION");
    this.name = "ContentionError";
  }
}

export class ConflictError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(409, message, details, "CONFLICT");
    this.name = "ConflictError";
  }
}

export class NoEligibleInvestmentsError extends HttpError {
  constructor(message = "No completed investments available for withdrawal") {
    super(422, message, undefined, "NO_ELIGIBLE_INVESTMENTS");
    this.name = "NoEligibleInvestmentsError";
  }
}

export class GatewayUnavailableError extends HttpError {
  constructor(message: string) {
    super(502, message, { retryable: true }, "GATEWAY_UNAVAILABLE");
    this.name = "GatewayUnavailableError";
  }
}

export class InvalidSignatureError extends HttpError {
  constructor() {
    super(400, "Invalid signature", undefined, "INVALID_SIGNATURE");
    this.name = "InvalidSignatureError";
  }
}
