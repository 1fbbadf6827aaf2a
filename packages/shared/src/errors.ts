export type ErrorCode =
  | "invalid_request"
  | "unauthenticated"
  | "token_expired"
  | "invalid_token"
  | "invalid_claims"
  | "forbidden"
  | "subscription_required"
  | "not_found"
  | "not_in_room"
  | "invalid_state"
  | "already_in_room"
  | "room_full"
  | "room_not_waiting"
  | "friend_edge_exists"
  | "service_unavailable"
  | "external_error"
  | "rate_limited"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};

/**
 * A failure that is safe to surface to the caller as-is.
 * Anything thrown that is not an ApiError is reported as a generic 500.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: string;

  constructor(statusCode: number, code: ErrorCode, message: string, details?: string) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }

  toResponse(options: Omit<ErrorOptions, "details"> = {}): ErrorResponse {
    return makeErrorResponse(this.code, this.message, { ...options, details: this.details });
  }
}

export const badRequest = (code: ErrorCode, message: string, details?: string) =>
  new ApiError(400, code, message, details);

export const notFound = (message: string, code: ErrorCode = "not_found") =>
  new ApiError(404, code, message);

export const forbidden = (message: string, code: ErrorCode = "forbidden") =>
  new ApiError(403, code, message);

export const unauthenticated = (code: ErrorCode, message: string) =>
  new ApiError(401, code, message);

export const serviceUnavailable = (message: string) =>
  new ApiError(503, "service_unavailable", message);

export const externalError = (message: string, details?: string) =>
  new ApiError(502, "external_error", message, details);

export const isApiError = (error: unknown): error is ApiError => error instanceof ApiError;
