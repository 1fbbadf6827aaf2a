export {
  ApiError,
  badRequest,
  externalError,
  forbidden,
  isApiError,
  makeErrorResponse,
  notFound,
  serviceUnavailable,
  unauthenticated
} from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createLogger, redact } from "./log.js";
export type { Logger, LogLevel, LogMeta } from "./log.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader) {
    return null;
  }
  const match = /^Bearer\s+(\S+)\s*$/i.exec(authHeader);
  return match ? match[1] : null;
};
