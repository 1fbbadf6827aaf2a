import { FastifyReply, FastifyRequest } from "fastify";
import { extractBearerToken, makeErrorResponse, type ErrorCode } from "@playroom/shared";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import {
  createTokenVerifier,
  TokenVerificationError,
  type VerificationFailure
} from "./identity/verifier.js";

export type AuthenticatedUser = {
  subject: string;
  email: string | null;
};

const verifier = createTokenVerifier({
  jwksUrl: config.IDP_JWKS_URL,
  issuer: config.IDP_ISSUER,
  audiences: [config.IDP_AUDIENCE, config.IDP_CLIENT_ID].filter(
    (audience): audience is string => Boolean(audience)
  ),
  emailClaim: config.IDP_EMAIL_CLAIM,
  ttlSeconds: config.IDP_JWKS_TTL_SECONDS,
  minRefreshSeconds: config.IDP_JWKS_MIN_REFRESH_SECONDS,
  timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  log,
  metrics
});

const failures: Record<VerificationFailure, { status: number; code: ErrorCode; message: string }> =
  {
    expired: { status: 401, code: "token_expired", message: "Token has expired" },
    invalid_token: { status: 401, code: "invalid_token", message: "Invalid token" },
    invalid_claims: { status: 401, code: "invalid_claims", message: "Invalid token claims" },
    unavailable: {
      status: 503,
      code: "service_unavailable",
      message: "Identity verification is unavailable"
    }
  };

/**
 * Verifies the bearer token on the request. On failure the reply is sent and null is
 * returned; handlers stop when the result is null.
 */
export const requireUser = async (
  request: FastifyRequest,
  reply: FastifyReply
): Promise<AuthenticatedUser | null> => {
  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    metrics.incCounter("auth_failures_total", { reason: "missing" });
    await reply.code(401).send(
      makeErrorResponse("unauthenticated", "Missing bearer token", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }

  try {
    const identity = await verifier.verify(token);
    return { subject: identity.subject, email: identity.email };
  } catch (error) {
    if (!(error instanceof TokenVerificationError)) {
      throw error;
    }
    metrics.incCounter("auth_failures_total", { reason: error.reason });
    const failure = failures[error.reason];
    log.warn("auth.rejected", { requestId: request.id, reason: error.reason });
    await reply.code(failure.status).send(
      makeErrorResponse(failure.code, failure.message, {
        devMode: config.DEV_MODE,
        debug: { cause: error.message }
      })
    );
    return null;
  }
};

export const __test__ = {
  resetKeyCache: () => verifier.reset()
};
