import {
  createLocalJWKSet,
  createRemoteJWKSet,
  customFetch,
  decodeProtectedHeader,
  errors,
  jwtVerify,
  type JWSHeaderParameters,
  type FlattenedJWSInput,
  type JWTPayload
} from "jose";
import type { Logger, MetricsRegistry } from "@playroom/shared";

export type VerifiedIdentity = {
  subject: string;
  email: string | null;
  claims: JWTPayload;
};

export type VerificationFailure = "expired" | "invalid_token" | "invalid_claims" | "unavailable";

export class TokenVerificationError extends Error {
  readonly reason: VerificationFailure;

  constructor(reason: VerificationFailure, message: string) {
    super(message);
    this.name = "TokenVerificationError";
    this.reason = reason;
  }
}

export type TokenVerifierOptions = {
  jwksUrl?: string;
  issuer?: string;
  audiences: string[];
  emailClaim?: string;
  ttlSeconds: number;
  minRefreshSeconds: number;
  timeoutMs: number;
  log?: Logger;
  metrics?: MetricsRegistry;
};

const ALGORITHM = "RS256";

const isUnknownKey = (error: unknown) =>
  error instanceof errors.JWKSNoMatchingKey || error instanceof errors.JWKSMultipleMatchingKeys;

export const createTokenVerifier = (options: TokenVerifierOptions) => {
  const buildKeySet = (jwksUrl: string) =>
    createRemoteJWKSet(new URL(jwksUrl), {
      cacheMaxAge: options.ttlSeconds * 1000,
      cooldownDuration: options.minRefreshSeconds * 1000,
      timeoutDuration: options.timeoutMs,
      [customFetch]: async (url, init) => {
        try {
          const response = await fetch(url, init);
          const outcome = response.ok ? "ok" : "error";
          options.metrics?.incCounter("jwks_fetch_total", { outcome });
          if (response.ok) {
            options.log?.info("jwks.refreshed", {});
          } else {
            options.log?.warn("jwks.fetch_failed", { error: `status ${response.status}` });
          }
          return response;
        } catch (error) {
          options.metrics?.incCounter("jwks_fetch_total", { outcome: "error" });
          options.log?.warn("jwks.fetch_failed", {
            error: error instanceof Error ? error.message : "jwks_fetch_failed"
          });
          throw error;
        }
      }
    });

  let keySet = options.jwksUrl ? buildKeySet(options.jwksUrl) : null;

  const resolveKey = async (header: JWSHeaderParameters, token: FlattenedJWSInput) => {
    if (!keySet || !options.issuer) {
      throw new TokenVerificationError("unavailable", "Identity provider is not configured");
    }
    const remote = keySet;
    try {
      return await remote(header, token);
    } catch (error) {
      if (isUnknownKey(error)) {
        throw new TokenVerificationError("invalid_token", "Unknown signing key");
      }
      if (error instanceof errors.JOSENotSupported) {
        throw new TokenVerificationError("invalid_token", "Signing key is not usable");
      }
      // A stale set still verifies tokens signed with keys it knows.
      const known = remote.jwks();
      if (!known) {
        throw new TokenVerificationError("unavailable", "Signing keys are unavailable");
      }
      options.log?.warn("jwks.serving_stale", { kid: header.kid });
      try {
        return await createLocalJWKSet(known)(header, token);
      } catch (staleError) {
        if (isUnknownKey(staleError)) {
          throw new TokenVerificationError("invalid_token", "Unknown signing key");
        }
        throw staleError;
      }
    }
  };

  const verifyWithAudiences = async (token: string) => {
    const audiences = options.audiences.length > 0 ? options.audiences : [undefined];
    let lastError: unknown = null;
    for (const audience of audiences) {
      try {
        const { payload } = await jwtVerify(token, resolveKey, {
          algorithms: [ALGORITHM],
          issuer: options.issuer,
          audience
        });
        return payload;
      } catch (error) {
        lastError = error;
        if (error instanceof errors.JWTClaimValidationFailed && error.claim === "aud") {
          continue;
        }
        break;
      }
    }
    throw lastError;
  };

  const verify = async (token: string): Promise<VerifiedIdentity> => {
    let kid: string | undefined;
    try {
      const header = decodeProtectedHeader(token);
      if (header.alg !== ALGORITHM) {
        throw new TokenVerificationError("invalid_token", "Unsupported token algorithm");
      }
      kid = header.kid;
    } catch (error) {
      if (error instanceof TokenVerificationError) throw error;
      throw new TokenVerificationError("invalid_token", "Malformed token header");
    }
    if (!kid) {
      throw new TokenVerificationError("invalid_token", "Token header has no key id");
    }

    let payload: JWTPayload;
    try {
      payload = await verifyWithAudiences(token);
    } catch (error) {
      if (error instanceof TokenVerificationError) throw error;
      if (error instanceof errors.JWTExpired) {
        throw new TokenVerificationError("expired", "Token has expired");
      }
      if (error instanceof errors.JWTClaimValidationFailed) {
        throw new TokenVerificationError("invalid_claims", `Token claim rejected: ${error.claim}`);
      }
      throw new TokenVerificationError("invalid_token", "Token signature is invalid");
    }

    if (typeof payload.sub !== "string" || payload.sub.length === 0) {
      throw new TokenVerificationError("invalid_claims", "Token has no subject");
    }
    const email = [payload.email, options.emailClaim ? payload[options.emailClaim] : undefined].find(
      (value): value is string => typeof value === "string" && value.length > 0
    );
    return { subject: payload.sub, email: email ?? null, claims: payload };
  };

  return {
    verify,
    reset: () => {
      keySet = options.jwksUrl ? buildKeySet(options.jwksUrl) : null;
    }
  };
};

export type TokenVerifier = ReturnType<typeof createTokenVerifier>;
