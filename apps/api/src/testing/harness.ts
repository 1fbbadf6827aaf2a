import { SignJWT, exportJWK, generateKeyPair, type JWK } from "jose";
import { closeDb, type DbClient } from "@playroom/db";
import { createTestDb } from "./fixtures.js";

// Configuration is read once at import time, so this must run before the server loads.
process.env.NODE_ENV = "test";
process.env.AUTO_MIGRATE = "false";
process.env.DEV_MODE = "false";
process.env.RATE_LIMIT_PER_MIN = "10000";
process.env.UPSTREAM_TIMEOUT_MS = "2000";
process.env.IDP_ISSUER = "https://idp.test/";
process.env.IDP_JWKS_URL = "https://idp.test/.well-known/jwks.json";
process.env.IDP_AUDIENCE = "https://api.playroom.test";
process.env.STRIPE_SECRET_KEY = "test-secret";
process.env.STRIPE_PRICE_ID = "price_test_voice";
process.env.STRIPE_API_BASE_URL = "https://payments.test";
process.env.CHECKOUT_DEFAULT_ORIGIN = "https://app.playroom.test";
process.env.ELEVENLABS_API_KEY = "test-secret";
process.env.ELEVENLABS_API_BASE_URL = "https://speech.test";

const TEST_ISSUER = "https://idp.test/";
const TEST_AUDIENCE = "https://api.playroom.test";
const JWKS_URL = "https://idp.test/.well-known/jwks.json";
const KEY_ID = "test-key-1";

type KeyPair = Awaited<ReturnType<typeof generateKeyPair>>;

let signingKey: Promise<{ privateKey: KeyPair["privateKey"]; jwk: JWK }> | null = null;

const loadSigningKey = () => {
  signingKey ??= (async () => {
    const { privateKey, publicKey } = await generateKeyPair("RS256");
    const jwk = await exportJWK(publicKey);
    return { privateKey, jwk: { ...jwk, kid: KEY_ID, alg: "RS256", use: "sig" } };
  })();
  return signingKey;
};

export type TokenOptions = {
  email?: string;
  expired?: boolean;
  issuer?: string;
  audience?: string;
};

export const signToken = async (subject: string, options: TokenOptions = {}) => {
  const { privateKey } = await loadSigningKey();
  const issuedAt = Math.floor(Date.now() / 1000);
  const jwt = new SignJWT(options.email ? { email: options.email } : {})
    .setProtectedHeader({ alg: "RS256", kid: KEY_ID })
    .setSubject(subject)
    .setIssuer(options.issuer ?? TEST_ISSUER)
    .setAudience(options.audience ?? TEST_AUDIENCE);
  if (options.expired) {
    jwt.setIssuedAt(issuedAt - 7200).setExpirationTime(issuedAt - 3600);
  } else {
    jwt.setIssuedAt(issuedAt).setExpirationTime(issuedAt + 3600);
  }
  return jwt.sign(privateKey);
};

export const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

export type UpstreamRequest = {
  url: URL;
  method: string;
  headers: Headers;
  body: RequestInit["body"];
};

/** Answers an outbound call, or returns undefined to let it fall through to a 404. */
export type UpstreamHandler = (
  request: UpstreamRequest
) => Response | undefined | Promise<Response | undefined>;

export const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" }
  });

const toUrl = (input: Parameters<typeof fetch>[0]) =>
  new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);

/**
 * Boots the API against an in-memory database with the identity provider and every
 * third-party endpoint answered in process.
 */
export const startTestApp = async (options: { upstream?: UpstreamHandler } = {}) => {
  const { jwk } = await loadSigningKey();
  const db: DbClient = await createTestDb();
  const calls: UpstreamRequest[] = [];
  const originalFetch = globalThis.fetch;

  const stub: typeof fetch = async (input, init) => {
    const url = toUrl(input);
    if (url.href === JWKS_URL) {
      return jsonResponse({ keys: [jwk] });
    }
    const request: UpstreamRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: init?.body
    };
    calls.push(request);
    const answer = options.upstream ? await options.upstream(request) : undefined;
    return answer ?? jsonResponse({ error: "not_found" }, 404);
  };
  globalThis.fetch = stub;

  const dbModule = await import("../db.js");
  dbModule.__test__.setDb(db);
  const auth = await import("../auth.js");
  auth.__test__.resetKeyCache();
  const { buildServer } = await import("../server.js");
  const app = buildServer();
  await app.ready();

  const close = async () => {
    await app.close();
    dbModule.__test__.setDb(null);
    await closeDb(db);
    globalThis.fetch = originalFetch;
  };

  return { app, db, calls, close };
};

export type TestApp = Awaited<ReturnType<typeof startTestApp>>;
