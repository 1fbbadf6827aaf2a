import fastify, { FastifyError } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { isApiError, makeErrorResponse } from "@playroom/shared";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { registerBillingRoutes } from "./routes/billing.js";
import { registerFriendRoutes } from "./routes/friends.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerProfileRoutes } from "./routes/profiles.js";
import { registerRoomRoutes } from "./routes/rooms.js";
import { registerSessionRoutes } from "./routes/sessions.js";
import { registerStoryRoutes } from "./routes/stories.js";
import { registerVoiceRoutes } from "./routes/voice.js";

const describeIssue = (error: ZodError) => {
  const [issue] = error.issues;
  if (!issue) return undefined;
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
};

export const buildServer = () => {
  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES,
    genReqId: (request) => {
      const incoming = request.headers["x-request-id"];
      const requestId = Array.isArray(incoming) ? incoming[0] : incoming;
      return requestId || randomUUID();
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isApiError(error)) {
      if (error.statusCode >= 500) {
        log.warn("request.degraded", { requestId: request.id, code: error.code, error: error.message });
      }
      return reply.code(error.statusCode).send(error.toResponse({ devMode: config.DEV_MODE }));
    }
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: describeIssue(error)
        })
      );
    }
    if (error.statusCode === 429) {
      return reply.code(429).send(makeErrorResponse("rate_limited", "Too many requests"));
    }
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          devMode: config.DEV_MODE,
          debug: { cause: error.message }
        })
      );
    }
    log.error("request.failed", { requestId: request.id, error: error.message });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: { cause: error.message }
      })
    );
  });

  app.register(rateLimit, { max: config.RATE_LIMIT_PER_MIN, timeWindow: "1 minute" });
  app.register(cors, {
    origin: config.ALLOWED_ORIGIN_LIST.includes("*") ? true : config.ALLOWED_ORIGIN_LIST
  });

  registerHealthRoutes(app);
  registerProfileRoutes(app);
  registerFriendRoutes(app);
  registerRoomRoutes(app);
  registerSessionRoutes(app);
  registerStoryRoutes(app);
  registerVoiceRoutes(app);
  registerBillingRoutes(app);

  return app;
};
