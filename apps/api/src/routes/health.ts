import { FastifyInstance } from "fastify";
import { checkDbReady } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";

export const registerHealthRoutes = (app: FastifyInstance) => {
  app.get("/", async () => ({ service: "playroom-api", status: "ok" }));

  app.get("/healthz", async () => ({ status: "healthy" }));

  app.get("/readyz", async (_request, reply) => {
    try {
      await checkDbReady();
      metrics.setGauge("db_ready", {}, 1);
      return { status: "ready", database: "connected" };
    } catch (error) {
      metrics.setGauge("db_ready", {}, 0);
      log.warn("readiness.db_unreachable", {
        error: error instanceof Error ? error.message : "unknown_error"
      });
      return reply.code(503).send({ status: "not_ready", database: "disconnected" });
    }
  });

  app.get("/metrics", async (_request, reply) => {
    reply.header("content-type", "text/plain; version=0.0.4");
    return metrics.render();
  });
};
