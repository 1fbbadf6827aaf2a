import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { withUnitOfWork } from "../db.js";
import {
  createSession,
  getSession,
  listRoomScores,
  recordScore,
  updateSession
} from "../sessions/sessions.js";

// Game state is an object document so both drivers hand it back the same way.
const gameData = z.record(z.string(), z.unknown());

const createSessionSchema = z.object({
  roomId: z.string().uuid(),
  gameData: gameData.optional()
});

const updateSessionSchema = z.object({
  gameData: gameData.optional(),
  currentTurnPlayerId: z.string().uuid().nullable().optional(),
  gameState: z.enum(["active", "paused", "finished"]).optional()
});

const MAX_INT32 = 2_147_483_647;

const scoreSchema = z.object({
  roomId: z.string().uuid(),
  sessionId: z.string().uuid().nullable().optional(),
  childId: z.string().uuid().nullable().optional(),
  playerName: z.string().trim().min(1).max(80),
  playerAvatar: z.string().max(512).nullable().optional(),
  isAi: z.boolean().optional(),
  score: z.number().int().min(0).max(MAX_INT32),
  totalQuestions: z.number().int().min(0).max(MAX_INT32)
});

const sessionParamsSchema = z.object({ sessionId: z.string().uuid() });
const roomParamsSchema = z.object({ roomId: z.string().uuid() });

export const registerSessionRoutes = (app: FastifyInstance) => {
  app.post("/v1/sessions", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createSessionSchema.parse(request.body ?? {});
    const session = await withUnitOfWork(user.subject, (trx) => createSession(trx, body));
    return reply.code(201).send(session);
  });

  app.post("/v1/sessions/scores", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = scoreSchema.parse(request.body ?? {});
    const score = await withUnitOfWork(user.subject, (trx) => recordScore(trx, body));
    return reply.code(201).send(score);
  });

  app.get("/v1/sessions/room/:roomId/scores", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { roomId } = roomParamsSchema.parse(request.params);
    const scores = await withUnitOfWork(user.subject, (trx) => listRoomScores(trx, roomId));
    return { scores };
  });

  app.get("/v1/sessions/:sessionId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { sessionId } = sessionParamsSchema.parse(request.params);
    return withUnitOfWork(user.subject, (trx) => getSession(trx, sessionId));
  });

  app.patch("/v1/sessions/:sessionId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const body = updateSessionSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) => updateSession(trx, sessionId, body));
  });
};
