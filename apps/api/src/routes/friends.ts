import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { withUnitOfWork } from "../db.js";
import {
  acceptFriendRequest,
  declineFriendRequest,
  listFriends,
  listIncomingRequests,
  removeFriend,
  searchChildren,
  sendFriendRequest
} from "../friends/graph.js";

const friendRequestSchema = z.object({
  requesterId: z.string().uuid(),
  addresseeId: z.string().uuid()
});

const childQuerySchema = z.object({ childId: z.string().uuid() });
const requestParamsSchema = z.object({ requestId: z.string().uuid() });
const removeQuerySchema = z.object({ friendChildId: z.string().uuid() });
const searchQuerySchema = z.object({
  childId: z.string().uuid(),
  q: z.string().trim().min(1).max(80)
});

export const registerFriendRoutes = (app: FastifyInstance) => {
  app.post("/v1/friends/requests", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = friendRequestSchema.parse(request.body ?? {});
    const edge = await withUnitOfWork(user.subject, (trx) =>
      sendFriendRequest(trx, user.subject, body)
    );
    return reply.code(201).send(edge);
  });

  app.get("/v1/friends/requests", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.query);
    const requests = await withUnitOfWork(user.subject, (trx) =>
      listIncomingRequests(trx, user.subject, childId)
    );
    return { requests };
  });

  app.post("/v1/friends/requests/:requestId/accept", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { requestId } = requestParamsSchema.parse(request.params);
    return withUnitOfWork(user.subject, (trx) => acceptFriendRequest(trx, user.subject, requestId));
  });

  app.post("/v1/friends/requests/:requestId/decline", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { requestId } = requestParamsSchema.parse(request.params);
    await withUnitOfWork(user.subject, (trx) => declineFriendRequest(trx, user.subject, requestId));
    return reply.code(204).send();
  });

  app.get("/v1/friends/search", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId, q } = searchQuerySchema.parse(request.query);
    const results = await withUnitOfWork(user.subject, (trx) =>
      searchChildren(trx, user.subject, childId, q)
    );
    return { results };
  });

  app.get("/v1/friends", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.query);
    const friends = await withUnitOfWork(user.subject, (trx) =>
      listFriends(trx, user.subject, childId)
    );
    return { friends };
  });

  app.delete("/v1/friends/:childId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.params);
    const { friendChildId } = removeQuerySchema.parse(request.query);
    await withUnitOfWork(user.subject, (trx) =>
      removeFriend(trx, user.subject, childId, friendChildId)
    );
    return reply.code(204).send();
  });
};
