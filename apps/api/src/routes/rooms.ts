import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { withUnitOfWork } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import {
  closeRoom,
  createRoom,
  getCurrentRoom,
  joinRoom,
  leaveRoom,
  listParticipants,
  updateRoomStatus
} from "../rooms/lifecycle.js";
import {
  acceptInvitation,
  declineInvitation,
  handleJoinRequest,
  inviteFriends,
  listJoinRequests,
  listPendingInvitations,
  requestToJoin
} from "../rooms/invitations.js";

const roomCode = z.string().trim().min(1).max(12);

const createRoomSchema = z.object({
  hostChildId: z.string().uuid(),
  gameId: z.string().trim().min(1).max(80),
  difficulty: z.string().trim().min(1).max(40),
  maxPlayers: z.number().int().min(2).max(8).default(4),
  selectedCategory: z.string().trim().max(80).nullable().optional(),
  friendIds: z.array(z.string().uuid()).max(7).optional()
});

const joinSchema = z.object({ roomCode, childId: z.string().uuid() });
const leaveSchema = z.object({ childId: z.string().uuid() });
const closeSchema = z.object({ roomId: z.string().uuid(), childId: z.string().uuid() });
const statusSchema = z.object({
  childId: z.string().uuid(),
  status: z.enum(["waiting", "playing", "finished"])
});
const inviteSchema = z.object({
  roomCode,
  childId: z.string().uuid(),
  friendIds: z.array(z.string().uuid()).min(1).max(20)
});
const handleRequestSchema = z.object({
  requestId: z.string().uuid(),
  hostChildId: z.string().uuid(),
  approve: z.boolean()
});
const invitationSchema = z.object({
  invitationId: z.string().uuid(),
  childId: z.string().uuid()
});
const roomParamsSchema = z.object({ roomId: z.string().uuid() });
const childQuerySchema = z.object({ childId: z.string().uuid() });
const hostQuerySchema = z.object({ hostChildId: z.string().uuid() });

const recordTransition = (action: string, roomId: string, subject: string) => {
  metrics.incCounter("room_transitions_total", { action });
  log.info("room.transition", { action, roomId, subject });
};

export const registerRoomRoutes = (app: FastifyInstance) => {
  app.post("/v1/rooms", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createRoomSchema.parse(request.body ?? {});
    const result = await withUnitOfWork(user.subject, (trx) =>
      createRoom(trx, user.subject, body)
    );
    recordTransition("create", result.room.id, user.subject);
    return reply.code(201).send(result);
  });

  app.post("/v1/rooms/join", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = joinSchema.parse(request.body ?? {});
    const room = await withUnitOfWork(user.subject, (trx) => joinRoom(trx, user.subject, body));
    recordTransition("join", room.id, user.subject);
    return room;
  });

  app.post("/v1/rooms/leave", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = leaveSchema.parse(request.body ?? {});
    const outcome = await withUnitOfWork(user.subject, (trx) =>
      leaveRoom(trx, user.subject, body)
    );
    recordTransition(outcome.roomDeleted ? "close" : "leave", outcome.roomId, user.subject);
    return reply.code(204).send();
  });

  app.post("/v1/rooms/close", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = closeSchema.parse(request.body ?? {});
    await withUnitOfWork(user.subject, (trx) => closeRoom(trx, user.subject, body));
    recordTransition("close", body.roomId, user.subject);
    return reply.code(204).send();
  });

  app.get("/v1/rooms/current", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.query);
    const room = await withUnitOfWork(user.subject, (trx) =>
      getCurrentRoom(trx, user.subject, childId)
    );
    return { room };
  });

  app.get("/v1/rooms/pending-invitations", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.query);
    const invitations = await withUnitOfWork(user.subject, (trx) =>
      listPendingInvitations(trx, user.subject, childId)
    );
    return { invitations };
  });

  app.post("/v1/rooms/:roomId/status", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { roomId } = roomParamsSchema.parse(request.params);
    const body = statusSchema.parse(request.body ?? {});
    const room = await withUnitOfWork(user.subject, (trx) =>
      updateRoomStatus(trx, user.subject, roomId, body)
    );
    recordTransition("status", room.id, user.subject);
    return room;
  });

  app.get("/v1/rooms/:roomId/participants", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { roomId } = roomParamsSchema.parse(request.params);
    const participants = await withUnitOfWork(user.subject, (trx) =>
      listParticipants(trx, roomId)
    );
    return { participants };
  });

  app.get("/v1/rooms/:roomId/join-requests", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { roomId } = roomParamsSchema.parse(request.params);
    const { hostChildId } = hostQuerySchema.parse(request.query);
    const requests = await withUnitOfWork(user.subject, (trx) =>
      listJoinRequests(trx, user.subject, roomId, hostChildId)
    );
    return { requests };
  });

  app.post("/v1/rooms/invite", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = inviteSchema.parse(request.body ?? {});
    const invitations = await withUnitOfWork(user.subject, (trx) =>
      inviteFriends(trx, user.subject, body)
    );
    return reply.code(201).send({ invitations });
  });

  app.post("/v1/rooms/request-to-join", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = joinSchema.parse(request.body ?? {});
    const joinRequest = await withUnitOfWork(user.subject, (trx) =>
      requestToJoin(trx, user.subject, body)
    );
    return reply.code(201).send(joinRequest);
  });

  app.post("/v1/rooms/handle-join-request", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = handleRequestSchema.parse(request.body ?? {});
    const result = await withUnitOfWork(user.subject, (trx) =>
      handleJoinRequest(trx, user.subject, body)
    );
    if (body.approve) {
      recordTransition("approve", result.room.id, user.subject);
    }
    return result;
  });

  app.post("/v1/rooms/accept-invitation", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = invitationSchema.parse(request.body ?? {});
    const result = await withUnitOfWork(user.subject, (trx) =>
      acceptInvitation(trx, user.subject, body)
    );
    recordTransition("accept", result.room.id, user.subject);
    return result;
  });

  app.post("/v1/rooms/decline-invitation", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = invitationSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) => declineInvitation(trx, user.subject, body));
  });
};
