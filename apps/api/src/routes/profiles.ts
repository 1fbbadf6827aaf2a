import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { withUnitOfWork } from "../db.js";
import {
  createChild,
  createOrFetchParent,
  deleteChild,
  getChild,
  getParent,
  listChildren,
  updateChild,
  updateChildStatus,
  updateParent
} from "../profiles/profiles.js";

const parentCreateSchema = z.object({
  name: z.string().trim().min(1).max(120).optional()
});

const parentUpdateSchema = z.object({
  name: z.string().trim().min(1).max(120).nullable().optional()
});

const childCreateSchema = z.object({
  name: z.string().trim().min(1).max(80),
  ageGroup: z.string().trim().min(1).max(20),
  avatar: z.string().max(512).nullable().optional()
});

const childUpdateSchema = z.object({
  name: z.string().trim().min(1).max(80).optional(),
  ageGroup: z.string().trim().min(1).max(20).optional(),
  avatar: z.string().max(512).nullable().optional(),
  voiceCloneEnabled: z.boolean().optional(),
  voiceCloneId: z.string().max(200).nullable().optional()
});

const childStatusSchema = z.object({
  isOnline: z.boolean().optional()
});

const childParamsSchema = z.object({ childId: z.string().uuid() });

export const registerProfileRoutes = (app: FastifyInstance) => {
  app.post("/v1/profiles/parent", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = parentCreateSchema.parse(request.body ?? {});
    const result = await withUnitOfWork(user.subject, (trx) => createOrFetchParent(trx, user, body));
    return reply.code(result.created ? 201 : 200).send(result.profile);
  });

  app.get("/v1/profiles/parent", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    return withUnitOfWork(user.subject, (trx) => getParent(trx, user.subject));
  });

  app.patch("/v1/profiles/parent", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = parentUpdateSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) => updateParent(trx, user.subject, body));
  });

  app.post("/v1/profiles/children", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = childCreateSchema.parse(request.body ?? {});
    const child = await withUnitOfWork(user.subject, (trx) => createChild(trx, user.subject, body));
    return reply.code(201).send(child);
  });

  app.get("/v1/profiles/children", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const children = await withUnitOfWork(user.subject, (trx) => listChildren(trx, user.subject));
    return { children };
  });

  app.get("/v1/profiles/children/:childId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childParamsSchema.parse(request.params);
    return withUnitOfWork(user.subject, (trx) => getChild(trx, user.subject, childId));
  });

  app.patch("/v1/profiles/children/:childId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childParamsSchema.parse(request.params);
    const body = childUpdateSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) => updateChild(trx, user.subject, childId, body));
  });

  app.delete("/v1/profiles/children/:childId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childParamsSchema.parse(request.params);
    await withUnitOfWork(user.subject, (trx) => deleteChild(trx, user.subject, childId));
    return reply.code(204).send();
  });

  app.post("/v1/profiles/children/:childId/status", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childParamsSchema.parse(request.params);
    const body = childStatusSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) =>
      updateChildStatus(trx, user.subject, childId, body)
    );
  });
};
