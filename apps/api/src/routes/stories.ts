import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { withUnitOfWork } from "../db.js";
import { createStory, deleteStory, getStory, listStories } from "../stories/stories.js";

const storySchema = z.object({
  childId: z.string().uuid(),
  title: z.string().trim().min(1).max(200),
  content: z.string().min(1).max(50_000),
  prompt: z.string().max(2000).nullable().optional(),
  audioUrl: z.string().url().nullable().optional()
});

const childQuerySchema = z.object({ childId: z.string().uuid() });
const storyParamsSchema = z.object({ storyId: z.string().uuid() });

export const registerStoryRoutes = (app: FastifyInstance) => {
  app.post("/v1/stories", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = storySchema.parse(request.body ?? {});
    const story = await withUnitOfWork(user.subject, (trx) => createStory(trx, user.subject, body));
    return reply.code(201).send(story);
  });

  app.get("/v1/stories", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { childId } = childQuerySchema.parse(request.query);
    const stories = await withUnitOfWork(user.subject, (trx) =>
      listStories(trx, user.subject, childId)
    );
    return { stories };
  });

  app.get("/v1/stories/:storyId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { storyId } = storyParamsSchema.parse(request.params);
    return withUnitOfWork(user.subject, (trx) => getStory(trx, user.subject, storyId));
  });

  app.delete("/v1/stories/:storyId", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { storyId } = storyParamsSchema.parse(request.params);
    await withUnitOfWork(user.subject, (trx) => deleteStory(trx, user.subject, storyId));
    return reply.code(204).send();
  });
};
