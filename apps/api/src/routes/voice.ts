import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireUser } from "../auth.js";
import { config } from "../config.js";
import { withUnitOfWork } from "../db.js";
import { log } from "../log.js";
import { createSpeechClient } from "../voice/speech.js";
import { cloneChildVoice } from "../voice/voice.js";

const speech = createSpeechClient({
  apiKey: config.ELEVENLABS_API_KEY,
  baseUrl: config.ELEVENLABS_API_BASE_URL,
  modelId: config.ELEVENLABS_MODEL_ID,
  timeoutMs: config.UPSTREAM_TIMEOUT_MS
});

const cloneSchema = z.object({
  childId: z.string().uuid(),
  audioData: z.string().min(1),
  fileName: z.string().trim().min(1).max(200).optional()
});

const storyAudioSchema = z.object({
  text: z.string().trim().min(1).max(5000),
  voiceId: z.string().trim().min(1).max(200)
});

export const registerVoiceRoutes = (app: FastifyInstance) => {
  app.post("/v1/voice/clones", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = cloneSchema.parse(request.body ?? {});
    const result = await cloneChildVoice(
      (work) => withUnitOfWork(user.subject, work),
      user.subject,
      speech,
      body
    );
    log.info("voice.cloned", { subject: user.subject, childId: body.childId });
    return result;
  });

  app.post("/v1/voice/story-audio", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = storyAudioSchema.parse(request.body ?? {});
    const audioContent = await speech.synthesize(body);
    return { audioContent };
  });
};
