import { z } from "zod";
import { badRequest, externalError, serviceUnavailable } from "@playroom/shared";
import { callUpstream, readJson } from "../upstream.js";

export type SpeechClientOptions = {
  apiKey?: string;
  baseUrl: string;
  modelId: string;
  timeoutMs: number;
};

const UPSTREAM = "speech_provider";

const voiceCreatedSchema = z.object({ voice_id: z.string().min(1) });

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/** Strict base64 decode; rejects anything the browser's btoa would not have produced. */
export const decodeAudioSample = (value: string) => {
  const compact = value.replace(/\s+/g, "").replace(/^data:[^;]+;base64,/, "");
  if (!compact || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw badRequest("invalid_request", "Audio data is not valid base64");
  }
  return Buffer.from(compact, "base64");
};

export const createSpeechClient = (options: SpeechClientOptions) => {
  const requireKey = () => {
    if (!options.apiKey) {
      throw serviceUnavailable("Speech provider is not configured");
    }
    return options.apiKey;
  };

  const cloneVoice = async (input: { name: string; sample: Buffer; fileName: string }) => {
    const apiKey = requireKey();
    const form = new FormData();
    form.append("name", input.name);
    form.append("description", "Cloned voice for storytelling");
    const blob = new Blob([new Uint8Array(input.sample)], { type: "audio/wav" });
    form.append("files", blob, input.fileName);
    const response = await callUpstream({
      name: UPSTREAM,
      url: new URL("/v1/voices/add", options.baseUrl).toString(),
      init: { method: "POST", headers: { "xi-api-key": apiKey }, body: form },
      timeoutMs: options.timeoutMs
    });
    const parsed = voiceCreatedSchema.safeParse(await readJson(UPSTREAM, response));
    if (!parsed.success) {
      throw externalError("Speech provider returned no voice id");
    }
    return parsed.data.voice_id;
  };

  const synthesize = async (input: { text: string; voiceId: string }) => {
    const apiKey = requireKey();
    const response = await callUpstream({
      name: UPSTREAM,
      url: new URL(
        `/v1/text-to-speech/${encodeURIComponent(input.voiceId)}`,
        options.baseUrl
      ).toString(),
      init: {
        method: "POST",
        headers: {
          "xi-api-key": apiKey,
          "content-type": "application/json",
          accept: "audio/mpeg"
        },
        body: JSON.stringify({
          text: input.text,
          model_id: options.modelId,
          voice_settings: { stability: 0.5, similarity_boost: 0.8 }
        })
      },
      timeoutMs: options.timeoutMs
    });
    const audio = Buffer.from(await response.arrayBuffer());
    return audio.toString("base64");
  };

  return { cloneVoice, synthesize };
};

export type SpeechClient = ReturnType<typeof createSpeechClient>;
