import { forbidden } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import { nowIso, type ChildRow } from "../records.js";
import { loadOwnedChild, requireParent } from "../profiles/ownership.js";
import { hasActiveSubscription } from "../billing/subscriptions.js";
import { getChild } from "../profiles/profiles.js";
import { decodeAudioSample, type SpeechClient } from "./speech.js";

export type VoiceCloneInput = {
  childId: string;
  audioData: string;
  fileName?: string;
};

/** Runs one piece of work in its own unit of work for the caller. */
export type UnitRunner = <T>(work: (trx: DbTransaction) => Promise<T>) => Promise<T>;

const loadCloneableChild = async (trx: DbTransaction, subject: string, childId: string) => {
  const parent = await requireParent(trx, subject);
  if (!(await hasActiveSubscription(trx, parent.id))) {
    throw forbidden("Active subscription required for voice cloning", "subscription_required");
  }
  return loadOwnedChild(trx, subject, childId);
};

/**
 * Entitlement and ownership are checked before the sample leaves the process;
 * only the provider's voice id is kept. No transaction stays open during the upload.
 */
export const cloneChildVoice = async (
  runUnit: UnitRunner,
  subject: string,
  speech: SpeechClient,
  input: VoiceCloneInput
) => {
  const child = await runUnit((trx) => loadCloneableChild(trx, subject, input.childId));
  const sample = decodeAudioSample(input.audioData);
  const voiceId = await speech.cloneVoice({
    name: `child-${child.id}-voice`,
    sample,
    fileName: input.fileName ?? "voice_sample.wav"
  });
  return runUnit(async (trx) => {
    const owned = await loadOwnedChild(trx, subject, child.id);
    await trx<ChildRow>("child_profiles")
      .where({ id: owned.id })
      .update({ voice_clone_enabled: true, voice_clone_id: voiceId, updated_at: nowIso() });
    return { voiceId, child: await getChild(trx, subject, owned.id) };
  });
};
