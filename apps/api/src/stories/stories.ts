import { randomUUID } from "node:crypto";
import { notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import { nowIso, toGeneratedStory, type ChildRow, type StoryRow } from "../records.js";
import { findParent, loadOwnedChild } from "../profiles/ownership.js";

export type StoryInput = {
  childId: string;
  title: string;
  content: string;
  prompt?: string | null;
  audioUrl?: string | null;
};

const loadOwnedStory = async (trx: DbTransaction, subject: string, storyId: string) => {
  const story = await trx<StoryRow>("generated_stories").where({ id: storyId }).first();
  if (!story) {
    throw notFound("Story not found");
  }
  // Ownership runs through the child; someone else's story reads as missing.
  const parent = await findParent(trx, subject);
  const owner = parent
    ? await trx<ChildRow>("child_profiles").where({ id: story.child_id, parent_id: parent.id }).first("id")
    : undefined;
  if (!owner) {
    throw notFound("Story not found");
  }
  return story;
};

export const createStory = async (trx: DbTransaction, subject: string, input: StoryInput) => {
  const child = await loadOwnedChild(trx, subject, input.childId);
  const row: StoryRow = {
    id: randomUUID(),
    child_id: child.id,
    title: input.title,
    content: input.content,
    prompt: input.prompt ?? null,
    audio_url: input.audioUrl ?? null,
    created_at: nowIso()
  };
  await trx<StoryRow>("generated_stories").insert(row);
  return toGeneratedStory(row);
};

export const listStories = async (trx: DbTransaction, subject: string, childId: string) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const rows = await trx<StoryRow>("generated_stories")
    .where({ child_id: child.id })
    .orderBy("created_at", "desc")
    .orderBy("id", "desc");
  return rows.map(toGeneratedStory);
};

export const getStory = async (trx: DbTransaction, subject: string, storyId: string) =>
  toGeneratedStory(await loadOwnedStory(trx, subject, storyId));

export const deleteStory = async (trx: DbTransaction, subject: string, storyId: string) => {
  const story = await loadOwnedStory(trx, subject, storyId);
  await trx<StoryRow>("generated_stories").where({ id: story.id }).delete();
};
