import { randomUUID } from "node:crypto";
import { notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import {
  nowIso,
  toChildProfile,
  toParentProfile,
  type ChildRow,
  type ParentRow
} from "../records.js";
import { findParent, loadOwnedChild, requireParent } from "./ownership.js";

export type Caller = {
  subject: string;
  email: string | null;
};

export const placeholderEmail = (subject: string) =>
  `${subject.replace(/[^A-Za-z0-9._-]/g, "_")}@users.invalid`;

export const createOrFetchParent = async (
  trx: DbTransaction,
  caller: Caller,
  input: { name?: string }
) => {
  const existing = await findParent(trx, caller.subject);
  if (existing) {
    return { profile: toParentProfile(existing), created: false };
  }
  const now = nowIso();
  const row: ParentRow = {
    id: randomUUID(),
    subject: caller.subject,
    email: caller.email ?? placeholderEmail(caller.subject),
    name: input.name ?? null,
    created_at: now,
    updated_at: now
  };
  // A concurrent create for the same subject loses on the unique index and reads the winner.
  await trx<ParentRow>("parent_profiles").insert(row).onConflict("subject").ignore();
  const stored = await requireParent(trx, caller.subject);
  return { profile: toParentProfile(stored), created: stored.id === row.id };
};

export const getParent = async (trx: DbTransaction, subject: string) =>
  toParentProfile(await requireParent(trx, subject));

export const updateParent = async (
  trx: DbTransaction,
  subject: string,
  input: { name?: string | null }
) => {
  const parent = await requireParent(trx, subject);
  if (input.name !== undefined) {
    await trx<ParentRow>("parent_profiles")
      .where({ id: parent.id })
      .update({ name: input.name, updated_at: nowIso() });
  }
  return getParent(trx, subject);
};

export type ChildInput = {
  name: string;
  ageGroup: string;
  avatar?: string | null;
};

export const createChild = async (trx: DbTransaction, subject: string, input: ChildInput) => {
  const parent = await requireParent(trx, subject);
  const now = nowIso();
  const id = randomUUID();
  await trx<ChildRow>("child_profiles").insert({
    id,
    parent_id: parent.id,
    name: input.name,
    age_group: input.ageGroup,
    avatar: input.avatar ?? null,
    voice_clone_enabled: false,
    is_online: false,
    created_at: now,
    updated_at: now
  });
  return getChild(trx, subject, id);
};

export const listChildren = async (trx: DbTransaction, subject: string) => {
  const parent = await requireParent(trx, subject);
  const rows = await trx<ChildRow>("child_profiles")
    .where({ parent_id: parent.id })
    .orderBy("created_at", "asc")
    .orderBy("id", "asc");
  return rows.map(toChildProfile);
};

export const getChild = async (trx: DbTransaction, subject: string, childId: string) =>
  toChildProfile(await loadOwnedChild(trx, subject, childId));

export type ChildPatch = {
  name?: string;
  ageGroup?: string;
  avatar?: string | null;
  voiceCloneEnabled?: boolean;
  voiceCloneId?: string | null;
};

export const updateChild = async (
  trx: DbTransaction,
  subject: string,
  childId: string,
  patch: ChildPatch
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const changes: Partial<ChildRow> = {};
  if (patch.name !== undefined) changes.name = patch.name;
  if (patch.ageGroup !== undefined) changes.age_group = patch.ageGroup;
  if (patch.avatar !== undefined) changes.avatar = patch.avatar;
  if (patch.voiceCloneEnabled !== undefined) changes.voice_clone_enabled = patch.voiceCloneEnabled;
  if (patch.voiceCloneId !== undefined) changes.voice_clone_id = patch.voiceCloneId;
  if (Object.keys(changes).length > 0) {
    await trx<ChildRow>("child_profiles")
      .where({ id: child.id })
      .update({ ...changes, updated_at: nowIso() });
  }
  return getChild(trx, subject, child.id);
};

export const deleteChild = async (trx: DbTransaction, subject: string, childId: string) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const deleted = await trx<ChildRow>("child_profiles").where({ id: child.id }).delete();
  if (deleted === 0) {
    throw notFound("Child profile not found");
  }
};

/** Presence update; `lastSeenAt` is stamped on every call whether or not a field changed. */
export const updateChildStatus = async (
  trx: DbTransaction,
  subject: string,
  childId: string,
  input: { isOnline?: boolean }
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const now = nowIso();
  await trx<ChildRow>("child_profiles")
    .where({ id: child.id })
    .update({
      ...(input.isOnline !== undefined ? { is_online: input.isOnline } : {}),
      last_seen_at: now,
      updated_at: now
    });
  return getChild(trx, subject, child.id);
};
