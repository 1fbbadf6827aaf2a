import { notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import type { ChildRow, ParentRow } from "../records.js";

export const findParent = (trx: DbTransaction, subject: string) =>
  trx<ParentRow>("parent_profiles").where({ subject }).first();

export const requireParent = async (trx: DbTransaction, subject: string) => {
  const parent = await findParent(trx, subject);
  if (!parent) {
    throw notFound("Parent profile not found");
  }
  return parent;
};

export const findChild = (trx: DbTransaction, childId: string) =>
  trx<ChildRow>("child_profiles").where({ id: childId }).first();

/**
 * A child is owned when its parent's subject is the caller's. Anything else,
 * including a child that exists under another parent, reads as missing.
 */
export const loadOwnedChild = async (trx: DbTransaction, subject: string, childId: string) => {
  const parent = await findParent(trx, subject);
  const child = parent
    ? await trx<ChildRow>("child_profiles").where({ id: childId, parent_id: parent.id }).first()
    : undefined;
  if (!child) {
    throw notFound("Child profile not found");
  }
  return child;
};

export const requireChild = async (trx: DbTransaction, childId: string) => {
  const child = await findChild(trx, childId);
  if (!child) {
    throw notFound("Child profile not found");
  }
  return child;
};
