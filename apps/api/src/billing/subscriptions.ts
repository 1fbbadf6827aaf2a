import { randomUUID } from "node:crypto";
import { notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import {
  nowIso,
  toVoiceSubscription,
  type SubscriptionRow,
  type SubscriptionStatus
} from "../records.js";
import { requireParent } from "../profiles/ownership.js";

export type SubscriptionInput = {
  stripeSubscriptionId?: string | null;
  stripeCustomerId?: string | null;
  status: SubscriptionStatus;
  planType?: string;
};

const findSubscription = (trx: DbTransaction, parentId: string) =>
  trx<SubscriptionRow>("voice_subscriptions").where({ parent_id: parentId }).first();

export const upsertSubscription = async (
  trx: DbTransaction,
  subject: string,
  input: SubscriptionInput
) => {
  const parent = await requireParent(trx, subject);
  const existing = await findSubscription(trx, parent.id);
  const now = nowIso();
  if (existing) {
    await trx<SubscriptionRow>("voice_subscriptions")
      .where({ id: existing.id })
      .update({
        status: input.status,
        plan_type: input.planType ?? existing.plan_type,
        ...(input.stripeSubscriptionId !== undefined
          ? { stripe_subscription_id: input.stripeSubscriptionId }
          : {}),
        ...(input.stripeCustomerId !== undefined
          ? { stripe_customer_id: input.stripeCustomerId }
          : {}),
        updated_at: now
      });
  } else {
    await trx<SubscriptionRow>("voice_subscriptions").insert({
      id: randomUUID(),
      parent_id: parent.id,
      stripe_subscription_id: input.stripeSubscriptionId ?? null,
      stripe_customer_id: input.stripeCustomerId ?? null,
      status: input.status,
      plan_type: input.planType ?? "basic",
      created_at: now,
      updated_at: now
    });
  }
  return getSubscription(trx, subject);
};

export const getSubscription = async (trx: DbTransaction, subject: string) => {
  const parent = await requireParent(trx, subject);
  const subscription = await findSubscription(trx, parent.id);
  if (!subscription) {
    throw notFound("No subscription found");
  }
  return toVoiceSubscription(subscription);
};

export const cancelSubscription = async (trx: DbTransaction, subject: string) => {
  const current = await getSubscription(trx, subject);
  await trx<SubscriptionRow>("voice_subscriptions")
    .where({ id: current.id })
    .update({ status: "cancelled", updated_at: nowIso() });
};

export const hasActiveSubscription = async (trx: DbTransaction, parentId: string) => {
  const subscription = await findSubscription(trx, parentId);
  return subscription?.status === "active";
};
