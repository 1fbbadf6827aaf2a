import { FastifyInstance } from "fastify";
import { z } from "zod";
import { badRequest } from "@playroom/shared";
import { requireUser } from "../auth.js";
import { createPaymentClient } from "../billing/stripe.js";
import {
  cancelSubscription,
  getSubscription,
  upsertSubscription
} from "../billing/subscriptions.js";
import { config } from "../config.js";
import { withUnitOfWork } from "../db.js";
import { log } from "../log.js";
import { requireParent } from "../profiles/ownership.js";

const payments = createPaymentClient({
  secretKey: config.STRIPE_SECRET_KEY,
  priceId: config.STRIPE_PRICE_ID,
  baseUrl: config.STRIPE_API_BASE_URL,
  timeoutMs: config.UPSTREAM_TIMEOUT_MS
});

const checkoutSchema = z.object({
  email: z.string().email().optional(),
  name: z.string().trim().min(1).max(120).optional()
});

const subscriptionSchema = z.object({
  stripeSubscriptionId: z.string().max(200).nullable().optional(),
  stripeCustomerId: z.string().max(200).nullable().optional(),
  status: z.enum(["active", "cancelled", "past_due", "inactive"]),
  planType: z.string().trim().min(1).max(40).optional()
});

const originSchema = z.string().url();

const resolveOrigin = (header: string | undefined) => {
  const parsed = originSchema.safeParse(header);
  return parsed.success ? parsed.data.replace(/\/+$/, "") : config.CHECKOUT_DEFAULT_ORIGIN;
};

// Placeholder addresses cannot receive receipts.
const storedEmail = (email: string) => (email.endsWith("@users.invalid") ? null : email);

export const registerBillingRoutes = (app: FastifyInstance) => {
  app.post("/v1/billing/checkout", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = checkoutSchema.parse(request.body ?? {});
    const parent = await withUnitOfWork(user.subject, (trx) => requireParent(trx, user.subject));
    const email = body.email ?? storedEmail(parent.email) ?? user.email;
    if (!email) {
      throw badRequest("invalid_request", "An email address is required for checkout");
    }
    const checkout = await payments.createCheckout({
      email,
      name: body.name ?? parent.name ?? email,
      origin: resolveOrigin(request.headers.origin)
    });
    log.info("billing.checkout_created", { subject: user.subject, sessionId: checkout.sessionId });
    return { url: checkout.url };
  });

  app.post("/v1/billing/voice-subscription", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = subscriptionSchema.parse(request.body ?? {});
    return withUnitOfWork(user.subject, (trx) => upsertSubscription(trx, user.subject, body));
  });

  app.get("/v1/billing/voice-subscription", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    return withUnitOfWork(user.subject, (trx) => getSubscription(trx, user.subject));
  });

  app.delete("/v1/billing/voice-subscription", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    await withUnitOfWork(user.subject, (trx) => cancelSubscription(trx, user.subject));
    return reply.code(204).send();
  });
};
