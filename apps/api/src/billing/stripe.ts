import { z } from "zod";
import { externalError, serviceUnavailable } from "@playroom/shared";
import { callUpstream, readJson } from "../upstream.js";

export type PaymentClientOptions = {
  secretKey?: string;
  priceId?: string;
  baseUrl: string;
  timeoutMs: number;
};

const UPSTREAM = "payment_provider";

const customerListSchema = z.object({ data: z.array(z.object({ id: z.string() })) });
const customerSchema = z.object({ id: z.string() });
const checkoutSessionSchema = z.object({ id: z.string(), url: z.string().url() });

export const createPaymentClient = (options: PaymentClientOptions) => {
  const credentials = () => {
    if (!options.secretKey || !options.priceId) {
      throw serviceUnavailable("Payment provider is not configured");
    }
    return { secretKey: options.secretKey, priceId: options.priceId };
  };

  const request = async <T>(
    schema: z.ZodType<T>,
    path: string,
    init: { method: "GET" | "POST"; form?: Record<string, string>; query?: Record<string, string> }
  ) => {
    const { secretKey } = credentials();
    const url = new URL(path, options.baseUrl);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, value);
    }
    const response = await callUpstream({
      name: UPSTREAM,
      url: url.toString(),
      init: {
        method: init.method,
        headers: {
          authorization: `Bearer ${secretKey}`,
          ...(init.form ? { "content-type": "application/x-www-form-urlencoded" } : {})
        },
        body: init.form ? new URLSearchParams(init.form).toString() : undefined
      },
      timeoutMs: options.timeoutMs
    });
    const parsed = schema.safeParse(await readJson(UPSTREAM, response));
    if (!parsed.success) {
      throw externalError("Payment provider returned an unexpected response");
    }
    return parsed.data;
  };

  const findOrCreateCustomer = async (input: { email: string; name: string }) => {
    const existing = await request(customerListSchema, "/v1/customers", {
      method: "GET",
      query: { email: input.email, limit: "1" }
    });
    const [first] = existing.data;
    if (first) return first.id;
    const created = await request(customerSchema, "/v1/customers", {
      method: "POST",
      form: { email: input.email, name: input.name }
    });
    return created.id;
  };

  /** Subscription checkout for the configured price; returns the hosted page URL. */
  const createCheckout = async (input: { email: string; name: string; origin: string }) => {
    const { priceId } = credentials();
    const customerId = await findOrCreateCustomer(input);
    const session = await request(checkoutSessionSchema, "/v1/checkout/sessions", {
      method: "POST",
      form: {
        customer: customerId,
        mode: "subscription",
        "line_items[0][price]": priceId,
        "line_items[0][quantity]": "1",
        success_url: `${input.origin}/subscription/success?session_id={CHECKOUT_SESSION_ID}`,
        cancel_url: `${input.origin}/subscription/cancel`
      }
    });
    return { sessionId: session.id, url: session.url, customerId };
  };

  return { createCheckout, findOrCreateCustomer };
};

export type PaymentClient = ReturnType<typeof createPaymentClient>;
