import { test } from "node:test";
import assert from "node:assert/strict";
import { seedFamily } from "../testing/fixtures.js";
import {
  bearer,
  jsonResponse,
  signToken,
  startTestApp,
  type UpstreamRequest
} from "../testing/harness.js";

const paymentProvider = (existingCustomer: string | null) => (request: UpstreamRequest) => {
  const { pathname } = request.url;
  if (pathname === "/v1/customers" && request.method === "GET") {
    return jsonResponse({ data: existingCustomer ? [{ id: existingCustomer }] : [] });
  }
  if (pathname === "/v1/customers" && request.method === "POST") {
    return jsonResponse({ id: "cus_created" });
  }
  if (pathname === "/v1/checkout/sessions") {
    return jsonResponse({ id: "cs_test_1", url: "https://checkout.payments.test/cs_test_1" });
  }
  return undefined;
};

const formOf = (request: UpstreamRequest | undefined) =>
  new URLSearchParams(typeof request?.body === "string" ? request.body : "");

test("checkout creates the customer and returns the hosted page", async () => {
  const { app, db, calls, close } = await startTestApp({ upstream: paymentProvider(null) });
  try {
    await seedFamily(db, "idp|parent-1", []);
    const headers = bearer(await signToken("idp|parent-1"));

    const response = await app.inject({
      method: "POST",
      url: "/v1/billing/checkout",
      headers,
      payload: { name: "Pat" }
    });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { url: "https://checkout.payments.test/cs_test_1" });

    assert.deepEqual(
      calls.map((call) => `${call.method} ${call.url.pathname}`),
      ["GET /v1/customers", "POST /v1/customers", "POST /v1/checkout/sessions"]
    );
    assert.equal(calls[0]?.url.searchParams.get("email"), "idp-parent-1@example.test");
    assert.equal(calls[0]?.headers.get("authorization"), "Bearer test-secret");
    const form = formOf(calls[2]);
    assert.equal(form.get("customer"), "cus_created");
    assert.equal(form.get("mode"), "subscription");
    assert.equal(form.get("line_items[0][price]"), "price_test_voice");
    assert.equal(
      form.get("success_url"),
      "https://app.playroom.test/subscription/success?session_id={CHECKOUT_SESSION_ID}"
    );
    assert.equal(form.get("cancel_url"), "https://app.playroom.test/subscription/cancel");
  } finally {
    await close();
  }
});

test("checkout reuses a customer and honours the caller's origin", async () => {
  const { app, db, calls, close } = await startTestApp({
    upstream: paymentProvider("cus_existing")
  });
  try {
    await seedFamily(db, "idp|parent-1", []);
    const response = await app.inject({
      method: "POST",
      url: "/v1/billing/checkout",
      headers: {
        ...bearer(await signToken("idp|parent-1")),
        origin: "https://family.example.test"
      },
      payload: { email: "billing@example.test" }
    });
    assert.equal(response.statusCode, 200);
    assert.equal(calls.length, 2);
    assert.equal(calls[0]?.url.searchParams.get("email"), "billing@example.test");
    const form = formOf(calls[1]);
    assert.equal(form.get("customer"), "cus_existing");
    assert.equal(form.get("cancel_url"), "https://family.example.test/subscription/cancel");
  } finally {
    await close();
  }
});

test("checkout needs a parent profile and a real email address", async () => {
  const { app, calls, close } = await startTestApp({ upstream: paymentProvider(null) });
  try {
    const headers = bearer(await signToken("idp|parent-1"));
    const noParent = await app.inject({
      method: "POST",
      url: "/v1/billing/checkout",
      headers,
      payload: {}
    });
    assert.equal(noParent.statusCode, 404);

    await app.inject({ method: "POST", url: "/v1/profiles/parent", headers, payload: {} });
    const noEmail = await app.inject({
      method: "POST",
      url: "/v1/billing/checkout",
      headers,
      payload: {}
    });
    assert.equal(noEmail.statusCode, 400);
    assert.equal(noEmail.json().error, "invalid_request");
    assert.equal(calls.length, 0);
  } finally {
    await close();
  }
});

test("a provider rejection surfaces as an external error", async () => {
  const { app, db, close } = await startTestApp({
    upstream: () => jsonResponse({ error: { message: "card_declined" } }, 402)
  });
  try {
    await seedFamily(db, "idp|parent-1", []);
    const response = await app.inject({
      method: "POST",
      url: "/v1/billing/checkout",
      headers: bearer(await signToken("idp|parent-1")),
      payload: {}
    });
    assert.equal(response.statusCode, 502);
    assert.deepEqual(response.json(), {
      error: "external_error",
      message: "payment_provider rejected the request",
      details: "status 402"
    });
  } finally {
    await close();
  }
});

test("voice subscription is upserted, read and cancelled", async () => {
  const { app, db, close } = await startTestApp();
  try {
    await seedFamily(db, "idp|parent-1", []);
    const headers = bearer(await signToken("idp|parent-1"));

    const none = await app.inject({
      method: "GET",
      url: "/v1/billing/voice-subscription",
      headers
    });
    assert.equal(none.statusCode, 404);

    const created = await app.inject({
      method: "POST",
      url: "/v1/billing/voice-subscription",
      headers,
      payload: { status: "active", stripeCustomerId: "cus_1", stripeSubscriptionId: "sub_1" }
    });
    assert.equal(created.statusCode, 200);
    assert.equal(created.json().planType, "basic");

    const updated = await app.inject({
      method: "POST",
      url: "/v1/billing/voice-subscription",
      headers,
      payload: { status: "past_due" }
    });
    assert.equal(updated.json().id, created.json().id);
    assert.equal(updated.json().status, "past_due");
    assert.equal(updated.json().stripeSubscriptionId, "sub_1");

    const cancelled = await app.inject({
      method: "DELETE",
      url: "/v1/billing/voice-subscription",
      headers
    });
    assert.equal(cancelled.statusCode, 204);
    const current = await app.inject({
      method: "GET",
      url: "/v1/billing/voice-subscription",
      headers
    });
    assert.equal(current.json().status, "cancelled");
  } finally {
    await close();
  }
});
