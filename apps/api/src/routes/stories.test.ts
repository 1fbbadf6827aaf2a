import { test } from "node:test";
import assert from "node:assert/strict";
import { seedFamily } from "../testing/fixtures.js";
import { bearer, signToken, startTestApp } from "../testing/harness.js";

test("stories are saved, listed newest first and deleted per child", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const family = await seedFamily(db, "idp|parent-1", ["Mia"]);
    const [mia] = family.children;
    assert.ok(mia);
    const headers = bearer(await signToken("idp|parent-1"));

    const first = await app.inject({
      method: "POST",
      url: "/v1/stories",
      headers,
      payload: { childId: mia.id, title: "The Brave Fox", content: "Once upon a time..." }
    });
    assert.equal(first.statusCode, 201);
    assert.equal(first.json().prompt, null);
    assert.equal(first.json().audioUrl, null);

    await db("generated_stories")
      .where({ id: first.json().id })
      .update({ created_at: "2020-01-01T00:00:00.000Z" });

    const second = await app.inject({
      method: "POST",
      url: "/v1/stories",
      headers,
      payload: {
        childId: mia.id,
        title: "The Sleepy Moon",
        content: "The moon yawned.",
        prompt: "a bedtime story about the moon"
      }
    });
    assert.equal(second.statusCode, 201);

    const listed = await app.inject({
      method: "GET",
      url: `/v1/stories?childId=${mia.id}`,
      headers
    });
    assert.deepEqual(
      listed.json().stories.map((story: { title: string }) => story.title),
      ["The Sleepy Moon", "The Brave Fox"]
    );

    const fetched = await app.inject({
      method: "GET",
      url: `/v1/stories/${second.json().id}`,
      headers
    });
    assert.equal(fetched.json().prompt, "a bedtime story about the moon");

    const deleted = await app.inject({
      method: "DELETE",
      url: `/v1/stories/${first.json().id}`,
      headers
    });
    assert.equal(deleted.statusCode, 204);
    const gone = await app.inject({
      method: "GET",
      url: `/v1/stories/${first.json().id}`,
      headers
    });
    assert.equal(gone.statusCode, 404);
  } finally {
    await close();
  }
});

test("another family's stories read as missing", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const family = await seedFamily(db, "idp|parent-1", ["Mia"]);
    await seedFamily(db, "idp|parent-2", ["Leo"]);
    const [mia] = family.children;
    assert.ok(mia);
    const owner = bearer(await signToken("idp|parent-1"));
    const stranger = bearer(await signToken("idp|parent-2"));

    const story = await app.inject({
      method: "POST",
      url: "/v1/stories",
      headers: owner,
      payload: { childId: mia.id, title: "Secret", content: "Shh." }
    });

    const peek = await app.inject({
      method: "GET",
      url: `/v1/stories/${story.json().id}`,
      headers: stranger
    });
    assert.equal(peek.statusCode, 404);

    const list = await app.inject({
      method: "GET",
      url: `/v1/stories?childId=${mia.id}`,
      headers: stranger
    });
    assert.equal(list.statusCode, 404);

    const remove = await app.inject({
      method: "DELETE",
      url: `/v1/stories/${story.json().id}`,
      headers: stranger
    });
    assert.equal(remove.statusCode, 404);

    const write = await app.inject({
      method: "POST",
      url: "/v1/stories",
      headers: stranger,
      payload: { childId: mia.id, title: "Nope", content: "Nope." }
    });
    assert.equal(write.statusCode, 404);
  } finally {
    await close();
  }
});
