import { test } from "node:test";
import assert from "node:assert/strict";
import { seedFamily } from "../testing/fixtures.js";
import { bearer, signToken, startTestApp } from "../testing/harness.js";

type FriendBody = { friendshipId: string; childId: string; name: string; presence: string };

test("a friend request is accepted by the addressee's parent", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const a = await seedFamily(db, "idp|parent-a", ["Ava"]);
    const b = await seedFamily(db, "idp|parent-b", ["Ben"]);
    const [ava] = a.children;
    const [ben] = b.children;
    assert.ok(ava && ben);
    const parentA = bearer(await signToken("idp|parent-a"));
    const parentB = bearer(await signToken("idp|parent-b"));

    const sent = await app.inject({
      method: "POST",
      url: "/v1/friends/requests",
      headers: parentA,
      payload: { requesterId: ava.id, addresseeId: ben.id }
    });
    assert.equal(sent.statusCode, 201);
    assert.equal(sent.json().status, "pending");
    const requestId: string = sent.json().id;

    const duplicate = await app.inject({
      method: "POST",
      url: "/v1/friends/requests",
      headers: parentB,
      payload: { requesterId: ben.id, addresseeId: ava.id }
    });
    assert.equal(duplicate.statusCode, 400);
    assert.equal(duplicate.json().error, "friend_edge_exists");

    const incoming = await app.inject({
      method: "GET",
      url: `/v1/friends/requests?childId=${ben.id}`,
      headers: parentB
    });
    assert.equal(incoming.statusCode, 200);
    assert.deepEqual(incoming.json().requests[0].requester, {
      childId: ava.id,
      name: "Ava",
      avatar: null
    });

    const wrongSide = await app.inject({
      method: "POST",
      url: `/v1/friends/requests/${requestId}/accept`,
      headers: parentA
    });
    assert.equal(wrongSide.statusCode, 404);

    const accepted = await app.inject({
      method: "POST",
      url: `/v1/friends/requests/${requestId}/accept`,
      headers: parentB
    });
    assert.equal(accepted.statusCode, 200);
    assert.equal(accepted.json().status, "accepted");

    const friends = await app.inject({
      method: "GET",
      url: `/v1/friends?childId=${ava.id}`,
      headers: parentA
    });
    const list: FriendBody[] = friends.json().friends;
    assert.deepEqual(
      list.map((entry) => [entry.friendshipId, entry.childId, entry.name, entry.presence]),
      [[requestId, ben.id, "Ben", "offline"]]
    );

    const removed = await app.inject({
      method: "DELETE",
      url: `/v1/friends/${ava.id}?friendChildId=${ben.id}`,
      headers: parentA
    });
    assert.equal(removed.statusCode, 204);
    const after = await app.inject({
      method: "GET",
      url: `/v1/friends?childId=${ben.id}`,
      headers: parentB
    });
    assert.deepEqual(after.json(), { friends: [] });
  } finally {
    await close();
  }
});

test("declining removes the request", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const a = await seedFamily(db, "idp|parent-a", ["Ava"]);
    const b = await seedFamily(db, "idp|parent-b", ["Ben"]);
    const [ava] = a.children;
    const [ben] = b.children;
    assert.ok(ava && ben);
    const parentA = bearer(await signToken("idp|parent-a"));
    const parentB = bearer(await signToken("idp|parent-b"));

    const sent = await app.inject({
      method: "POST",
      url: "/v1/friends/requests",
      headers: parentA,
      payload: { requesterId: ava.id, addresseeId: ben.id }
    });
    const declined = await app.inject({
      method: "POST",
      url: `/v1/friends/requests/${sent.json().id}/decline`,
      headers: parentB
    });
    assert.equal(declined.statusCode, 204);

    const incoming = await app.inject({
      method: "GET",
      url: `/v1/friends/requests?childId=${ben.id}`,
      headers: parentB
    });
    assert.deepEqual(incoming.json(), { requests: [] });
  } finally {
    await close();
  }
});

test("search leaves out the searcher and connected children", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const a = await seedFamily(db, "idp|parent-a", ["Sam"]);
    const b = await seedFamily(db, "idp|parent-b", ["Samira", "Samuel", "Tom"]);
    const [sam] = a.children;
    const [samira] = b.children;
    assert.ok(sam && samira);
    const parentA = bearer(await signToken("idp|parent-a"));

    await app.inject({
      method: "POST",
      url: "/v1/friends/requests",
      headers: parentA,
      payload: { requesterId: sam.id, addresseeId: samira.id }
    });

    const search = await app.inject({
      method: "GET",
      url: `/v1/friends/search?childId=${sam.id}&q=sam`,
      headers: parentA
    });
    assert.equal(search.statusCode, 200);
    assert.deepEqual(
      search.json().results.map((entry: { name: string }) => entry.name),
      ["Samuel"]
    );

    const blank = await app.inject({
      method: "GET",
      url: `/v1/friends/search?childId=${sam.id}&q=%20`,
      headers: parentA
    });
    assert.equal(blank.statusCode, 400);
    assert.equal(blank.json().error, "invalid_request");
  } finally {
    await close();
  }
});
