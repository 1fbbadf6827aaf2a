import { test } from "node:test";
import assert from "node:assert/strict";
import { randomUUID } from "node:crypto";
import { seedFamily } from "../testing/fixtures.js";
import { bearer, signToken, startTestApp, type TestApp } from "../testing/harness.js";

const openRoom = async (app: TestApp["app"], db: TestApp["db"], subject: string, name: string) => {
  const family = await seedFamily(db, subject, [name]);
  const [child] = family.children;
  assert.ok(child);
  const headers = bearer(await signToken(subject));
  const created = await app.inject({
    method: "POST",
    url: "/v1/rooms",
    headers,
    payload: { hostChildId: child.id, gameId: "trivia", difficulty: "easy" }
  });
  assert.equal(created.statusCode, 201);
  const roomId: string = created.json().room.id;
  return { child, headers, roomId };
};

test("a room has one live session at a time and finished sessions are final", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const { headers, roomId } = await openRoom(app, db, "idp|host", "Hana");

    const started = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      headers,
      payload: { roomId, gameData: { round: 1, deck: ["a", "b"] } }
    });
    assert.equal(started.statusCode, 201);
    assert.equal(started.json().gameState, "active");
    assert.deepEqual(started.json().gameData, { round: 1, deck: ["a", "b"] });
    const sessionId: string = started.json().id;

    const second = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      headers,
      payload: { roomId }
    });
    assert.equal(second.statusCode, 400);
    assert.equal(second.json().error, "invalid_state");

    const paused = await app.inject({
      method: "PATCH",
      url: `/v1/sessions/${sessionId}`,
      headers,
      payload: { gameState: "paused", gameData: { round: 2 } }
    });
    assert.equal(paused.statusCode, 200);
    assert.equal(paused.json().gameState, "paused");
    assert.deepEqual(paused.json().gameData, { round: 2 });

    const finished = await app.inject({
      method: "PATCH",
      url: `/v1/sessions/${sessionId}`,
      headers,
      payload: { gameState: "finished" }
    });
    assert.equal(finished.json().gameState, "finished");

    const reopened = await app.inject({
      method: "PATCH",
      url: `/v1/sessions/${sessionId}`,
      headers,
      payload: { gameState: "active" }
    });
    assert.equal(reopened.statusCode, 400);
    assert.equal(reopened.json().error, "invalid_state");

    const next = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      headers,
      payload: { roomId }
    });
    assert.equal(next.statusCode, 201);
    assert.equal(next.json().gameData, null);

    const fetched = await app.inject({
      method: "GET",
      url: `/v1/sessions/${sessionId}`,
      headers
    });
    assert.equal(fetched.json().id, sessionId);

    const scalar = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      headers,
      payload: { roomId, gameData: "round-1" }
    });
    assert.equal(scalar.statusCode, 400);
    assert.equal(scalar.json().error, "invalid_request");
  } finally {
    await close();
  }
});

test("scores are appended and listed best first", async () => {
  const { app, db, close } = await startTestApp();
  try {
    const host = await openRoom(app, db, "idp|host", "Hana");
    const other = await openRoom(app, db, "idp|other", "Olly");

    const started = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      headers: host.headers,
      payload: { roomId: host.roomId }
    });
    const sessionId: string = started.json().id;

    const hana = await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: host.headers,
      payload: {
        roomId: host.roomId,
        sessionId,
        childId: host.child.id,
        playerName: "Hana",
        score: 7,
        totalQuestions: 10
      }
    });
    assert.equal(hana.statusCode, 201);
    assert.equal(hana.json().isAi, false);

    await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: host.headers,
      payload: {
        roomId: host.roomId,
        sessionId,
        playerName: "Alex the Explorer",
        isAi: true,
        score: 9,
        totalQuestions: 10
      }
    });

    const board = await app.inject({
      method: "GET",
      url: `/v1/sessions/room/${host.roomId}/scores`,
      headers: host.headers
    });
    assert.deepEqual(
      board.json().scores.map((entry: { playerName: string; score: number }) => [
        entry.playerName,
        entry.score
      ]),
      [
        ["Alex the Explorer", 9],
        ["Hana", 7]
      ]
    );

    const mismatched = await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: other.headers,
      payload: {
        roomId: other.roomId,
        sessionId,
        playerName: "Olly",
        score: 1,
        totalQuestions: 10
      }
    });
    assert.equal(mismatched.statusCode, 400);
    assert.equal(mismatched.json().error, "invalid_request");

    const missingRoom = await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: host.headers,
      payload: { roomId: randomUUID(), playerName: "Hana", score: 1, totalQuestions: 1 }
    });
    assert.equal(missingRoom.statusCode, 404);

    const missingChild = await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: host.headers,
      payload: {
        roomId: host.roomId,
        childId: randomUUID(),
        playerName: "Ghost",
        score: 1,
        totalQuestions: 2
      }
    });
    assert.equal(missingChild.statusCode, 404);
    assert.equal(missingChild.json().error, "not_found");

    const oversized = await app.inject({
      method: "POST",
      url: "/v1/sessions/scores",
      headers: host.headers,
      payload: {
        roomId: host.roomId,
        playerName: "Hana",
        score: 2_147_483_648,
        totalQuestions: 10
      }
    });
    assert.equal(oversized.statusCode, 400);
    assert.equal(oversized.json().error, "invalid_request");
  } finally {
    await close();
  }
});
