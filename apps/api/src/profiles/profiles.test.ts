import { test } from "node:test";
import assert from "node:assert/strict";
import { closeDb } from "@playroom/db";
import { isApiError } from "@playroom/shared";
import { createTestDb, seedFamily } from "../testing/fixtures.js";
import {
  createChild,
  createOrFetchParent,
  listChildren,
  placeholderEmail,
  updateChild,
  updateChildStatus
} from "./profiles.js";

test("create-or-fetch parent is idempotent per subject", async () => {
  const db = await createTestDb();
  try {
    const caller = { subject: "idp|parent-1", email: "parent@example.test" };
    const first = await db.transaction((trx) => createOrFetchParent(trx, caller, { name: "Pat" }));
    const second = await db.transaction((trx) =>
      createOrFetchParent(trx, caller, { name: "Someone Else" })
    );
    assert.equal(first.created, true);
    assert.equal(second.created, false);
    assert.equal(second.profile.id, first.profile.id);
    assert.equal(second.profile.name, "Pat");
    const rows = await db("parent_profiles").where({ subject: "idp|parent-1" }).count({ n: "*" });
    assert.equal(Number(rows[0]?.n), 1);
  } finally {
    await closeDb(db);
  }
});

test("parent without an email claim gets a placeholder address", async () => {
  const db = await createTestDb();
  try {
    const { profile } = await db.transaction((trx) =>
      createOrFetchParent(trx, { subject: "idp|no-mail", email: null }, {})
    );
    assert.equal(profile.email, "idp_no-mail@users.invalid");
    assert.equal(placeholderEmail("plain"), "plain@users.invalid");
  } finally {
    await closeDb(db);
  }
});

test("child creation requires a parent profile", async () => {
  const db = await createTestDb();
  try {
    await assert.rejects(
      db.transaction((trx) => createChild(trx, "idp|nobody", { name: "Kim", ageGroup: "5-7" })),
      (error: unknown) => isApiError(error) && error.statusCode === 404
    );
  } finally {
    await closeDb(db);
  }
});

test("listing children of a parent with none is an empty list", async () => {
  const db = await createTestDb();
  try {
    await seedFamily(db, "idp|empty", []);
    const children = await db.transaction((trx) => listChildren(trx, "idp|empty"));
    assert.deepEqual(children, []);
  } finally {
    await closeDb(db);
  }
});

test("child update only touches the fields it is given", async () => {
  const db = await createTestDb();
  try {
    await seedFamily(db, "idp|patch", []);
    const created = await db.transaction((trx) =>
      createChild(trx, "idp|patch", { name: "Robin", ageGroup: "5-7", avatar: "🦊" })
    );
    const renamed = await db.transaction((trx) =>
      updateChild(trx, "idp|patch", created.id, { name: "Robyn" })
    );
    assert.equal(renamed.name, "Robyn");
    assert.equal(renamed.ageGroup, "5-7");
    assert.equal(renamed.avatar, "🦊");

    const cleared = await db.transaction((trx) =>
      updateChild(trx, "idp|patch", created.id, { avatar: null, voiceCloneEnabled: true })
    );
    assert.equal(cleared.avatar, null);
    assert.equal(cleared.voiceCloneEnabled, true);
    assert.equal(cleared.name, "Robyn");
  } finally {
    await closeDb(db);
  }
});

test("status update stamps last seen even with no fields", async () => {
  const db = await createTestDb();
  try {
    const { children } = await seedFamily(db, "idp|status", ["Sam"]);
    const [sam] = children;
    assert.ok(sam);
    assert.equal(sam.last_seen_at, null);
    const touched = await db.transaction((trx) => updateChildStatus(trx, "idp|status", sam.id, {}));
    assert.equal(touched.isOnline, false);
    assert.ok(touched.lastSeenAt);
    const online = await db.transaction((trx) =>
      updateChildStatus(trx, "idp|status", sam.id, { isOnline: true })
    );
    assert.equal(online.isOnline, true);
  } finally {
    await closeDb(db);
  }
});

test("a child under another parent reads as missing", async () => {
  const db = await createTestDb();
  try {
    const { children } = await seedFamily(db, "idp|owner", ["Alex"]);
    await seedFamily(db, "idp|stranger", []);
    const [alex] = children;
    assert.ok(alex);
    await assert.rejects(
      db.transaction((trx) => updateChild(trx, "idp|stranger", alex.id, { name: "Taken" })),
      (error: unknown) => isApiError(error) && error.statusCode === 404
    );
  } finally {
    await closeDb(db);
  }
});
