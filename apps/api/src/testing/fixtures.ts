import { randomUUID } from "node:crypto";
import { createSqliteDb, runMigrations, type DbClient } from "@playroom/db";
import { nowIso, type ChildRow, type ParentRow } from "../records.js";

export const createTestDb = async () => {
  const db = createSqliteDb();
  await runMigrations(db);
  return db;
};

export const seedParent = async (db: DbClient, subject: string) => {
  const now = nowIso();
  const row: ParentRow = {
    id: randomUUID(),
    subject,
    email: `${subject.replace(/\W/g, "-")}@example.test`,
    name: null,
    created_at: now,
    updated_at: now
  };
  await db<ParentRow>("parent_profiles").insert(row);
  return row;
};

export const seedChild = async (
  db: DbClient,
  parentId: string,
  name: string,
  overrides: Partial<ChildRow> = {}
) => {
  const now = nowIso();
  const row: ChildRow = {
    id: randomUUID(),
    parent_id: parentId,
    name,
    age_group: "8-10",
    avatar: null,
    voice_clone_enabled: false,
    voice_clone_id: null,
    is_online: false,
    last_seen_at: null,
    room_id: null,
    created_at: now,
    updated_at: now,
    ...overrides
  };
  await db<ChildRow>("child_profiles").insert(row);
  return row;
};

/** One parent with the named children, as seen by `subject`. */
export const seedFamily = async (db: DbClient, subject: string, names: string[]) => {
  const parent = await seedParent(db, subject);
  const children: ChildRow[] = [];
  for (const name of names) {
    children.push(await seedChild(db, parent.id, name));
  }
  return { parent, children };
};
