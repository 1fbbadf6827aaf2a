import { Knex } from "knex";
import { isPostgres } from "../src/dialect.js";
import { ROW_SECURITY_SETTING } from "../src/rowSecurity.js";

const currentSubject = `nullif(current_setting('${ROW_SECURITY_SETTING}', true), '')`;
const ownParentIds = `select id from parent_profiles where subject = ${currentSubject}`;
const ownChildIds = `select id from child_profiles where parent_id in (${ownParentIds})`;

// Rows only the owning account may see or change.
const ownedPolicies: Array<[table: string, predicate: string]> = [
  ["parent_profiles", `subject = ${currentSubject}`],
  ["voice_subscriptions", `parent_id in (${ownParentIds})`],
  ["generated_stories", `child_id in (${ownChildIds})`]
];

// Shared play surfaces: any authenticated subject takes part (search, invitations, joins).
const sharedTables = [
  "child_profiles",
  "friends",
  "game_rooms",
  "room_participants",
  "join_requests",
  "game_sessions",
  "game_scores"
];

export async function up(knex: Knex): Promise<void> {
  if (!isPostgres(knex)) return;
  for (const [table, predicate] of ownedPolicies) {
    await knex.raw(`alter table ?? enable row level security`, [table]);
    await knex.raw(
      `create policy ${table}_owner on ?? using (${predicate}) with check (${predicate})`,
      [table]
    );
  }
  for (const table of sharedTables) {
    await knex.raw(`alter table ?? enable row level security`, [table]);
    await knex.raw(
      `create policy ${table}_authenticated on ?? using (${currentSubject} is not null) with check (${currentSubject} is not null)`,
      [table]
    );
  }
}

export async function down(knex: Knex): Promise<void> {
  if (!isPostgres(knex)) return;
  for (const [table] of ownedPolicies) {
    await knex.raw(`drop policy if exists ${table}_owner on ??`, [table]);
    await knex.raw(`alter table ?? disable row level security`, [table]);
  }
  for (const table of sharedTables) {
    await knex.raw(`drop policy if exists ${table}_authenticated on ??`, [table]);
    await knex.raw(`alter table ?? disable row level security`, [table]);
  }
}
