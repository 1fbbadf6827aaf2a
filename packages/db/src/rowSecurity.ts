import type { Knex } from "knex";
import { isPostgres } from "./dialect.js";

export const ROW_SECURITY_SETTING = "app.current_subject";

const SQLITE_CONTEXT_TABLE = "row_security_context";

/**
 * Binds the authenticated subject to the current transaction so row-level security
 * policies can filter on it. Postgres keeps it as a transaction-local setting;
 * SQLite has no session variables, so the subject lives in a connection-scoped temp table.
 */
export const applyRowSecurityContext = async (trx: Knex.Transaction, subject: string) => {
  if (isPostgres(trx)) {
    await trx.raw("select set_config(?, ?, true)", [ROW_SECURITY_SETTING, subject]);
    return;
  }
  await trx.raw(
    `create temp table if not exists ${SQLITE_CONTEXT_TABLE} (slot integer primary key, subject text not null)`
  );
  await trx.raw(`insert or replace into ${SQLITE_CONTEXT_TABLE} (slot, subject) values (1, ?)`, [
    subject
  ]);
};

type ContextRow = { subject: string | null };

export const readRowSecurityContext = async (trx: Knex.Transaction): Promise<string | null> => {
  if (isPostgres(trx)) {
    const result: { rows?: ContextRow[] } = await trx.raw(
      "select nullif(current_setting(?, true), '') as subject",
      [ROW_SECURITY_SETTING]
    );
    return result.rows?.[0]?.subject ?? null;
  }
  const rows: ContextRow[] = await trx.raw(
    `select subject from ${SQLITE_CONTEXT_TABLE} where slot = 1`
  );
  return rows[0]?.subject ?? null;
};
