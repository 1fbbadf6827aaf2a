import knex, { Knex } from "knex";
import { migrationSource } from "./migrationSource.js";

export type DbClient = Knex;
export type DbTransaction = Knex.Transaction;
export type DbDialect = "pg" | "better-sqlite3";

export { applyRowSecurityContext, readRowSecurityContext, ROW_SECURITY_SETTING } from "./rowSecurity.js";
export { dialectOf, isPostgres } from "./dialect.js";
export { isUniqueViolation } from "./errors.js";

export const createDb = (connectionString: string, options: { poolMax?: number } = {}) =>
  knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: options.poolMax ?? 10 }
  });

type SqliteConnection = { pragma: (source: string) => unknown };

// A single pooled connection keeps an in-memory database alive for the lifetime of the client.
export const createSqliteDb = (filename = ":memory:") =>
  knex({
    client: "better-sqlite3",
    connection: { filename },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      afterCreate: (
        connection: SqliteConnection,
        done: (error: Error | null, connection: SqliteConnection) => void
      ) => {
        connection.pragma("foreign_keys = ON");
        done(null, connection);
      }
    }
  });

export const runMigrations = async (db: DbClient) => {
  await db.migrate.latest({ migrationSource });
};

export const pingDb = async (db: DbClient) => {
  await db.raw("select 1");
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};
