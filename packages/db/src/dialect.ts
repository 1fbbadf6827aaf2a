import type { Knex } from "knex";

type ClientConfig = { client?: unknown };

// Transactions share the parent's client config, so this works for both `db` and `trx`.
export const dialectOf = (db: Knex): "pg" | "better-sqlite3" => {
  const config: ClientConfig = db.client.config;
  return config.client === "better-sqlite3" ? "better-sqlite3" : "pg";
};

export const isPostgres = (db: Knex) => dialectOf(db) === "pg";
