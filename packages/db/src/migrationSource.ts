import type { Knex } from "knex";
import * as coreSchema from "../migrations/001_core_schema.js";
import * as rowLevelSecurity from "../migrations/002_row_level_security.js";

type Migration = {
  up: (knex: Knex) => Promise<void>;
  down: (knex: Knex) => Promise<void>;
};

// Listed statically so the same set runs from TypeScript sources, the build output and tests.
const migrations: Array<[string, Migration]> = [
  ["001_core_schema", coreSchema],
  ["002_row_level_security", rowLevelSecurity]
];

export const migrationSource: Knex.MigrationSource<string> = {
  getMigrations: async () => migrations.map(([name]) => name),
  getMigrationName: (name) => name,
  getMigration: async (name) => {
    const entry = migrations.find(([migrationName]) => migrationName === name);
    if (!entry) {
      throw new Error(`migration_not_found:${name}`);
    }
    return entry[1];
  }
};
