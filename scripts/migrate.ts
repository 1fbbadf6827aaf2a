import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closeDb, createDb, runMigrations } from "@playroom/db";
import { createLogger } from "@playroom/shared";

const log = createLogger("migrate");
const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

dotenv.config({ path: path.join(repoRoot, ".env") });

const databaseUrl = process.env.MIGRATIONS_DATABASE_URL ?? process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error("missing_required_envs:MIGRATIONS_DATABASE_URL|DATABASE_URL");
}
if (process.env.NODE_ENV === "production" && !process.env.MIGRATIONS_DATABASE_URL) {
  throw new Error("migrations_database_url_required_in_production");
}

const run = async () => {
  const db = createDb(databaseUrl);
  try {
    await runMigrations(db);
    log.info("migrations.complete");
  } finally {
    await closeDb(db);
  }
};

run().catch((error) => {
  log.error("migrations.failed", { error });
  process.exit(1);
});
