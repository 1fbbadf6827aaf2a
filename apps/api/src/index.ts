import { runMigrations } from "@playroom/db";
import { config } from "./config.js";
import { getDb } from "./db.js";
import { log } from "./log.js";
import { buildServer } from "./server.js";

const db = await getDb();
if (config.AUTO_MIGRATE) {
  await runMigrations(db);
  log.info("migrations.applied");
}
const app = buildServer();

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address });
  })
  .catch((error) => {
    log.error("failed to start", { error });
    process.exit(1);
  });
