import {
  applyRowSecurityContext,
  createDb,
  pingDb,
  type DbClient,
  type DbTransaction
} from "@playroom/db";
import { config } from "./config.js";

let db: DbClient | null = null;

export const getDb = async (): Promise<DbClient> => {
  if (!db) {
    db = createDb(config.DATABASE_URL, { poolMax: config.DB_POOL_MAX });
  }
  return db;
};

/**
 * Runs `work` inside one transaction bound to `subject`. The row-security context is
 * applied before any statement of `work`; a throw rolls the whole unit back.
 * Inside `work` only `trx` may be used.
 */
export const withUnitOfWork = async <T>(
  subject: string,
  work: (trx: DbTransaction) => Promise<T>
): Promise<T> => {
  const client = await getDb();
  return client.transaction(async (trx) => {
    await applyRowSecurityContext(trx, subject);
    return work(trx);
  });
};

export const checkDbReady = async () => {
  const client = await getDb();
  await pingDb(client);
};

export const __test__ = {
  setDb: (client: DbClient | null) => {
    db = client;
  }
};
