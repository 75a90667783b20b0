import { Kysely, PostgresDialect } from "kysely";
import { Pool, types } from "pg";
import type { DB } from "../types/db";
import { env } from "../config/env";
import { queryLogger } from "../utils/logger";

// NUMERIC arrives as a string by default; prices and amounts are plain numbers here
const NUMERIC_OID = 1700;
types.setTypeParser(NUMERIC_OID, (value: string) => parseFloat(value));

let poolInstance: Pool | undefined;
let clientInstance: Kysely<DB> | undefined;

const createPool = () => {
  return new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_MAX,
    idleTimeoutMillis: env.DB_IDLE_TIMEOUT_MS,
  });
};

const getPoolInstance = () => {
  if (!poolInstance) {
    poolInstance = createPool();
  }
  return poolInstance;
};

const dialect = new PostgresDialect({
  pool: async () => getPoolInstance(),
});

export function getSQLClient() {
  if (!clientInstance) {
    clientInstance = new Kysely<DB>({
      dialect,
      log(event) {
        if (event.level === "error") {
          queryLogger.error(
            { err: event.error, sql: event.query.sql },
            "Query failed"
          );
        }
      },
    });
  }
  return clientInstance;
}

export async function closeSQLClient() {
  if (clientInstance) {
    await clientInstance.destroy();
    clientInstance = undefined;
    poolInstance = undefined;
  }
}
