import fs from "fs";
import path from "path";
import { Kysely, PostgresDialect } from "kysely";
import { newDb } from "pg-mem";
import type { DB } from "../../src/types/db";

const schemaSql = fs.readFileSync(
  path.join(__dirname, "../../src/db/schema.sql"),
  "utf8"
);

export interface TestDatabase {
  db: Kysely<DB>;
  /** SQL of every statement sent since the last `clearQueries()` */
  queries: string[];
  clearQueries(): void;
  close(): Promise<void>;
}

/**
 * Fresh in-process PostgreSQL (pg-mem) with the application schema, reached
 * through the same Kysely dialect the app uses.
 */
export function createTestDb(): TestDatabase {
  const mem = newDb();
  mem.public.none(schemaSql);
  const { Pool } = mem.adapters.createPg();

  const queries: string[] = [];
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({ pool: new Pool() }),
    log(event) {
      if (event.level === "query") {
        queries.push(event.query.sql);
      }
    },
  });

  return {
    db,
    queries,
    clearQueries: () => {
      queries.length = 0;
    },
    close: () => db.destroy(),
  };
}
