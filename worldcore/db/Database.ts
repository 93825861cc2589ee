// worldcore/db/Database.ts
// Postgres connection layer for the arena server.
//
// Exposes a configured pg Pool (db) and a startup connectivity check.
// Nothing connects at import time; the pool opens sockets on first query.
// DB-backed stores import this module lazily so tests never load it.

import { Pool } from "pg";
import dotenv from "dotenv";
import { Logger } from "../utils/logger";

dotenv.config();

const log = Logger.scope("DB");

/**
 * Shared Postgres pool.
 *
 * Env:
 *   ARENA_DB_URL (takes precedence), or
 *   ARENA_DB_HOST, ARENA_DB_PORT, ARENA_DB_USER, ARENA_DB_PASS, ARENA_DB_NAME
 *   ARENA_DB_POOL_SIZE (default 10)
 */
export const db = new Pool(
  process.env.ARENA_DB_URL
    ? {
        connectionString: process.env.ARENA_DB_URL,
        max: parseInt(process.env.ARENA_DB_POOL_SIZE || "10", 10),
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
      }
    : {
        host: process.env.ARENA_DB_HOST,
        port: parseInt(process.env.ARENA_DB_PORT || "5432", 10),
        user: process.env.ARENA_DB_USER,
        password: process.env.ARENA_DB_PASS,
        database: process.env.ARENA_DB_NAME,
        max: parseInt(process.env.ARENA_DB_POOL_SIZE || "10", 10),
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
      },
);

// Errors on idle clients; the pool stays usable.
db.on("error", (err: Error) => {
  log.error("Postgres pool error", { err });
});

/** SELECT 1 smoke test. Logs and returns false instead of throwing. */
export async function testDbConnection(): Promise<boolean> {
  try {
    const r = await db.query<{ ok: number }>("SELECT 1 AS ok");
    log.success("Postgres connected", { ok: r.rows[0]?.ok });
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}
