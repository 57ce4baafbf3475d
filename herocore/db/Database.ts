// herocore/db/Database.ts
// Postgres connection layer for progression persistence.
//
// The pool is created on first use so importing this module (e.g. from
// tests that only use the in-memory store) never opens a socket.

import { Pool } from "pg";
import "../config/config";
import { Logger } from "../utils/logger";
import type { SqlPool } from "./PostgresProgressionStore";

const log = Logger.scope("DB");

let pool: Pool | null = null;

/**
 * Shared Postgres pool.
 *
 * Env: HC_DB_HOST, HC_DB_PORT, HC_DB_USER, HC_DB_PASS, HC_DB_NAME,
 * HC_DB_POOL_SIZE (default 10).
 */
export function getPool(): Pool {
  if (pool) return pool;

  pool = new Pool({
    host: process.env.HC_DB_HOST,
    port: parseInt(process.env.HC_DB_PORT || "5432", 10),
    user: process.env.HC_DB_USER,
    password: process.env.HC_DB_PASS,
    database: process.env.HC_DB_NAME,
    max: parseInt(process.env.HC_DB_POOL_SIZE || "10", 10),
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Errors on idle clients; the pool itself stays usable.
  pool.on("error", (err: Error) => {
    log.error("Postgres pool error", { err });
  });

  return pool;
}

/** Narrow a pg Pool to the SqlPool surface the progression store uses. */
export function sqlPool(p: Pool = getPool()): SqlPool {
  return {
    query: (text, values) => p.query(text, values),
    connect: async () => {
      const client = await p.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    // ending the shared pool also forgets it, so getPool() starts fresh
    end: () => (p === pool ? closePool() : p.end()),
  };
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}

/** Startup smoke test; logs the outcome and reports it instead of throwing. */
export async function testDbConnection(): Promise<boolean> {
  try {
    await getPool().query("SELECT 1 AS ok");
    log.success("Postgres connected");
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}
