import { Pool } from "pg";
import type { Env } from "./env";
import { errorCode } from "../utils";

export function createPool(env: Env): Pool {
  const pool = env.DATABASE_URL
    ? new Pool({ connectionString: env.DATABASE_URL, max: env.PG_POOL_MAX })
    : new Pool({
        host: env.PGHOST,
        port: env.PGPORT,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        max: env.PG_POOL_MAX,
        ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", { code: errorCode(error) ?? null });
  });

  return pool;
}
