import { Pool } from "pg";
import type { WardenEnv } from "../config/env";
import type { Logger } from "../config/logger";
import { withRetry } from "../connectivity/retry";
import type { StorageHealth } from "../stores/interfaces";

export function queryTimeoutFor(env: Pick<WardenEnv, "WARDEN_PG_QUERY_TIMEOUT_MS">): number {
  return Math.max(500, env.WARDEN_PG_QUERY_TIMEOUT_MS);
}

export function withQueryTimeout<T>(timeoutMs: number, label: string, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`postgres ${label} query timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([task(), deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

export function createPgPool(env: WardenEnv): Pool {
  return new Pool({
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : false,
    max: env.WARDEN_PG_POOL_MAX,
    idleTimeoutMillis: env.WARDEN_PG_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: env.WARDEN_PG_CONNECTION_TIMEOUT_MS,
  });
}

export async function checkPgConnection(pool: Pool, logger: Logger, queryTimeoutMs: number): Promise<StorageHealth> {
  const startedAt = Date.now();
  try {
    await withRetry(
      "postgres_healthcheck",
      async () => {
        const result = await withQueryTimeout(queryTimeoutMs, "health", () =>
          pool.query<{ version: string }>("SELECT current_setting('server_version') AS version")
        );
        if (!result.rows[0]?.version) {
          throw new Error("invalid postgres result");
        }
      },
      logger,
      { attempts: 2, baseDelayMs: 100 }
    );
    return { ok: true, latencyMs: Date.now() - startedAt };
  } catch (error) {
    return {
      ok: false,
      latencyMs: Date.now() - startedAt,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
