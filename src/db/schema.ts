import fs from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import type { Logger } from "../config/logger";
import { withRetry } from "../connectivity/retry";
import { withQueryTimeout } from "./postgres";

export const SCHEMA_FILE = path.join(__dirname, "..", "..", "schema", "warden.sql");

export async function readSchemaSql(file = SCHEMA_FILE): Promise<string> {
  return fs.readFile(file, "utf8");
}

export async function ensureSchema(pool: Pool, logger: Logger, queryTimeoutMs: number): Promise<void> {
  const sql = await readSchemaSql();
  await withRetry(
    "postgres_ensure_schema",
    async () => {
      await withQueryTimeout(queryTimeoutMs, "schema", () => pool.query(sql));
    },
    logger,
    { attempts: 3, baseDelayMs: 250 }
  );
  logger.info("warden_schema_ready", { file: path.basename(SCHEMA_FILE) });
}
