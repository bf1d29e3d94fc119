import path from "node:path";
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { createPgPool, queryTimeoutFor } from "../db/postgres";
import { ensureSchema } from "../db/schema";
import { regenerateAllKeysFiles } from "../storage/admin";
import { Outcomes } from "../storage/outcome";
import { withStorageSession } from "../storage/session";
import { settleKeysFiles } from "../storage/settle";
import { PostgresStorageBackend } from "../stores/postgresStores";
import { createPrincipal } from "../types/core";

function arg(name: string, fallback?: string): string | undefined {
  const prefix = `--${name}=`;
  const row = process.argv.find((entry) => entry.startsWith(prefix));
  if (!row) return fallback;
  return row.slice(prefix.length);
}

async function main(): Promise<void> {
  const uid = arg("as")?.trim();
  if (!uid) {
    throw new Error("Missing --as=<uid>. Regenerating every KEYS file runs as a configured administrator.");
  }

  const env = readEnv();
  if (!env.WARDEN_ADMIN_UIDS.includes(uid)) {
    throw new Error(`${uid} is not listed in WARDEN_ADMIN_UIDS.`);
  }

  const logger = createLogger(env.WARDEN_LOG_LEVEL);
  const queryTimeoutMs = queryTimeoutFor(env);
  const pool = createPgPool(env);
  const backend = new PostgresStorageBackend(pool, logger, queryTimeoutMs);

  try {
    await ensureSchema(pool, logger, queryTimeoutMs);
    let published = new Outcomes<string>();
    const regenerated = await withStorageSession(
      {
        backend,
        logger,
        stateDir: path.resolve(env.WARDEN_STATE_DIR),
        foundationEmailDomain: env.WARDEN_FOUNDATION_EMAIL_DOMAIN,
        adminUids: env.WARDEN_ADMIN_UIDS,
      },
      createPrincipal(uid, "operator"),
      (session) => regenerateAllKeysFiles(session),
      {
        onPublish: (outcomes) => {
          published = outcomes;
        },
      }
    );
    const report = settleKeysFiles(regenerated, published).report((artifact) => ({ path: artifact.path, keyCount: artifact.keyCount }));
    process.stdout.write(`${JSON.stringify({ ok: report.failed === 0, ...report }, null, 2)}\n`);
    process.exitCode = report.failed === 0 ? 0 : 1;
  } finally {
    await backend.close();
  }
}

void main().catch((error) => {
  process.stderr.write(`regenerate-keys fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
