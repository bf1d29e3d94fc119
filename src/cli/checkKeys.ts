import path from "node:path";
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { createPgPool, queryTimeoutFor } from "../db/postgres";
import { ensureSchema } from "../db/schema";
import { checkKeys } from "../storage/admin";
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
    throw new Error("Missing --as=<uid>. Checking stored keys runs as a configured administrator.");
  }
  const fix = process.argv.includes("--fix");

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
    const audit = await withStorageSession(
      {
        backend,
        logger,
        stateDir: path.resolve(env.WARDEN_STATE_DIR),
        foundationEmailDomain: env.WARDEN_FOUNDATION_EMAIL_DOMAIN,
        adminUids: env.WARDEN_ADMIN_UIDS,
      },
      createPrincipal(uid, "operator"),
      (session) => checkKeys(session, { fix }),
      {
        // A plain check never writes.
        readOnly: !fix,
        onPublish: (outcomes) => {
          published = outcomes;
        },
      }
    );
    const keys = audit.keys.report();
    const keysFiles = settleKeysFiles(audit.keysFiles, published).report((artifact) => ({
      path: artifact.path,
      keyCount: artifact.keyCount,
    }));
    const clean = keys.failed === 0 && keysFiles.failed === 0 && (fix || audit.keys.warningCount === 0);
    process.stdout.write(`${JSON.stringify({ ok: clean, fix, keys, keysFiles }, null, 2)}\n`);
    process.exitCode = clean ? 0 : 1;
  } finally {
    await backend.close();
  }
}

void main().catch((error) => {
  process.stderr.write(`check-keys fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
