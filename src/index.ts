import fs from "node:fs/promises";
import path from "node:path";
import { readEnv, redactEnvForLogs } from "./config/env";
import { createLogger } from "./config/logger";
import { createPgPool, queryTimeoutFor } from "./db/postgres";
import { ensureSchema } from "./db/schema";
import { startHttpServer } from "./http/server";
import { createFirebaseIdentityVerifier } from "./auth/identity";
import { createSigningSecret, TokenService } from "./auth/tokens";
import { PostgresStorageBackend } from "./stores/postgresStores";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.WARDEN_LOG_LEVEL);
  const stateDir = path.resolve(env.WARDEN_STATE_DIR);

  logger.info("warden_boot", {
    stateDir,
    adminCount: env.WARDEN_ADMIN_UIDS.length,
    env: redactEnvForLogs(env),
  });

  await fs.mkdir(stateDir, { recursive: true });

  const queryTimeoutMs = queryTimeoutFor(env);
  const pool = createPgPool(env);
  pool.on("error", (error) => {
    logger.error("warden_pg_pool_error", { message: error.message });
  });
  await ensureSchema(pool, logger, queryTimeoutMs);

  const backend = new PostgresStorageBackend(pool, logger, queryTimeoutMs);
  // Held in memory only: a restart invalidates every outstanding session token.
  const secret = createSigningSecret();
  const tokens = new TokenService({ secret, pats: backend, logger });

  const server = startHttpServer({
    host: env.WARDEN_HOST,
    port: env.WARDEN_PORT,
    logger,
    storage: {
      backend,
      logger,
      stateDir,
      foundationEmailDomain: env.WARDEN_FOUNDATION_EMAIL_DOMAIN,
      adminUids: env.WARDEN_ADMIN_UIDS,
      onWrite: (event) => {
        logger.info("warden_write", {
          action: event.action,
          subject: event.subject,
          uid: event.principal,
          level: event.level,
          committee: event.committee,
        });
      },
    },
    tokens,
    verifyIdentity: createFirebaseIdentityVerifier({ projectId: env.FIREBASE_PROJECT_ID }),
    allowedOrigins: env.WARDEN_ALLOWED_ORIGINS,
  });

  let shuttingDown = false;

  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("warden_shutdown_start", { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await backend.close();
    logger.info("warden_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("warden_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("warden_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`release-warden fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
