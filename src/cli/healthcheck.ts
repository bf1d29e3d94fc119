import path from "node:path";
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { checkPgConnection, createPgPool, queryTimeoutFor } from "../db/postgres";
import { checkStateDir, collectDependencyHealth, renderHealthTable } from "../connectivity/healthcheck";

function arg(name: string, fallback: string | undefined = undefined): string | undefined {
  const prefix = `--${name}=`;
  const exact = process.argv.find((entry) => entry === `--${name}`);
  if (exact === `--${name}`) return "";
  const prefixed = process.argv.find((entry) => entry.startsWith(prefix));
  if (!prefixed) return fallback;
  return prefixed.slice(prefix.length);
}

async function run(): Promise<void> {
  const outputMode = arg("output", "table") === "json" ? "json" : "table";
  const env = readEnv();
  const logger = createLogger(env.WARDEN_LOG_LEVEL);

  const report = await collectDependencyHealth(
    [
      {
        label: "postgres",
        enabled: true,
        run: async () => {
          const pool = createPgPool(env);
          try {
            return await checkPgConnection(pool, logger, queryTimeoutFor(env));
          } finally {
            await pool.end();
          }
        },
      },
      {
        label: "state_dir",
        enabled: true,
        run: () => checkStateDir(path.resolve(env.WARDEN_STATE_DIR)),
      },
    ],
    logger
  );

  if (outputMode === "json") {
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } else {
    process.stdout.write(renderHealthTable(report));
  }

  process.exitCode = report.ok ? 0 : 1;
}

void run().catch((error) => {
  process.stderr.write(`healthcheck failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
