import fs from "node:fs/promises";
import type { Logger } from "../config/logger";
import type { StorageHealth } from "../stores/interfaces";

export type DependencyCheck = {
  label: string;
  enabled: boolean;
  run: () => Promise<StorageHealth>;
};

export type DependencyStatus = {
  name: string;
  status: "ok" | "degraded" | "error" | "disabled";
  latencyMs: number | null;
  error?: string;
};

export type DependencyHealthReport = {
  at: string;
  ok: boolean;
  checks: DependencyStatus[];
};

/** The KEYS files are staged and renamed inside the state directory, so it must be writable. */
export async function checkStateDir(dir: string): Promise<StorageHealth> {
  const startedAt = Date.now();
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      return { ok: false, latencyMs: Date.now() - startedAt, error: `${dir} is not a directory` };
    }
    await fs.access(dir, fs.constants.W_OK);
    return { ok: true, latencyMs: Date.now() - startedAt };
  } catch (error) {
    return { ok: false, latencyMs: Date.now() - startedAt, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function collectDependencyHealth(
  checks: DependencyCheck[],
  logger?: Logger,
  now: () => Date = () => new Date()
): Promise<DependencyHealthReport> {
  const results = await Promise.all(
    checks.map(async ({ label, enabled, run }): Promise<DependencyStatus> => {
      if (!enabled) {
        return { name: label, status: "disabled", latencyMs: null };
      }
      const startedAt = Date.now();
      try {
        const health = await run();
        return health.ok
          ? { name: label, status: "ok", latencyMs: health.latencyMs }
          : { name: label, status: "degraded", latencyMs: health.latencyMs, error: health.error };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.warn("warden_dependency_healthcheck_failed", { check: label, message });
        return { name: label, status: "error", latencyMs: Date.now() - startedAt, error: message };
      }
    })
  );

  const ok = results.every((result) => result.status === "ok" || result.status === "disabled");
  return { at: now().toISOString(), ok, checks: results };
}

export function renderHealthTable(report: DependencyHealthReport): string {
  const nameWidth = Math.max(...report.checks.map((entry) => entry.name.length), "dependency".length);
  const header = ["dependency".padEnd(nameWidth), "status".padEnd(8), "latency(ms)".padEnd(11), "error"];
  const rule = ["-".repeat(nameWidth), "-".repeat(8), "-".repeat(11), "-".repeat(5)];
  const body = report.checks.map((entry) => [
    entry.name.padEnd(nameWidth),
    entry.status.padEnd(8),
    String(entry.latencyMs ?? "").padEnd(11),
    entry.error ?? "",
  ]);
  const lines = [header, rule, ...body].map((columns) => columns.join(" | ").trimEnd());
  return `Dependency health\n${lines.join("\n")}\n`;
}
