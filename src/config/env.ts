import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const PLACEHOLDER_MATCHERS = [
  /change-?me/i,
  /placeholder/i,
  /replace[_-]?with/i,
  /^\s*<.*>\s*$/,
  /\$\{[^}]+\}/,
];

const RUNTIME_ENFORCED_SENSITIVE_VARS = new Set(["PGPASSWORD"]);

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const CsvFromString = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  )
  .pipe(z.array(z.string()));

const EnvSchema = z.object({
  WARDEN_PORT: z.coerce.number().int().min(1).max(65535).default(8790),
  WARDEN_HOST: requiredString("WARDEN_HOST").default("127.0.0.1"),
  WARDEN_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  WARDEN_ALLOWED_ORIGINS: CsvFromString.default("http://127.0.0.1:5173,http://localhost:5173"),
  WARDEN_STATE_DIR: requiredString("WARDEN_STATE_DIR").default("./state"),
  WARDEN_ADMIN_UIDS: CsvFromString.default(""),
  WARDEN_FOUNDATION_EMAIL_DOMAIN: requiredString("WARDEN_FOUNDATION_EMAIL_DOMAIN")
    .regex(/^[a-z0-9.-]+\.[a-z]{2,}$/i, { message: "WARDEN_FOUNDATION_EMAIL_DOMAIN must be a domain name" })
    .default("apache.org"),

  PGHOST: requiredString("PGHOST").default("127.0.0.1"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: requiredString("PGDATABASE").default("release_warden"),
  PGUSER: requiredString("PGUSER").default("postgres"),
  PGPASSWORD: requiredString("PGPASSWORD").default("postgres"),
  PGSSLMODE: z.enum(["disable", "prefer", "require"]).default("disable"),
  WARDEN_PG_POOL_MAX: z.coerce.number().int().min(1).max(50).default(10),
  WARDEN_PG_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  WARDEN_PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(10_000),
  WARDEN_PG_QUERY_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),

  FIREBASE_PROJECT_ID: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
});

export type WardenEnv = z.infer<typeof EnvSchema>;

function hasPlaceholderValue(value: string): boolean {
  return PLACEHOLDER_MATCHERS.some((pattern) => pattern.test(value));
}

function validateRuntimeSecretValues(env: WardenEnv): string[] {
  const issues: string[] = [];

  for (const [name, rawValue] of Object.entries(env)) {
    if (!RUNTIME_ENFORCED_SENSITIVE_VARS.has(name)) continue;
    if (typeof rawValue !== "string") continue;
    if (!hasPlaceholderValue(rawValue)) continue;

    issues.push(`${name} is configured with a placeholder value; set a concrete secret before runtime startup.`);
  }

  return issues;
}

export function readEnv(): WardenEnv {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid release-warden env: ${message}`);
  }
  const env = parsed.data;
  const runtimeSecretIssues = validateRuntimeSecretValues(env);
  if (runtimeSecretIssues.length > 0) {
    throw new Error(`Invalid release-warden env values: ${runtimeSecretIssues.join("; ")}`);
  }
  return env;
}

export function redactEnvForLogs(env: WardenEnv): Record<string, string | number | boolean | null> {
  return {
    WARDEN_HOST: env.WARDEN_HOST,
    WARDEN_PORT: env.WARDEN_PORT,
    WARDEN_LOG_LEVEL: env.WARDEN_LOG_LEVEL,
    WARDEN_ALLOWED_ORIGINS: env.WARDEN_ALLOWED_ORIGINS.join(","),
    WARDEN_STATE_DIR: env.WARDEN_STATE_DIR,
    WARDEN_ADMIN_UIDS: env.WARDEN_ADMIN_UIDS.join(","),
    WARDEN_FOUNDATION_EMAIL_DOMAIN: env.WARDEN_FOUNDATION_EMAIL_DOMAIN,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGPASSWORD: "[redacted]",
    PGSSLMODE: env.PGSSLMODE,
    WARDEN_PG_POOL_MAX: env.WARDEN_PG_POOL_MAX,
    WARDEN_PG_IDLE_TIMEOUT_MS: env.WARDEN_PG_IDLE_TIMEOUT_MS,
    WARDEN_PG_CONNECTION_TIMEOUT_MS: env.WARDEN_PG_CONNECTION_TIMEOUT_MS,
    WARDEN_PG_QUERY_TIMEOUT_MS: env.WARDEN_PG_QUERY_TIMEOUT_MS,
    FIREBASE_PROJECT_ID: env.FIREBASE_PROJECT_ID ?? null,
    GOOGLE_APPLICATION_CREDENTIALS: env.GOOGLE_APPLICATION_CREDENTIALS ? "[set]" : null,
  };
}
