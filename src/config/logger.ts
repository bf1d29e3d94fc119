export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

export type LogSink = (line: string) => void;

const REDACT_KEYS = ["password", "secret", "token", "authorization", "apikey", "api_key"];
// Too short to match as substrings ("path", "update").
const REDACT_EXACT_KEYS = new Set(["pat", "jwt"]);

function levelWeight(level: LogLevel): number {
  switch (level) {
    case "debug":
      return 10;
    case "info":
      return 20;
    case "warn":
      return 30;
    case "error":
      return 40;
  }
}

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  if (REDACT_EXACT_KEYS.has(normalized)) return true;
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sanitize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map((entry) => sanitize(entry));
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (!isRecord(value)) return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitize(innerValue);
  }
  return output;
}

export function createLogger(
  level: LogLevel = "info",
  options: { service?: string; sink?: LogSink } = {}
): Logger {
  const threshold = levelWeight(level);
  const service = options.service ?? "release-warden";
  const sink: LogSink = options.sink ?? ((line) => process.stdout.write(line));

  const write = (lvl: LogLevel, msg: string, meta?: Record<string, unknown>) => {
    if (levelWeight(lvl) < threshold) return;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      service,
      msg,
      ...(meta ? { meta: sanitize(meta) } : {}),
    };
    sink(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
  };
}
