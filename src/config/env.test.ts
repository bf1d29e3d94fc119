import test from "node:test";
import assert from "node:assert/strict";
import { readEnv, redactEnvForLogs } from "./env";

function withPatchedEnv(patch: Record<string, string | undefined>, run: () => void): void {
  const original: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(patch)) {
    original[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    run();
  } finally {
    for (const [key, value] of Object.entries(original)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

test("readEnv validates strict log level enum", () => {
  withPatchedEnv({ WARDEN_LOG_LEVEL: "trace" }, () => {
    assert.throws(() => readEnv(), /WARDEN_LOG_LEVEL/);
  });
});

test("readEnv splits administrator and origin lists", () => {
  withPatchedEnv(
    {
      WARDEN_ADMIN_UIDS: " alice, bob ,,",
      WARDEN_ALLOWED_ORIGINS: "https://releases.example.org",
      PGPASSWORD: "local-dev-password",
    },
    () => {
      const env = readEnv();
      assert.deepEqual(env.WARDEN_ADMIN_UIDS, ["alice", "bob"]);
      assert.deepEqual(env.WARDEN_ALLOWED_ORIGINS, ["https://releases.example.org"]);
    }
  );
});

test("readEnv rejects placeholder database passwords", () => {
  withPatchedEnv({ PGPASSWORD: "change-me" }, () => {
    assert.throws(() => readEnv(), /PGPASSWORD is configured with a placeholder value/);
  });
});

test("readEnv rejects a foundation email domain that is not a domain", () => {
  withPatchedEnv({ WARDEN_FOUNDATION_EMAIL_DOMAIN: "not a domain" }, () => {
    assert.throws(() => readEnv(), /WARDEN_FOUNDATION_EMAIL_DOMAIN must be a domain name/);
  });
});

test("redactEnvForLogs masks sensitive fields", () => {
  withPatchedEnv(
    {
      PGPASSWORD: "super-secret",
      GOOGLE_APPLICATION_CREDENTIALS: "/tmp/service-account.json",
    },
    () => {
      const safe = redactEnvForLogs(readEnv());
      assert.equal(safe.PGPASSWORD, "[redacted]");
      assert.equal(safe.GOOGLE_APPLICATION_CREDENTIALS, "[set]");
    }
  );
});
