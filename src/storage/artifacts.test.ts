import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createLogger } from "../config/logger";
import { isDomainError } from "../types/errors";
import { ArtifactStaging } from "./artifacts";

const logger = createLogger("error", { sink: () => undefined });

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "warden-artifacts-"));
  try {
    await run(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("staged content only reaches its destination on publish", async () => {
  await withTempDir(async (dir) => {
    const destination = path.join(dir, "keys", "tooling", "KEYS");
    const staging = new ArtifactStaging(logger);

    await staging.stage(destination, "first");
    await staging.stage(destination, "second");
    await assert.rejects(fs.readFile(destination, "utf8"), { code: "ENOENT" });
    assert.equal(staging.pendingCount, 1);

    const outcomes = await staging.publish();

    assert.equal(outcomes.resultCount, 1);
    assert.equal(await fs.readFile(destination, "utf8"), "second");
    assert.deepEqual(await fs.readdir(path.dirname(destination)), ["KEYS"]);
    assert.equal(staging.pendingCount, 0);
  });
});

test("discard removes staged files and leaves the destination untouched", async () => {
  await withTempDir(async (dir) => {
    const destination = path.join(dir, "KEYS");
    await fs.writeFile(destination, "published", "utf8");
    const staging = new ArtifactStaging(logger);

    await staging.stage(destination, "never published");
    await staging.discard();

    assert.equal(await fs.readFile(destination, "utf8"), "published");
    assert.deepEqual(await fs.readdir(dir), ["KEYS"]);
  });
});

test("stage reports an unwritable destination as a domain error", async () => {
  await withTempDir(async (dir) => {
    const blocker = path.join(dir, "keys");
    await fs.writeFile(blocker, "not a directory", "utf8");
    const staging = new ArtifactStaging(logger);

    await assert.rejects(staging.stage(path.join(blocker, "tooling", "KEYS"), "content"), (error: unknown) =>
      isDomainError(error, "ARTIFACT_WRITE_FAILED")
    );
    assert.equal(staging.pendingCount, 0);
  });
});
