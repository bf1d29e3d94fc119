import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { isAccessError, isDomainError } from "../types/errors";
import { checkKeys, regenerateAllKeysFiles } from "./admin";
import { resultOrRaise } from "./outcome";
import { withStorageSession } from "./session";
import { createHarness, ownedKey, principal, type Harness } from "./testing/harness";

test("administrators regenerate the KEYS file of every committee", async () => {
  const h = await createHarness();
  try {
    const outcomes = await withStorageSession(h.deps, principal("root"), (session) => regenerateAllKeysFiles(session));
    assert.deepEqual(outcomes.keys(), ["incubator", "tooling"]);
    assert.equal(outcomes.resultCount, 2);
    const listing = await fs.readFile(path.join(h.stateDir, "keys", "incubator", "KEYS"), "utf8");
    assert.equal(listing.split("\n")[0], "# Public signing keys for Apache Incubator (incubator)");
  } finally {
    await h.cleanup();
  }
});

test("regenerating every KEYS file is refused to committee members", async () => {
  const h = await createHarness();
  try {
    await withStorageSession(h.deps, principal("alice"), async (session) => {
      await assert.rejects(regenerateAllKeysFiles(session), (error: unknown) => isAccessError(error, "FORBIDDEN"));
    });
  } finally {
    await h.cleanup();
  }
});

async function storeWithStaleUid(h: Harness) {
  const aliceKey = ownedKey(31, "alice");
  const bobKey = ownedKey(32, "bob");
  await withStorageSession(h.deps, principal("alice"), async (session) => {
    const committer = await session.asFoundationCommitter();
    await committer.keys.ensureKeyStored(aliceKey.armored);
    const participant = await session.asCommitteeParticipant("tooling");
    await participant.keys.ensureAssociated(bobKey.armored);
  });
  const tx = await h.backend.begin();
  await tx.keys.setFoundationUid(bobKey.fingerprint, "mallory");
  await tx.commit();
  return { aliceKey, bobKey };
}

function storedFoundationUid(h: Harness, fingerprint: string): Promise<string | null> {
  return withStorageSession(
    h.deps,
    null,
    async (session) => resultOrRaise(await session.asGeneralPublic().keys.get(fingerprint)).foundationUid,
    { readOnly: true }
  );
}

test("key checks report stored foundation uids that disagree with the key's user ids", async () => {
  const h = await createHarness();
  try {
    const { aliceKey, bobKey } = await storeWithStaleUid(h);
    const audit = await withStorageSession(h.deps, principal("root"), (session) => checkKeys(session));

    assert.equal(audit.keys.size, 2);
    assert.deepEqual(resultOrRaise(audit.keys.get(aliceKey.fingerprint) ?? assert.fail("alice's key was not checked")), {
      fingerprint: aliceKey.fingerprint,
      stored: "alice",
      derived: "alice",
      status: "consistent",
    });

    const stale = audit.keys.get(bobKey.fingerprint);
    assert.equal(stale?.kind, "warning");
    if (stale?.kind !== "warning") return;
    assert.deepEqual(stale.value, { fingerprint: bobKey.fingerprint, stored: "mallory", derived: "bob", status: "mismatch" });
    assert.ok(isDomainError(stale.warning, "FOUNDATION_UID_MISMATCH"));

    assert.equal(audit.keysFiles.size, 0);
    assert.equal(h.writes.filter((event) => event.action === "key.fix_foundation_uid").length, 0);
    assert.equal(await storedFoundationUid(h, bobKey.fingerprint), "mallory");
  } finally {
    await h.cleanup();
  }
});

test("fixing key checks rewrites the stale uid and restages affected KEYS files", async () => {
  const h = await createHarness();
  try {
    const { bobKey } = await storeWithStaleUid(h);
    const audit = await withStorageSession(h.deps, principal("root"), (session) => checkKeys(session, { fix: true }));

    assert.equal(resultOrRaise(audit.keys.get(bobKey.fingerprint) ?? assert.fail("bob's key was not checked")).status, "fixed");
    assert.deepEqual(audit.keysFiles.keys(), ["tooling"]);
    assert.equal(resultOrRaise(audit.keysFiles.get("tooling") ?? assert.fail("no tooling listing")).keyCount, 1);
    assert.deepEqual(
      h.writes.filter((event) => event.action === "key.fix_foundation_uid").map((event) => event.subject),
      [bobKey.fingerprint]
    );
    assert.equal(await storedFoundationUid(h, bobKey.fingerprint), "bob");
  } finally {
    await h.cleanup();
  }
});

test("key checks are refused to committee members", async () => {
  const h = await createHarness();
  try {
    await withStorageSession(h.deps, principal("alice"), async (session) => {
      await assert.rejects(checkKeys(session, { fix: true }), (error: unknown) => isAccessError(error, "FORBIDDEN"));
    });
  } finally {
    await h.cleanup();
  }
});
