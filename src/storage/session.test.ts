import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { splitArmoredBlocks } from "../keys/openpgp";
import { armor, keysFileText, packet } from "../keys/testing/fixtures";
import { isAccessError, isDomainError } from "../types/errors";
import type { ImportedKey } from "./capabilities";
import { exceptionOrNull, resultOrRaise, warningOrNull, type Outcome } from "./outcome";
import { withStorageSession } from "./session";
import { createHarness, ownedKey, principal } from "./testing/harness";

function statusOf(outcome: Outcome<ImportedKey> | undefined): string | null {
  return outcome && outcome.kind !== "exception" ? outcome.value.status : null;
}

test("higher capability levels expose every operation of the lower ones", async () => {
  const h = await createHarness();
  try {
    await withStorageSession(h.deps, principal("alice"), async (session) => {
      const publicView = session.asGeneralPublic();
      const committer = await session.asFoundationCommitter();
      const participant = await session.asCommitteeParticipant("tooling");
      const member = await session.asCommitteeMember("tooling");

      const pairs: Array<[object, object]> = [
        [publicView.keys, committer.keys],
        [committer.keys, participant.keys],
        [participant.keys, member.keys],
        [committer.tokens, participant.tokens],
        [participant.tokens, member.tokens],
        [publicView.committees, member.committees],
      ];
      for (const [lower, higher] of pairs) {
        for (const operation of Object.keys(lower)) {
          assert.equal(operation in higher, true, `missing ${operation}`);
        }
      }
      assert.deepEqual(Object.keys(member.keys).sort(), [
        "associateFingerprint",
        "autogenerateKeysFile",
        "deleteAllKeys",
        "deleteKey",
        "ensureAssociated",
        "ensureKeyStored",
        "ensureStored",
        "forCommittee",
        "get",
        "removeAssociation",
      ]);
      assert.equal(member.level, "committee_member");
      assert.equal(member.committee.name, "tooling");
    });
  } finally {
    await h.cleanup();
  }
});

test("a non-member asking for committee member capability is refused without writing", async () => {
  const h = await createHarness();
  try {
    await withStorageSession(h.deps, principal("bob"), async (session) => {
      await assert.rejects(session.asCommitteeMember("tooling"), (error: unknown) =>
        isAccessError(error, "INSUFFICIENT_PRIVILEGE")
      );
      const participant = await session.asCommitteeParticipant("tooling");
      assert.equal(participant.level, "committee_participant");
    });
    assert.deepEqual(h.backend.storedFingerprints(), []);
    assert.deepEqual(h.writes, []);
  } finally {
    await h.cleanup();
  }
});

test("eligibility is derived from membership data", async () => {
  const h = await createHarness();
  try {
    await withStorageSession(h.deps, principal("dave"), async (session) => {
      await session.asFoundationCommitter();
      await assert.rejects(session.asCommitteeParticipant("tooling"), (error: unknown) =>
        isAccessError(error, "INSUFFICIENT_PRIVILEGE")
      );
      await assert.rejects(session.asCommitteeParticipant("no-such-committee"), (error: unknown) =>
        isAccessError(error, "NOT_FOUND")
      );
    });
    await withStorageSession(h.deps, principal("erin"), async (session) => {
      await assert.rejects(session.asFoundationCommitter(), (error: unknown) =>
        isAccessError(error, "INSUFFICIENT_PRIVILEGE")
      );
    });
    await withStorageSession(h.deps, null, async (session) => {
      assert.equal(session.asGeneralPublic().level, "general_public");
      await assert.rejects(session.asFoundationCommitter(), (error: unknown) => isAccessError(error, "UNAUTHENTICATED"));
    });
    await withStorageSession(h.deps, principal("root"), async (session) => {
      assert.equal(session.isAdministrator(), true);
      const member = await session.asCommitteeMember("incubator");
      assert.equal(member.committee.displayName, "Apache Incubator");
    });
  } finally {
    await h.cleanup();
  }
});

test("importing a listing with a new, an existing and a malformed key reports each one", async () => {
  const h = await createHarness();
  const keyA = ownedKey(1, "alice");
  const keyB = ownedKey(2, "alice");
  const keyC = armor(packet(13, Buffer.from("Mallory <mallory@apache.org>")));
  try {
    await withStorageSession(h.deps, principal("alice"), async (session) => {
      const committer = await session.asFoundationCommitter();
      resultOrRaise(await committer.keys.ensureKeyStored(keyB.armored));
    });

    const outcomes = await withStorageSession(h.deps, principal("alice"), async (session) => {
      const committer = await session.asFoundationCommitter();
      return committer.keys.ensureStored(keysFileText([keyA, keyB, keyC]));
    });

    assert.equal(outcomes.size, 3);
    assert.equal(statusOf(outcomes.get(0)), "inserted");
    assert.equal(statusOf(outcomes.get(1)), "parsed");
    const failed = outcomes.get(2);
    assert.equal(failed?.kind, "exception");
    assert.equal(failed ? isDomainError(exceptionOrNull(failed), "KEY_MALFORMED") : false, true);
    assert.equal(outcomes.resultCount, 2);
    assert.equal(outcomes.exceptionCount, 1);
    assert.deepEqual(h.backend.storedFingerprints(), [keyA.fingerprint, keyB.fingerprint].sort());
  } finally {
    await h.cleanup();
  }
});

test("a fault on the third write rolls back the first two", async () => {
  let writes = 0;
  const h = await createHarness({
    onWrite: () => {
      writes += 1;
      if (writes === 3) throw new Error("audit sink unavailable");
    },
  });
  try {
    await assert.rejects(
      withStorageSession(h.deps, principal("alice"), async (session) => {
        const committer = await session.asFoundationCommitter();
        await committer.keys.ensureKeyStored(ownedKey(1, "alice").armored);
        await committer.keys.ensureKeyStored(ownedKey(2, "alice").armored);
        await committer.keys.ensureKeyStored(ownedKey(3, "alice").armored);
      }),
      /audit sink unavailable/
    );
    assert.equal(writes, 3);
    assert.deepEqual(h.backend.storedFingerprints(), []);
  } finally {
    await h.cleanup();
  }
});

test("staged KEYS files are discarded when the session rolls back", async () => {
  const h = await createHarness();
  try {
    await assert.rejects(
      withStorageSession(h.deps, principal("bob"), async (session) => {
        const participant = await session.asCommitteeParticipant("tooling");
        const upload = await participant.keys.ensureAssociated(keysFileText([ownedKey(5, "bob")]));
        assert.equal(upload.keysFile?.kind, "result");
        throw new Error("later step failed");
      }),
      /later step failed/
    );
    assert.deepEqual(await fs.readdir(path.join(h.stateDir, "keys", "tooling")), []);
    assert.deepEqual(h.backend.linkedFingerprints("tooling"), []);
  } finally {
    await h.cleanup();
  }
});

test("associating a key links it and publishes the KEYS file after commit", async () => {
  const h = await createHarness();
  const key = ownedKey(4, "bob");
  const keysPath = path.join(h.stateDir, "keys", "tooling", "KEYS");
  try {
    const outcome = await withStorageSession(h.deps, principal("bob"), async (session) => {
      const participant = await session.asCommitteeParticipant("tooling");
      resultOrRaise(await participant.keys.ensureKeyStored(key.armored));
      const associated = await participant.keys.associateFingerprint(key.fingerprint.toLowerCase());
      await assert.rejects(fs.readFile(keysPath, "utf8"), { code: "ENOENT" });
      return associated;
    });

    const association = resultOrRaise(outcome);
    assert.equal(outcome.kind, "result");
    assert.equal(association.linked, true);
    assert.deepEqual(resultOrRaise(association.keysFile), { committee: "tooling", path: keysPath, keyCount: 1 });
    const published = await fs.readFile(keysPath, "utf8");
    assert.deepEqual(
      splitArmoredBlocks(published).map((block) => block.text),
      [key.armored]
    );
    assert.deepEqual(h.backend.linkedFingerprints("tooling"), [key.fingerprint]);
  } finally {
    await h.cleanup();
  }
});

test("a KEYS file that cannot be written turns the association into a warning", async () => {
  const h = await createHarness();
  const blocked = path.join(h.stateDir, "blocked");
  await fs.writeFile(blocked, "not a directory", "utf8");
  const key = ownedKey(6, "alice");
  try {
    const outcome = await withStorageSession({ ...h.deps, stateDir: blocked }, principal("alice"), async (session) => {
      const member = await session.asCommitteeMember("tooling");
      resultOrRaise(await member.keys.ensureKeyStored(key.armored));
      return member.keys.associateFingerprint(key.fingerprint);
    });

    assert.equal(outcome.kind, "warning");
    assert.equal(isDomainError(warningOrNull(outcome), "ARTIFACT_WRITE_FAILED"), true);
    const keysFile = resultOrRaise(outcome).keysFile;
    assert.equal(keysFile.kind, "exception");
    assert.deepEqual(keysFile.kind === "exception" ? keysFile.partial : null, {
      committee: "tooling",
      path: path.join(blocked, "keys", "tooling", "KEYS"),
      keyCount: 1,
    });
    assert.deepEqual(h.backend.linkedFingerprints("tooling"), [key.fingerprint]);
  } finally {
    await h.cleanup();
  }
});

test("read-only sessions refuse writes but allow reads", async () => {
  const h = await createHarness();
  const key = ownedKey(7, "alice");
  try {
    await withStorageSession(
      h.deps,
      principal("alice"),
      async (session) => {
        const committer = await session.asFoundationCommitter();
        await assert.rejects(committer.keys.ensureKeyStored(key.armored), (error: unknown) =>
          isAccessError(error, "FORBIDDEN")
        );
        const lookup = await committer.keys.get(key.fingerprint);
        assert.equal(isDomainError(exceptionOrNull(lookup), "KEY_NOT_FOUND"), true);
      },
      { readOnly: true }
    );
    assert.deepEqual(h.backend.storedFingerprints(), []);
  } finally {
    await h.cleanup();
  }
});

test("an aborted signal rolls the session back instead of committing", async () => {
  const h = await createHarness();
  const controller = new AbortController();
  try {
    await assert.rejects(
      withStorageSession(
        h.deps,
        principal("alice"),
        async (session) => {
          const committer = await session.asFoundationCommitter();
          resultOrRaise(await committer.keys.ensureKeyStored(ownedKey(8, "alice").armored));
          controller.abort(new Error("client went away"));
        },
        { signal: controller.signal }
      ),
      /client went away/
    );
    assert.deepEqual(h.backend.storedFingerprints(), []);
  } finally {
    await h.cleanup();
  }
});

test("every mediated write reaches the write hook", async () => {
  const h = await createHarness();
  const key = ownedKey(9, "alice");
  try {
    await withStorageSession(h.deps, principal("alice"), async (session) => {
      const committer = await session.asFoundationCommitter();
      resultOrRaise(await committer.keys.ensureKeyStored(key.armored));
    });
    assert.deepEqual(h.writes, [
      {
        action: "key.insert",
        subject: key.fingerprint,
        principal: "alice",
        level: "foundation_committer",
        committee: null,
        at: "2024-05-01T00:00:00.000Z",
      },
    ]);
  } finally {
    await h.cleanup();
  }
});

test("capabilities stop working once their session has closed", async () => {
  const h = await createHarness();
  try {
    const committer = await withStorageSession(h.deps, principal("alice"), (session) => session.asFoundationCommitter());
    await assert.rejects(committer.keys.get(ownedKey(10, "alice").fingerprint), /storage session is already committed/);
  } finally {
    await h.cleanup();
  }
});

test("opening a session against an unreachable store raises UNAVAILABLE", async () => {
  const h = await createHarness();
  h.backend.simulateOutage();
  try {
    await assert.rejects(
      withStorageSession(h.deps, principal("alice"), async () => undefined),
      (error: unknown) => isAccessError(error, "UNAVAILABLE")
    );
  } finally {
    await h.cleanup();
  }
});
