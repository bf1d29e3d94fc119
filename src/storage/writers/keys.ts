import { normalizeFingerprint, parsePublicKey, splitArmoredBlocks, type ParsedPublicKey } from "../../keys/openpgp";
import type { CommitteeRecord, PublicSigningKeyRecord } from "../../stores/interfaces";
import { AccessError, DomainError } from "../../types/errors";
import type {
  AdministratorKeys,
  AssociationResult,
  CommitteeKeyPurge,
  CommitteeMemberKeys,
  CommitteeParticipantKeys,
  CommitteeUpload,
  FoundationCommitterKeys,
  FoundationUidCheck,
  GeneralPublicKeys,
  ImportStatus,
  ImportedKey,
  KeyDeletion,
  KeysFileArtifact,
  RemovalResult,
} from "../capabilities";
import type { CapabilityScope } from "../context";
import { exception, Outcomes, result, warning, type Outcome } from "../outcome";
import { regenerateKeysFile } from "./keysFiles";

function fingerprintOrFault(value: string): string | DomainError {
  return normalizeFingerprint(value) ?? new DomainError("KEY_MALFORMED", `"${value}" is not a v4 fingerprint`);
}

function requireUid(scope: CapabilityScope): string {
  const uid = scope.ctx.principal?.uid;
  if (!uid) {
    throw new AccessError("UNAUTHENTICATED", "an authenticated principal is required");
  }
  return uid;
}

function importStatus(inserted: boolean, linked: boolean): ImportStatus {
  if (inserted) return linked ? "inserted_and_linked" : "inserted";
  return linked ? "linked" : "parsed";
}

function toKeyRecord(parsed: ParsedPublicKey, uploadedBy: string, at: Date): PublicSigningKeyRecord {
  return {
    fingerprint: parsed.fingerprint,
    keyId: parsed.keyId,
    algorithm: parsed.algorithm,
    bits: parsed.bits,
    createdAt: parsed.createdAt,
    primaryUid: parsed.primaryUid,
    foundationUid: parsed.foundationUid,
    armored: parsed.armored,
    uploadedBy,
    uploadedAt: at.toISOString(),
  };
}

/** The first failure of a side effect downgrades the primary result to a warning. */
function withSideEffect<T>(value: T, sideEffects: Array<Outcome<unknown> | null>): Outcome<T> {
  for (const sideEffect of sideEffects) {
    if (sideEffect?.kind === "exception") return warning(value, sideEffect.error);
  }
  return result(value);
}

async function importKey(
  scope: CapabilityScope,
  armored: string,
  committee: CommitteeRecord | null
): Promise<Outcome<ImportedKey>> {
  const { ctx } = scope;
  const uid = requireUid(scope);

  let parsed: ParsedPublicKey;
  try {
    parsed = parsePublicKey(armored, { foundationEmailDomain: ctx.foundationEmailDomain });
  } catch (error) {
    return exception(error);
  }

  const tx = ctx.tx();
  let key = await tx.keys.get(parsed.fingerprint);
  let inserted = false;
  if (!key) {
    const record = toKeyRecord(parsed, uid, ctx.now());
    inserted = await ctx.mediate({ action: "key.insert", subject: record.fingerprint, scope }, () =>
      tx.keys.insert(record)
    );
    // A concurrent session may have stored the same key since the lookup above.
    key = inserted ? record : await tx.keys.get(record.fingerprint);
    if (!key) {
      throw new Error(`key ${record.fingerprint} was neither inserted nor found`);
    }
  }

  let linked = false;
  if (committee) {
    const { name } = committee;
    const { fingerprint } = key;
    linked = await ctx.mediate({ action: "committee_key.link", subject: `${name}/${fingerprint}`, scope }, () =>
      tx.keys.link(name, fingerprint)
    );
  }

  const imported: ImportedKey = { status: importStatus(inserted, linked), key };
  if (!key.foundationUid) {
    return warning(
      imported,
      new DomainError("FOUNDATION_UID_MISSING", `key ${key.fingerprint} has no ${ctx.foundationEmailDomain} user id`)
    );
  }
  return result(imported);
}

async function importKeysFile(
  scope: CapabilityScope,
  keysFileText: string,
  committee: CommitteeRecord | null
): Promise<Outcomes<ImportedKey, number>> {
  const outcomes = new Outcomes<ImportedKey, number>();
  for (const block of splitArmoredBlocks(keysFileText)) {
    outcomes.set(block.index, await importKey(scope, block.text, committee));
  }
  return outcomes;
}

async function linkedCommitteeRecords(scope: CapabilityScope, fingerprint: string): Promise<CommitteeRecord[]> {
  const tx = scope.ctx.tx();
  const records: CommitteeRecord[] = [];
  for (const name of await tx.keys.committeesForKey(fingerprint)) {
    const committee = await tx.committees.get(name);
    if (committee) records.push(committee);
  }
  return records;
}

function derivedFoundationUid(key: PublicSigningKeyRecord, foundationEmailDomain: string): Outcome<string | null> {
  try {
    return result(parsePublicKey(key.armored, { foundationEmailDomain }).foundationUid);
  } catch (error) {
    return exception(error);
  }
}

export function generalPublicKeys(scope: CapabilityScope): GeneralPublicKeys {
  const { ctx } = scope;
  return {
    async get(fingerprint) {
      const normalized = fingerprintOrFault(fingerprint);
      if (normalized instanceof DomainError) return exception(normalized);
      const key = await ctx.tx().keys.get(normalized);
      return key ? result(key) : exception(new DomainError("KEY_NOT_FOUND", `no key with fingerprint ${normalized}`));
    },

    async forCommittee(committee) {
      const tx = ctx.tx();
      if (!(await tx.committees.get(committee))) {
        return exception(new DomainError("COMMITTEE_NOT_FOUND", `no committee named ${committee}`));
      }
      return result(await tx.keys.listForCommittee(committee));
    },
  };
}

export function foundationCommitterKeys(scope: CapabilityScope): FoundationCommitterKeys {
  const { ctx } = scope;
  return {
    ...generalPublicKeys(scope),

    ensureKeyStored(armored) {
      return importKey(scope, armored, null);
    },

    ensureStored(keysFileText) {
      return importKeysFile(scope, keysFileText, null);
    },

    async deleteKey(fingerprint) {
      const uid = requireUid(scope);
      const normalized = fingerprintOrFault(fingerprint);
      if (normalized instanceof DomainError) return exception<KeyDeletion>(normalized);

      const tx = ctx.tx();
      const key = await tx.keys.get(normalized);
      if (!key) {
        return exception<KeyDeletion>(new DomainError("KEY_NOT_FOUND", `no key with fingerprint ${normalized}`));
      }
      if (key.uploadedBy !== uid && key.foundationUid !== uid && !ctx.isAdministrator()) {
        throw new AccessError("FORBIDDEN", "only the uploader, the key owner or an administrator may delete a key", {
          fingerprint: normalized,
        });
      }

      const committees = await linkedCommitteeRecords(scope, normalized);
      await ctx.mediate({ action: "key.delete", subject: normalized, scope }, () => tx.keys.delete(normalized));

      const keysFiles = new Outcomes<KeysFileArtifact>();
      for (const committee of committees) {
        keysFiles.set(committee.name, await regenerateKeysFile(scope, committee));
      }
      const deletion: KeyDeletion = {
        fingerprint: normalized,
        committees: committees.map((committee) => committee.name),
        keysFiles,
      };
      const firstFailure = keysFiles.exceptions()[0];
      return firstFailure ? warning(deletion, firstFailure) : result(deletion);
    },
  };
}

export function committeeParticipantKeys(
  scope: CapabilityScope,
  committee: CommitteeRecord
): CommitteeParticipantKeys {
  const { ctx } = scope;
  return {
    ...foundationCommitterKeys(scope),

    async associateFingerprint(fingerprint) {
      const normalized = fingerprintOrFault(fingerprint);
      if (normalized instanceof DomainError) return exception<AssociationResult>(normalized);

      const tx = ctx.tx();
      if (!(await tx.keys.get(normalized))) {
        return exception<AssociationResult>(new DomainError("KEY_NOT_FOUND", `no key with fingerprint ${normalized}`));
      }
      const linked = await ctx.mediate(
        { action: "committee_key.link", subject: `${committee.name}/${normalized}`, scope },
        () => tx.keys.link(committee.name, normalized)
      );
      const keysFile = await regenerateKeysFile(scope, committee);
      return withSideEffect({ committee: committee.name, fingerprint: normalized, linked, keysFile }, [keysFile]);
    },

    async ensureAssociated(keysFileText): Promise<CommitteeUpload> {
      const keys = await importKeysFile(scope, keysFileText, committee);
      const keysFile = keys.resultCount > 0 ? await regenerateKeysFile(scope, committee) : null;
      return { keys, keysFile };
    },
  };
}

export function committeeMemberKeys(scope: CapabilityScope, committee: CommitteeRecord): CommitteeMemberKeys {
  const { ctx } = scope;
  return {
    ...committeeParticipantKeys(scope, committee),

    async removeAssociation(fingerprint) {
      const normalized = fingerprintOrFault(fingerprint);
      if (normalized instanceof DomainError) return exception<RemovalResult>(normalized);

      const tx = ctx.tx();
      const removed = await ctx.mediate(
        { action: "committee_key.unlink", subject: `${committee.name}/${normalized}`, scope },
        () => tx.keys.unlink(committee.name, normalized)
      );
      if (!removed) {
        return exception<RemovalResult>(
          new DomainError("KEY_NOT_FOUND", `key ${normalized} is not associated with ${committee.name}`)
        );
      }
      const keysFile = await regenerateKeysFile(scope, committee);
      return withSideEffect({ committee: committee.name, fingerprint: normalized, keysFile }, [keysFile]);
    },

    autogenerateKeysFile() {
      return regenerateKeysFile(scope, committee);
    },

    async deleteAllKeys() {
      const tx = ctx.tx();
      const unlinked = await ctx.mediate({ action: "committee_key.unlink_all", subject: committee.name, scope }, () =>
        tx.keys.unlinkAll(committee.name)
      );

      const deleted: string[] = [];
      for (const fingerprint of unlinked) {
        if ((await tx.keys.committeesForKey(fingerprint)).length > 0) continue;
        await ctx.mediate({ action: "key.delete", subject: fingerprint, scope }, () => tx.keys.delete(fingerprint));
        deleted.push(fingerprint);
      }

      const keysFile = await regenerateKeysFile(scope, committee);
      const purge: CommitteeKeyPurge = { committee: committee.name, unlinked, deleted, keysFile };
      return withSideEffect(purge, [keysFile]);
    },
  };
}

/** Audits stored foundation uids against the uids derived from each key's user ids. */
export function administratorKeys(scope: CapabilityScope): AdministratorKeys {
  const { ctx } = scope;
  return {
    ...foundationCommitterKeys(scope),

    async checkFoundationUids({ fix = false } = {}) {
      const tx = ctx.tx();
      const checks = new Outcomes<FoundationUidCheck>();
      const affected = new Set<string>();

      for (const key of await tx.keys.list()) {
        const derivation = derivedFoundationUid(key, ctx.foundationEmailDomain);
        if (derivation.kind === "exception") {
          checks.set(key.fingerprint, exception(derivation.error));
          continue;
        }
        const derived = derivation.value;
        const check: FoundationUidCheck = {
          fingerprint: key.fingerprint,
          stored: key.foundationUid,
          derived,
          status: "consistent",
        };
        if (derived === key.foundationUid) {
          checks.set(key.fingerprint, result(check));
          continue;
        }
        if (!fix) {
          const mismatch: FoundationUidCheck = { ...check, status: "mismatch" };
          checks.set(
            key.fingerprint,
            warning(
              mismatch,
              new DomainError(
                "FOUNDATION_UID_MISMATCH",
                `key ${key.fingerprint} records ${key.foundationUid ?? "no uid"} but its user ids give ${derived ?? "none"}`,
                { stored: key.foundationUid, derived }
              )
            )
          );
          continue;
        }
        await ctx.mediate({ action: "key.fix_foundation_uid", subject: key.fingerprint, scope }, () =>
          tx.keys.setFoundationUid(key.fingerprint, derived)
        );
        const fixed: FoundationUidCheck = { ...check, status: "fixed" };
        checks.set(key.fingerprint, result(fixed));
        for (const name of await tx.keys.committeesForKey(key.fingerprint)) affected.add(name);
      }

      const keysFiles = new Outcomes<KeysFileArtifact>();
      for (const name of [...affected].sort()) {
        const committee = await tx.committees.get(name);
        if (committee) keysFiles.set(name, await regenerateKeysFile(scope, committee));
      }
      return { keys: checks, keysFiles };
    },
  };
}
