import type { FoundationUidAudit, KeysFileArtifact } from "./capabilities";
import { Outcomes } from "./outcome";
import type { StorageSession } from "./session";

/** Restages the KEYS listing of every committee. Administrators only. */
export async function regenerateAllKeysFiles(session: StorageSession): Promise<Outcomes<KeysFileArtifact>> {
  const admin = await session.asAdministrator();
  const outcomes = new Outcomes<KeysFileArtifact>();
  for (const committee of await admin.committees.list()) {
    const member = await session.asCommitteeMember(committee.name);
    outcomes.set(committee.name, await member.keys.autogenerateKeysFile());
  }
  return outcomes;
}

/**
 * Compares every stored foundation uid with the one its user ids give today.
 * With `fix`, mismatches are overwritten and the affected listings restaged.
 */
export async function checkKeys(
  session: StorageSession,
  options: { fix?: boolean } = {}
): Promise<FoundationUidAudit> {
  const admin = await session.asAdministrator();
  return admin.keys.checkFoundationUids(options);
}
