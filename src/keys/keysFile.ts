import path from "node:path";
import { DomainError } from "../types/errors";

export const COMMITTEE_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export type KeysFileEntry = {
  fingerprint: string;
  algorithm: string;
  bits: number | null;
  createdAt: string;
  primaryUid: string | null;
  foundationUid: string | null;
  armored: string;
};

export function isCommitteeName(name: string): boolean {
  return COMMITTEE_NAME_PATTERN.test(name);
}

export function keysFilePath(stateDir: string, committee: string): string {
  if (!isCommitteeName(committee)) {
    throw new DomainError("ARTIFACT_WRITE_FAILED", `refusing to build a KEYS path for committee "${committee}"`);
  }
  return path.join(stateDir, "keys", committee, "KEYS");
}

export function sortForKeysFile<T extends KeysFileEntry>(entries: T[]): T[] {
  return [...entries].sort((a, b) => {
    const byUid = (a.foundationUid ?? "").localeCompare(b.foundationUid ?? "");
    return byUid !== 0 ? byUid : a.fingerprint.localeCompare(b.fingerprint);
  });
}

function describeKey(entry: KeysFileEntry): string[] {
  const algorithm = `${entry.algorithm}${entry.bits ?? ""}`;
  const uid = entry.primaryUid ?? entry.foundationUid ?? "(no user id)";
  return [`pub   ${algorithm} ${entry.createdAt.slice(0, 10)} ${entry.fingerprint}`, `uid   ${uid}`];
}

/**
 * Renders the full KEYS listing for one committee. The output is a pure
 * function of its input, so regenerating twice with the same keys and time
 * produces identical bytes.
 */
export function renderKeysFile(input: {
  committee: { name: string; displayName: string };
  keys: KeysFileEntry[];
  generatedAt: Date;
}): string {
  const count = input.keys.length;
  const lines = [
    `# Public signing keys for ${input.committee.displayName} (${input.committee.name})`,
    `# Generated ${input.generatedAt.toISOString()}, ${count} ${count === 1 ? "key" : "keys"}`,
    "#",
    "# Import with: gpg --import KEYS",
    "",
  ];
  for (const entry of sortForKeysFile(input.keys)) {
    lines.push(...describeKey(entry), entry.armored.trim(), "");
  }
  return lines.join("\n");
}
