import type { IssuedPat, PatView } from "../auth/pat";
import type { CommitteeRecord, PublicSigningKeyRecord } from "../stores/interfaces";
import type { Outcome, Outcomes } from "./outcome";

export const PRIVILEGE_LEVELS = [
  "general_public",
  "foundation_committer",
  "committee_participant",
  "committee_member",
] as const;

export type PrivilegeLevel = (typeof PRIVILEGE_LEVELS)[number];

export function privilegeRank(level: PrivilegeLevel): number {
  return PRIVILEGE_LEVELS.indexOf(level);
}

export type ImportStatus = "parsed" | "inserted" | "linked" | "inserted_and_linked";

export type ImportedKey = {
  status: ImportStatus;
  key: PublicSigningKeyRecord;
};

export type KeysFileArtifact = {
  committee: string;
  path: string;
  keyCount: number;
};

export type AssociationResult = {
  committee: string;
  fingerprint: string;
  linked: boolean;
  keysFile: Outcome<KeysFileArtifact>;
};

export type RemovalResult = {
  committee: string;
  fingerprint: string;
  keysFile: Outcome<KeysFileArtifact>;
};

export type CommitteeUpload = {
  keys: Outcomes<ImportedKey, number>;
  /** Null when no key in the upload could be stored. */
  keysFile: Outcome<KeysFileArtifact> | null;
};

export type KeyDeletion = {
  fingerprint: string;
  committees: string[];
  keysFiles: Outcomes<KeysFileArtifact>;
};

export type CommitteeKeyPurge = {
  committee: string;
  unlinked: string[];
  deleted: string[];
  keysFile: Outcome<KeysFileArtifact>;
};

export interface GeneralPublicKeys {
  get(fingerprint: string): Promise<Outcome<PublicSigningKeyRecord>>;
  forCommittee(committee: string): Promise<Outcome<PublicSigningKeyRecord[]>>;
}

export interface GeneralPublicCommittees {
  get(name: string): Promise<Outcome<CommitteeRecord>>;
  list(): Promise<CommitteeRecord[]>;
}

export interface GeneralPublic {
  readonly level: PrivilegeLevel;
  readonly keys: GeneralPublicKeys;
  readonly committees: GeneralPublicCommittees;
}

export interface FoundationCommitterKeys extends GeneralPublicKeys {
  /** Stores the key if no key with its fingerprint exists yet. */
  ensureKeyStored(armored: string): Promise<Outcome<ImportedKey>>;
  /** One outcome per armored block, keyed by block index. */
  ensureStored(keysFileText: string): Promise<Outcomes<ImportedKey, number>>;
  deleteKey(fingerprint: string): Promise<Outcome<KeyDeletion>>;
}

export interface FoundationCommitterTokens {
  issue(label: string | null): Promise<IssuedPat>;
  list(): Promise<PatView[]>;
  revoke(patId: string): Promise<PatView>;
}

export interface FoundationCommitter extends GeneralPublic {
  readonly uid: string;
  readonly keys: FoundationCommitterKeys;
  readonly tokens: FoundationCommitterTokens;
}

export interface CommitteeParticipantKeys extends FoundationCommitterKeys {
  associateFingerprint(fingerprint: string): Promise<Outcome<AssociationResult>>;
  ensureAssociated(keysFileText: string): Promise<CommitteeUpload>;
}

export interface CommitteeParticipant extends FoundationCommitter {
  readonly committee: CommitteeRecord;
  readonly keys: CommitteeParticipantKeys;
}

export interface CommitteeMemberKeys extends CommitteeParticipantKeys {
  removeAssociation(fingerprint: string): Promise<Outcome<RemovalResult>>;
  autogenerateKeysFile(): Promise<Outcome<KeysFileArtifact>>;
  deleteAllKeys(): Promise<Outcome<CommitteeKeyPurge>>;
}

export interface CommitteeMember extends CommitteeParticipant {
  readonly keys: CommitteeMemberKeys;
}

export type FoundationUidCheck = {
  fingerprint: string;
  stored: string | null;
  derived: string | null;
  status: "consistent" | "mismatch" | "fixed";
};

export type FoundationUidAudit = {
  keys: Outcomes<FoundationUidCheck>;
  /** Listings of committees whose keys were corrected. */
  keysFiles: Outcomes<KeysFileArtifact>;
};

export interface AdministratorKeys extends FoundationCommitterKeys {
  checkFoundationUids(options?: { fix?: boolean }): Promise<FoundationUidAudit>;
}

/** Granted to configured administrators only. Sits beside the committee chain, above FoundationCommitter. */
export interface Administrator extends FoundationCommitter {
  readonly keys: AdministratorKeys;
}

type Assert<T extends true> = T;
type IsSubtype<A, B> = [A] extends [B] ? true : false;

/** Fails to compile if a level stops offering an operation of the level below. */
export type CapabilityChainIsMonotonic = [
  Assert<IsSubtype<FoundationCommitter, GeneralPublic>>,
  Assert<IsSubtype<CommitteeParticipant, FoundationCommitter>>,
  Assert<IsSubtype<CommitteeMember, CommitteeParticipant>>,
  Assert<IsSubtype<Administrator, FoundationCommitter>>,
];
