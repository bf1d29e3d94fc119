import type { PatRecord } from "../auth/pat";
import type { IsoDateString } from "../types/core";

export type PublicSigningKeyRecord = {
  fingerprint: string;
  keyId: string;
  algorithm: string;
  bits: number | null;
  createdAt: IsoDateString;
  primaryUid: string | null;
  foundationUid: string | null;
  armored: string;
  uploadedBy: string;
  uploadedAt: IsoDateString;
};

export type CommitteeRecord = {
  name: string;
  displayName: string;
  members: string[];
  participants: string[];
};

export type FoundationUserRecord = {
  uid: string;
  fullName: string | null;
  isCommitter: boolean;
};

export type StorageHealth = {
  ok: boolean;
  latencyMs: number;
  error?: string;
};

export interface KeyRepository {
  get(fingerprint: string): Promise<PublicSigningKeyRecord | null>;
  /** Resolves false, leaving the stored row alone, when the fingerprint already exists. */
  insert(record: PublicSigningKeyRecord): Promise<boolean>;
  list(): Promise<PublicSigningKeyRecord[]>;
  setFoundationUid(fingerprint: string, foundationUid: string | null): Promise<boolean>;
  /** Removes the key and every committee link to it. */
  delete(fingerprint: string): Promise<boolean>;
  listForCommittee(committee: string): Promise<PublicSigningKeyRecord[]>;
  committeesForKey(fingerprint: string): Promise<string[]>;
  /** Resolves true when the link did not exist before. */
  link(committee: string, fingerprint: string): Promise<boolean>;
  unlink(committee: string, fingerprint: string): Promise<boolean>;
  /** Returns the fingerprints that were linked. */
  unlinkAll(committee: string): Promise<string[]>;
}

export interface CommitteeRepository {
  get(name: string): Promise<CommitteeRecord | null>;
  list(): Promise<CommitteeRecord[]>;
  /** Holds the committee row until the transaction ends. Resolves false for an unknown committee. */
  lock(name: string): Promise<boolean>;
}

export interface FoundationUserRepository {
  get(uid: string): Promise<FoundationUserRecord | null>;
}

export interface TokenRepository {
  insert(record: PatRecord): Promise<void>;
  get(id: string): Promise<PatRecord | null>;
  listForUid(uid: string): Promise<PatRecord[]>;
  revoke(id: string, revokedBy: string, at: IsoDateString): Promise<PatRecord | null>;
}

export interface StorageTransaction {
  readonly keys: KeyRepository;
  readonly committees: CommitteeRepository;
  readonly users: FoundationUserRepository;
  readonly tokens: TokenRepository;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/** Read path used by PAT exchange, which runs without a Storage Session. */
export interface PatLookup {
  findTokenByHash(tokenHash: string): Promise<PatRecord | null>;
}

export interface StorageBackend extends PatLookup {
  /** Rejects with an UNAVAILABLE AccessError when the store cannot be reached. */
  begin(): Promise<StorageTransaction>;
  healthcheck(): Promise<StorageHealth>;
  close(): Promise<void>;
}
