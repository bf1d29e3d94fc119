import type { PatRecord } from "../auth/pat";
import { AccessError } from "../types/errors";
import type {
  CommitteeRecord,
  CommitteeRepository,
  FoundationUserRecord,
  FoundationUserRepository,
  KeyRepository,
  PublicSigningKeyRecord,
  StorageBackend,
  StorageHealth,
  StorageTransaction,
  TokenRepository,
} from "./interfaces";

type MemoryState = {
  keys: Map<string, PublicSigningKeyRecord>;
  links: Map<string, Set<string>>;
  committees: Map<string, CommitteeRecord>;
  users: Map<string, FoundationUserRecord>;
  tokens: Map<string, PatRecord>;
};

export type MemorySeed = {
  committees?: CommitteeRecord[];
  users?: FoundationUserRecord[];
};

class MemoryKeyRepository implements KeyRepository {
  constructor(private readonly state: MemoryState) {}

  async get(fingerprint: string): Promise<PublicSigningKeyRecord | null> {
    const record = this.state.keys.get(fingerprint);
    return record ? { ...record } : null;
  }

  async insert(record: PublicSigningKeyRecord): Promise<boolean> {
    if (this.state.keys.has(record.fingerprint)) return false;
    this.state.keys.set(record.fingerprint, { ...record });
    return true;
  }

  async list(): Promise<PublicSigningKeyRecord[]> {
    return [...this.state.keys.values()]
      .map((record) => ({ ...record }))
      .sort((a, b) => a.fingerprint.localeCompare(b.fingerprint));
  }

  async setFoundationUid(fingerprint: string, foundationUid: string | null): Promise<boolean> {
    const current = this.state.keys.get(fingerprint);
    if (!current) return false;
    this.state.keys.set(fingerprint, { ...current, foundationUid });
    return true;
  }

  async delete(fingerprint: string): Promise<boolean> {
    for (const linked of this.state.links.values()) {
      linked.delete(fingerprint);
    }
    return this.state.keys.delete(fingerprint);
  }

  async listForCommittee(committee: string): Promise<PublicSigningKeyRecord[]> {
    const linked = this.state.links.get(committee) ?? new Set<string>();
    const records: PublicSigningKeyRecord[] = [];
    for (const fingerprint of linked) {
      const record = this.state.keys.get(fingerprint);
      if (record) records.push({ ...record });
    }
    return records.sort((a, b) => a.fingerprint.localeCompare(b.fingerprint));
  }

  async committeesForKey(fingerprint: string): Promise<string[]> {
    const names: string[] = [];
    for (const [committee, linked] of this.state.links) {
      if (linked.has(fingerprint)) names.push(committee);
    }
    return names.sort((a, b) => a.localeCompare(b));
  }

  async link(committee: string, fingerprint: string): Promise<boolean> {
    if (!this.state.committees.has(committee)) {
      throw new Error(`unknown committee ${committee}`);
    }
    if (!this.state.keys.has(fingerprint)) {
      throw new Error(`unknown key ${fingerprint}`);
    }
    const linked = this.state.links.get(committee) ?? new Set<string>();
    const added = !linked.has(fingerprint);
    linked.add(fingerprint);
    this.state.links.set(committee, linked);
    return added;
  }

  async unlink(committee: string, fingerprint: string): Promise<boolean> {
    return this.state.links.get(committee)?.delete(fingerprint) ?? false;
  }

  async unlinkAll(committee: string): Promise<string[]> {
    const linked = [...(this.state.links.get(committee) ?? [])].sort((a, b) => a.localeCompare(b));
    this.state.links.delete(committee);
    return linked;
  }
}

class MemoryCommitteeRepository implements CommitteeRepository {
  constructor(private readonly state: MemoryState) {}

  async get(name: string): Promise<CommitteeRecord | null> {
    return structuredClone(this.state.committees.get(name) ?? null);
  }

  async list(): Promise<CommitteeRecord[]> {
    return [...this.state.committees.values()]
      .map((committee) => structuredClone(committee))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  // Transactions already run one at a time.
  async lock(name: string): Promise<boolean> {
    return this.state.committees.has(name);
  }
}

class MemoryUserRepository implements FoundationUserRepository {
  constructor(private readonly state: MemoryState) {}

  async get(uid: string): Promise<FoundationUserRecord | null> {
    const record = this.state.users.get(uid);
    return record ? { ...record } : null;
  }
}

class MemoryTokenRepository implements TokenRepository {
  constructor(private readonly state: MemoryState) {}

  async insert(record: PatRecord): Promise<void> {
    this.state.tokens.set(record.id, { ...record });
  }

  async get(id: string): Promise<PatRecord | null> {
    const record = this.state.tokens.get(id);
    return record ? { ...record } : null;
  }

  async listForUid(uid: string): Promise<PatRecord[]> {
    return [...this.state.tokens.values()]
      .filter((record) => record.uid === uid)
      .map((record) => ({ ...record }))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async revoke(id: string, revokedBy: string, at: string): Promise<PatRecord | null> {
    const current = this.state.tokens.get(id);
    if (!current) return null;
    const next = current.revokedAt ? current : { ...current, revokedAt: at, revokedBy };
    this.state.tokens.set(id, next);
    return { ...next };
  }
}

class MemoryTransaction implements StorageTransaction {
  readonly keys: KeyRepository;
  readonly committees: CommitteeRepository;
  readonly users: FoundationUserRepository;
  readonly tokens: TokenRepository;
  private finished = false;

  constructor(
    private readonly working: MemoryState,
    private readonly onCommit: (state: MemoryState) => void,
    private readonly release: () => void
  ) {
    this.keys = new MemoryKeyRepository(working);
    this.committees = new MemoryCommitteeRepository(working);
    this.users = new MemoryUserRepository(working);
    this.tokens = new MemoryTokenRepository(working);
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.onCommit(this.working);
    this.finish();
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    this.finish();
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("transaction already finished");
    }
  }

  private finish(): void {
    this.finished = true;
    this.release();
  }
}

/**
 * In-process backend. Each transaction works on a private copy of the state
 * and publishes it on commit; transactions run one at a time.
 */
export class MemoryStorageBackend implements StorageBackend {
  private state: MemoryState;
  private tail: Promise<void> = Promise.resolve();
  private unavailable = false;

  constructor(seed: MemorySeed = {}) {
    this.state = {
      keys: new Map(),
      links: new Map(),
      committees: new Map((seed.committees ?? []).map((committee) => [committee.name, structuredClone(committee)])),
      users: new Map((seed.users ?? []).map((user) => [user.uid, { ...user }])),
      tokens: new Map(),
    };
  }

  simulateOutage(unavailable = true): void {
    this.unavailable = unavailable;
  }

  async begin(): Promise<StorageTransaction> {
    this.assertAvailable();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => held);
    await previous;

    return new MemoryTransaction(
      structuredClone(this.state),
      (next) => {
        this.state = next;
      },
      release
    );
  }

  async findTokenByHash(tokenHash: string): Promise<PatRecord | null> {
    this.assertAvailable();
    for (const record of this.state.tokens.values()) {
      if (record.tokenHash === tokenHash) return { ...record };
    }
    return null;
  }

  async healthcheck(): Promise<StorageHealth> {
    return this.unavailable
      ? { ok: false, latencyMs: 0, error: "memory backend marked unavailable" }
      : { ok: true, latencyMs: 0 };
  }

  async close(): Promise<void> {
    await this.tail;
  }

  storedFingerprints(): string[] {
    return [...this.state.keys.keys()].sort((a, b) => a.localeCompare(b));
  }

  linkedFingerprints(committee: string): string[] {
    return [...(this.state.links.get(committee) ?? [])].sort((a, b) => a.localeCompare(b));
  }

  tokenRecords(): PatRecord[] {
    return [...this.state.tokens.values()].map((record) => ({ ...record }));
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new AccessError("UNAVAILABLE", "storage backend unavailable");
    }
  }
}
