import type { Pool, PoolClient } from "pg";
import type { PatRecord } from "../auth/pat";
import type { Logger } from "../config/logger";
import { withRetry } from "../connectivity/retry";
import { checkPgConnection, withQueryTimeout } from "../db/postgres";
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

type Queryable = Pick<PoolClient, "query">;

type KeyRow = {
  fingerprint: string;
  key_id: string;
  algorithm: string;
  bits: number | null;
  key_created_at: Date | string;
  primary_uid: string | null;
  foundation_uid: string | null;
  armored: string;
  uploaded_by: string;
  uploaded_at: Date | string;
};

type CommitteeRow = {
  name: string;
  display_name: string;
  members: string[] | null;
  participants: string[] | null;
};

type UserRow = {
  uid: string;
  full_name: string | null;
  is_committer: boolean;
};

type TokenRow = {
  id: string;
  uid: string;
  token_hash: string;
  label: string | null;
  created_at: Date | string;
  expires_at: Date | string;
  revoked_at: Date | string | null;
  revoked_by: string | null;
};

const KEY_COLUMNS =
  "k.fingerprint, k.key_id, k.algorithm, k.bits, k.key_created_at, k.primary_uid, k.foundation_uid, k.armored, k.uploaded_by, k.uploaded_at";
const TOKEN_COLUMNS = "id, uid, token_hash, label, created_at, expires_at, revoked_at, revoked_by";

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toKeyRecord(row: KeyRow): PublicSigningKeyRecord {
  return {
    fingerprint: row.fingerprint,
    keyId: row.key_id,
    algorithm: row.algorithm,
    bits: row.bits,
    createdAt: toIso(row.key_created_at),
    primaryUid: row.primary_uid,
    foundationUid: row.foundation_uid,
    armored: row.armored,
    uploadedBy: row.uploaded_by,
    uploadedAt: toIso(row.uploaded_at),
  };
}

export function toCommitteeRecord(row: CommitteeRow): CommitteeRecord {
  return {
    name: row.name,
    displayName: row.display_name,
    members: row.members ?? [],
    participants: row.participants ?? [],
  };
}

export function toPatRecord(row: TokenRow): PatRecord {
  return {
    id: row.id,
    uid: row.uid,
    tokenHash: row.token_hash,
    label: row.label,
    createdAt: toIso(row.created_at),
    expiresAt: toIso(row.expires_at),
    revokedAt: row.revoked_at === null ? null : toIso(row.revoked_at),
    revokedBy: row.revoked_by,
  };
}

class PostgresKeyRepository implements KeyRepository {
  constructor(private readonly db: Queryable) {}

  async get(fingerprint: string): Promise<PublicSigningKeyRecord | null> {
    const result = await this.db.query<KeyRow>(
      `SELECT ${KEY_COLUMNS} FROM warden_public_signing_keys k WHERE k.fingerprint = $1`,
      [fingerprint]
    );
    const row = result.rows[0];
    return row ? toKeyRecord(row) : null;
  }

  async insert(record: PublicSigningKeyRecord): Promise<boolean> {
    const result = await this.db.query(
      `
      INSERT INTO warden_public_signing_keys (
        fingerprint, key_id, algorithm, bits, key_created_at, primary_uid, foundation_uid, armored, uploaded_by, uploaded_at
      )
      VALUES ($1,$2,$3,$4,$5::timestamptz,$6,$7,$8,$9,$10::timestamptz)
      ON CONFLICT (fingerprint) DO NOTHING
      `,
      [
        record.fingerprint,
        record.keyId,
        record.algorithm,
        record.bits,
        record.createdAt,
        record.primaryUid,
        record.foundationUid,
        record.armored,
        record.uploadedBy,
        record.uploadedAt,
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async list(): Promise<PublicSigningKeyRecord[]> {
    const result = await this.db.query<KeyRow>(
      `SELECT ${KEY_COLUMNS} FROM warden_public_signing_keys k ORDER BY k.fingerprint`
    );
    return result.rows.map(toKeyRecord);
  }

  async setFoundationUid(fingerprint: string, foundationUid: string | null): Promise<boolean> {
    const result = await this.db.query(
      "UPDATE warden_public_signing_keys SET foundation_uid = $2 WHERE fingerprint = $1",
      [fingerprint, foundationUid]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(fingerprint: string): Promise<boolean> {
    const result = await this.db.query("DELETE FROM warden_public_signing_keys WHERE fingerprint = $1", [fingerprint]);
    return (result.rowCount ?? 0) > 0;
  }

  async listForCommittee(committee: string): Promise<PublicSigningKeyRecord[]> {
    const result = await this.db.query<KeyRow>(
      `
      SELECT ${KEY_COLUMNS}
      FROM warden_public_signing_keys k
      JOIN warden_committee_keys ck ON ck.fingerprint = k.fingerprint
      WHERE ck.committee_name = $1
      ORDER BY k.fingerprint
      `,
      [committee]
    );
    return result.rows.map(toKeyRecord);
  }

  async committeesForKey(fingerprint: string): Promise<string[]> {
    const result = await this.db.query<{ committee_name: string }>(
      "SELECT committee_name FROM warden_committee_keys WHERE fingerprint = $1 ORDER BY committee_name",
      [fingerprint]
    );
    return result.rows.map((row) => row.committee_name);
  }

  async link(committee: string, fingerprint: string): Promise<boolean> {
    const result = await this.db.query(
      "INSERT INTO warden_committee_keys (committee_name, fingerprint) VALUES ($1, $2) ON CONFLICT DO NOTHING",
      [committee, fingerprint]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async unlink(committee: string, fingerprint: string): Promise<boolean> {
    const result = await this.db.query(
      "DELETE FROM warden_committee_keys WHERE committee_name = $1 AND fingerprint = $2",
      [committee, fingerprint]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async unlinkAll(committee: string): Promise<string[]> {
    const result = await this.db.query<{ fingerprint: string }>(
      "DELETE FROM warden_committee_keys WHERE committee_name = $1 RETURNING fingerprint",
      [committee]
    );
    return result.rows.map((row) => row.fingerprint).sort((a, b) => a.localeCompare(b));
  }
}

class PostgresCommitteeRepository implements CommitteeRepository {
  constructor(private readonly db: Queryable) {}

  async get(name: string): Promise<CommitteeRecord | null> {
    const result = await this.db.query<CommitteeRow>(
      "SELECT name, display_name, members, participants FROM warden_committees WHERE name = $1",
      [name]
    );
    const row = result.rows[0];
    return row ? toCommitteeRecord(row) : null;
  }

  async list(): Promise<CommitteeRecord[]> {
    const result = await this.db.query<CommitteeRow>(
      "SELECT name, display_name, members, participants FROM warden_committees ORDER BY name"
    );
    return result.rows.map(toCommitteeRecord);
  }

  async lock(name: string): Promise<boolean> {
    const result = await this.db.query<{ name: string }>(
      "SELECT name FROM warden_committees WHERE name = $1 FOR UPDATE",
      [name]
    );
    return result.rows.length > 0;
  }
}

class PostgresUserRepository implements FoundationUserRepository {
  constructor(private readonly db: Queryable) {}

  async get(uid: string): Promise<FoundationUserRecord | null> {
    const result = await this.db.query<UserRow>(
      "SELECT uid, full_name, is_committer FROM warden_foundation_users WHERE uid = $1",
      [uid]
    );
    const row = result.rows[0];
    return row ? { uid: row.uid, fullName: row.full_name, isCommitter: row.is_committer } : null;
  }
}

class PostgresTokenRepository implements TokenRepository {
  constructor(private readonly db: Queryable) {}

  async insert(record: PatRecord): Promise<void> {
    await this.db.query(
      `
      INSERT INTO warden_personal_access_tokens (${TOKEN_COLUMNS})
      VALUES ($1,$2,$3,$4,$5::timestamptz,$6::timestamptz,$7::timestamptz,$8)
      `,
      [
        record.id,
        record.uid,
        record.tokenHash,
        record.label,
        record.createdAt,
        record.expiresAt,
        record.revokedAt,
        record.revokedBy,
      ]
    );
  }

  async get(id: string): Promise<PatRecord | null> {
    const result = await this.db.query<TokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM warden_personal_access_tokens WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toPatRecord(row) : null;
  }

  async listForUid(uid: string): Promise<PatRecord[]> {
    const result = await this.db.query<TokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM warden_personal_access_tokens WHERE uid = $1 ORDER BY created_at`,
      [uid]
    );
    return result.rows.map(toPatRecord);
  }

  async revoke(id: string, revokedBy: string, at: string): Promise<PatRecord | null> {
    const result = await this.db.query<TokenRow>(
      `
      UPDATE warden_personal_access_tokens
      SET revoked_at = COALESCE(revoked_at, $3::timestamptz),
          revoked_by = COALESCE(revoked_by, $2)
      WHERE id = $1
      RETURNING ${TOKEN_COLUMNS}
      `,
      [id, revokedBy, at]
    );
    const row = result.rows[0];
    return row ? toPatRecord(row) : null;
  }
}

class PostgresTransaction implements StorageTransaction {
  readonly keys: KeyRepository;
  readonly committees: CommitteeRepository;
  readonly users: FoundationUserRepository;
  readonly tokens: TokenRepository;
  private finished = false;

  constructor(private readonly client: PoolClient, private readonly queryTimeoutMs: number) {
    this.keys = new PostgresKeyRepository(client);
    this.committees = new PostgresCommitteeRepository(client);
    this.users = new PostgresUserRepository(client);
    this.tokens = new PostgresTokenRepository(client);
  }

  async commit(): Promise<void> {
    await this.finish("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.finish("ROLLBACK");
  }

  private async finish(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    if (this.finished) {
      throw new Error("transaction already finished");
    }
    this.finished = true;
    try {
      await withQueryTimeout(this.queryTimeoutMs, statement.toLowerCase(), () => this.client.query(statement));
      this.client.release();
    } catch (error) {
      // A connection that failed mid-transaction must not go back to the pool.
      this.client.release(error instanceof Error ? error : true);
      throw error;
    }
  }
}

function isRetryableConnectError(error: unknown): boolean {
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  // 28xxx: invalid authorization; 3D000: unknown database.
  return !(typeof code === "string" && (code.startsWith("28") || code === "3D000"));
}

export class PostgresStorageBackend implements StorageBackend {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
    private readonly queryTimeoutMs: number
  ) {}

  async begin(): Promise<StorageTransaction> {
    let client: PoolClient;
    try {
      client = await withRetry("postgres_session_connect", () => this.pool.connect(), this.logger, {
        attempts: 3,
        baseDelayMs: 100,
        retryable: isRetryableConnectError,
      });
    } catch (error) {
      throw new AccessError("UNAVAILABLE", "storage backend unavailable", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      await withQueryTimeout(this.queryTimeoutMs, "begin", () => client.query("BEGIN"));
    } catch (error) {
      client.release(true);
      throw new AccessError("UNAVAILABLE", "storage backend unavailable", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return new PostgresTransaction(client, this.queryTimeoutMs);
  }

  async findTokenByHash(tokenHash: string): Promise<PatRecord | null> {
    try {
      const result = await withQueryTimeout(this.queryTimeoutMs, "token_lookup", () =>
        this.pool.query<TokenRow>(
          `SELECT ${TOKEN_COLUMNS} FROM warden_personal_access_tokens WHERE token_hash = $1`,
          [tokenHash]
        )
      );
      const row = result.rows[0];
      return row ? toPatRecord(row) : null;
    } catch (error) {
      throw new AccessError("UNAVAILABLE", "storage backend unavailable", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async healthcheck(): Promise<StorageHealth> {
    return checkPgConnection(this.pool, this.logger, this.queryTimeoutMs);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
