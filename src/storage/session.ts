import type { Logger } from "../config/logger";
import type { CommitteeRecord, StorageBackend, StorageTransaction } from "../stores/interfaces";
import type { Principal } from "../types/core";
import { AccessError, DomainError } from "../types/errors";
import { ArtifactStaging } from "./artifacts";
import type {
  Administrator,
  CommitteeMember,
  CommitteeParticipant,
  FoundationCommitter,
  GeneralPublic,
  PrivilegeLevel,
} from "./capabilities";
import type { CapabilityScope, SessionContext, WriteHook } from "./context";
import { exception, result, type Outcomes } from "./outcome";
import {
  administratorKeys,
  committeeMemberKeys,
  committeeParticipantKeys,
  foundationCommitterKeys,
  generalPublicKeys,
} from "./writers/keys";
import { foundationCommitterTokens } from "./writers/tokens";

export type StorageSessionDeps = {
  backend: StorageBackend;
  logger: Logger;
  stateDir: string;
  foundationEmailDomain: string;
  adminUids: Iterable<string>;
  now?: () => Date;
  onWrite?: WriteHook;
};

export type StorageSessionOptions = {
  readOnly?: boolean;
  signal?: AbortSignal;
  /** Receives the rename outcome of every staged file once the session has committed. */
  onPublish?: (published: Outcomes<string>) => void;
};

type SessionState = "open" | "committed" | "rolled_back";

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("storage session aborted");
}

/**
 * One unit of work for one principal. Every database and filesystem write
 * the service makes goes through the capability objects handed out here.
 */
export class StorageSession {
  private state: SessionState = "open";
  private readonly admins: ReadonlySet<string>;
  private readonly now: () => Date;
  private readonly context: SessionContext;

  private constructor(
    readonly principal: Principal | null,
    private readonly transaction: StorageTransaction,
    private readonly deps: StorageSessionDeps,
    private readonly artifacts: ArtifactStaging,
    readonly readOnly: boolean,
    private readonly signal: AbortSignal | undefined
  ) {
    this.admins = new Set(deps.adminUids);
    this.now = deps.now ?? (() => new Date());
    this.context = this.buildContext();
  }

  static async open(
    deps: StorageSessionDeps,
    principal: Principal | null,
    options: StorageSessionOptions = {}
  ): Promise<StorageSession> {
    if (options.signal?.aborted) {
      throw abortError(options.signal);
    }
    const transaction = await deps.backend.begin();
    deps.logger.debug("storage_session_open", { uid: principal?.uid ?? null, readOnly: options.readOnly ?? false });
    return new StorageSession(
      principal,
      transaction,
      deps,
      new ArtifactStaging(deps.logger),
      options.readOnly ?? false,
      options.signal
    );
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  isAdministrator(): boolean {
    return this.principal !== null && this.admins.has(this.principal.uid);
  }

  asGeneralPublic(): GeneralPublic {
    const scope = this.scope("general_public", null);
    return {
      level: scope.level,
      keys: generalPublicKeys(scope),
      committees: this.committeeReader(),
    };
  }

  async asFoundationCommitter(): Promise<FoundationCommitter> {
    const uid = await this.requireCommitter("foundation_committer");
    const scope = this.scope("foundation_committer", null);
    return {
      level: scope.level,
      uid,
      keys: foundationCommitterKeys(scope),
      committees: this.committeeReader(),
      tokens: foundationCommitterTokens(scope, uid),
    };
  }

  async asCommitteeParticipant(committeeName: string): Promise<CommitteeParticipant> {
    const uid = await this.requireCommitter("committee_participant");
    const committee = await this.requireCommittee(committeeName);
    if (!this.isAdministrator() && !committee.members.includes(uid) && !committee.participants.includes(uid)) {
      throw this.denied("committee_participant", committee.name);
    }
    const scope = this.scope("committee_participant", committee);
    return {
      level: scope.level,
      uid,
      committee,
      keys: committeeParticipantKeys(scope, committee),
      committees: this.committeeReader(),
      tokens: foundationCommitterTokens(scope, uid),
    };
  }

  async asCommitteeMember(committeeName: string): Promise<CommitteeMember> {
    const uid = await this.requireCommitter("committee_member");
    const committee = await this.requireCommittee(committeeName);
    if (!this.isAdministrator() && !committee.members.includes(uid)) {
      throw this.denied("committee_member", committee.name);
    }
    const scope = this.scope("committee_member", committee);
    return {
      level: scope.level,
      uid,
      committee,
      keys: committeeMemberKeys(scope, committee),
      committees: this.committeeReader(),
      tokens: foundationCommitterTokens(scope, uid),
    };
  }

  async asAdministrator(): Promise<Administrator> {
    if (!this.principal) {
      throw new AccessError("UNAUTHENTICATED", "sign in to use this operation", { level: "administrator" });
    }
    if (!this.isAdministrator()) {
      this.deps.logger.info("storage_capability_denied", { uid: this.principal.uid, level: "administrator", committee: null });
      throw new AccessError("FORBIDDEN", `${this.principal.uid} is not an administrator`);
    }
    const { uid } = this.principal;
    const scope = this.scope("foundation_committer", null);
    return {
      level: scope.level,
      uid,
      keys: administratorKeys(scope),
      committees: this.committeeReader(),
      tokens: foundationCommitterTokens(scope, uid),
    };
  }

  /**
   * Commits the transaction, then moves staged files into place. A file that
   * cannot be moved does not undo the commit; it comes back as an exception
   * keyed by its destination.
   */
  async commit(): Promise<Outcomes<string>> {
    this.assertOpen();
    if (this.signal?.aborted) {
      await this.rollback();
      throw abortError(this.signal);
    }
    try {
      await this.transaction.commit();
    } catch (error) {
      this.state = "rolled_back";
      await this.artifacts.discard();
      this.deps.logger.error("storage_session_commit_failed", { uid: this.principal?.uid ?? null, error });
      throw error;
    }
    this.state = "committed";

    const published = await this.artifacts.publish();
    const log = published.exceptionCount > 0 ? this.deps.logger.warn : this.deps.logger.debug;
    log("storage_session_commit", {
      uid: this.principal?.uid ?? null,
      artifacts: published.size,
      artifactFailures: published.exceptionCount,
    });
    return published;
  }

  async rollback(reason?: unknown): Promise<void> {
    this.assertOpen();
    this.state = "rolled_back";
    try {
      await this.transaction.rollback();
    } finally {
      await this.artifacts.discard();
    }
    if (reason !== undefined) {
      this.deps.logger.warn("storage_session_rollback", { uid: this.principal?.uid ?? null, reason });
    } else {
      this.deps.logger.debug("storage_session_rollback", { uid: this.principal?.uid ?? null });
    }
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`storage session is already ${this.state.replace("_", " ")}`);
    }
  }

  private scope(level: PrivilegeLevel, committee: CommitteeRecord | null): CapabilityScope {
    return { ctx: this.context, level, committee };
  }

  private committeeReader(): GeneralPublic["committees"] {
    const context = this.context;
    return {
      async get(name) {
        const committee = await context.tx().committees.get(name);
        return committee
          ? result(committee)
          : exception(new DomainError("COMMITTEE_NOT_FOUND", `no committee named ${name}`));
      },
      list() {
        return context.tx().committees.list();
      },
    };
  }

  private async requireCommitter(level: PrivilegeLevel): Promise<string> {
    if (!this.principal) {
      throw new AccessError("UNAUTHENTICATED", "sign in to use this operation", { level });
    }
    const { uid } = this.principal;
    if (this.isAdministrator()) return uid;
    const user = await this.context.tx().users.get(uid);
    if (!user?.isCommitter) {
      throw this.denied(level, null);
    }
    return uid;
  }

  private async requireCommittee(name: string): Promise<CommitteeRecord> {
    const committee = await this.context.tx().committees.get(name);
    if (!committee) {
      throw new AccessError("NOT_FOUND", `no committee named ${name}`, { committee: name });
    }
    return committee;
  }

  private denied(level: PrivilegeLevel, committee: string | null): AccessError {
    const uid = this.principal?.uid ?? null;
    this.deps.logger.info("storage_capability_denied", { uid, level, committee });
    return new AccessError(
      "INSUFFICIENT_PRIVILEGE",
      committee ? `${uid} is not eligible for ${level} on ${committee}` : `${uid} is not eligible for ${level}`,
      { level, committee }
    );
  }

  private buildContext(): SessionContext {
    return {
      principal: this.principal,
      stateDir: this.deps.stateDir,
      foundationEmailDomain: this.deps.foundationEmailDomain,
      artifacts: this.artifacts,
      now: () => this.now(),
      isAdministrator: () => this.isAdministrator(),
      tx: () => {
        this.assertOpen();
        return this.transaction;
      },
      mediate: async (write, perform) => {
        this.assertOpen();
        if (this.readOnly) {
          throw new AccessError("FORBIDDEN", "this storage session is read-only", { action: write.action });
        }
        if (this.signal?.aborted) {
          throw abortError(this.signal);
        }
        const value = await perform();
        await this.deps.onWrite?.({
          action: write.action,
          subject: write.subject,
          principal: this.principal?.uid ?? null,
          level: write.scope.level,
          committee: write.scope.committee?.name ?? null,
          at: this.now().toISOString(),
        });
        return value;
      },
    };
  }
}

/**
 * Runs `work` inside a session that commits when it returns and rolls back
 * when it throws or the signal fires. Read-only sessions always roll back.
 */
export async function withStorageSession<T>(
  deps: StorageSessionDeps,
  principal: Principal | null,
  work: (session: StorageSession) => Promise<T>,
  options: StorageSessionOptions = {}
): Promise<T> {
  const session = await StorageSession.open(deps, principal, options);
  let value: T;
  try {
    value = await work(session);
  } catch (error) {
    if (session.isOpen) {
      await session.rollback(error).catch((rollbackError: unknown) => {
        deps.logger.error("storage_session_rollback_failed", { uid: principal?.uid ?? null, error: rollbackError });
      });
    }
    throw error;
  }

  if (!session.isOpen) {
    return value;
  }
  if (options.readOnly) {
    await session.rollback();
  } else {
    options.onPublish?.(await session.commit());
  }
  return value;
}
