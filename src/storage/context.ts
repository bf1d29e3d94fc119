import type { Principal } from "../types/core";
import type { CommitteeRecord, StorageTransaction } from "../stores/interfaces";
import type { ArtifactStaging } from "./artifacts";
import type { PrivilegeLevel } from "./capabilities";

export type WriteEvent = {
  action: string;
  subject: string;
  principal: string | null;
  level: PrivilegeLevel;
  committee: string | null;
  at: string;
};

/** Called once for every mediated write after it has been applied to the transaction. */
export type WriteHook = (event: WriteEvent) => void | Promise<void>;

/** What writer modules see of the session that created them. */
export interface SessionContext {
  readonly principal: Principal | null;
  readonly stateDir: string;
  readonly foundationEmailDomain: string;
  readonly artifacts: ArtifactStaging;
  now(): Date;
  /** Throws once the session has been committed or rolled back. */
  tx(): StorageTransaction;
  isAdministrator(): boolean;
  mediate<T>(write: { action: string; subject: string; scope: CapabilityScope }, perform: () => Promise<T>): Promise<T>;
}

export type CapabilityScope = {
  ctx: SessionContext;
  level: PrivilegeLevel;
  committee: CommitteeRecord | null;
};
