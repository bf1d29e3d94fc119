import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createLogger } from "../../config/logger";
import { buildKeyFixture, type KeyFixture } from "../../keys/testing/fixtures";
import type { CommitteeRecord, FoundationUserRecord } from "../../stores/interfaces";
import { MemoryStorageBackend } from "../../stores/memoryStores";
import { createPrincipal, type AuthenticationSource, type Principal } from "../../types/core";
import type { WriteEvent } from "../context";
import type { StorageSessionDeps } from "../session";

export const FIXED_NOW = new Date("2024-05-01T00:00:00.000Z");

export const COMMITTEES: CommitteeRecord[] = [
  { name: "tooling", displayName: "Apache Tooling", members: ["alice"], participants: ["bob"] },
  { name: "incubator", displayName: "Apache Incubator", members: ["carol"], participants: [] },
];

export const USERS: FoundationUserRecord[] = [
  { uid: "alice", fullName: "Alice Example", isCommitter: true },
  { uid: "bob", fullName: "Bob Example", isCommitter: true },
  { uid: "carol", fullName: "Carol Example", isCommitter: true },
  { uid: "dave", fullName: "Dave Example", isCommitter: true },
  { uid: "erin", fullName: "Erin Example", isCommitter: false },
];

export const ADMIN_UID = "root";

export type Harness = {
  backend: MemoryStorageBackend;
  deps: StorageSessionDeps;
  stateDir: string;
  writes: WriteEvent[];
  cleanup: () => Promise<void>;
};

export async function createHarness(overrides: Partial<StorageSessionDeps> = {}): Promise<Harness> {
  const stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "warden-state-"));
  const backend = new MemoryStorageBackend({ committees: COMMITTEES, users: USERS });
  const writes: WriteEvent[] = [];
  const deps: StorageSessionDeps = {
    backend,
    logger: createLogger("error", { sink: () => undefined }),
    stateDir,
    foundationEmailDomain: "apache.org",
    adminUids: [ADMIN_UID],
    now: () => FIXED_NOW,
    onWrite: (event) => {
      writes.push(event);
    },
    ...overrides,
  };
  return {
    backend,
    deps,
    stateDir,
    writes,
    cleanup: () => fs.rm(stateDir, { recursive: true, force: true }),
  };
}

export function principal(uid: string, via: AuthenticationSource = "session_token"): Principal {
  return createPrincipal(uid, via);
}

export function ownedKey(seed: number, uid: string): KeyFixture {
  return buildKeyFixture({ seed, userIds: [`${uid} <${uid}@apache.org>`] });
}
