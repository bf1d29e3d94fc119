import crypto from "node:crypto";
import type { IsoDateString } from "../types/core";

export const PAT_TTL_DAYS = 180;

const PAT_SECRET_BYTES = 32;

export type PatRecord = {
  id: string;
  uid: string;
  tokenHash: string;
  label: string | null;
  createdAt: IsoDateString;
  expiresAt: IsoDateString;
  revokedAt: IsoDateString | null;
  revokedBy: string | null;
};

/** The shape handed back to callers: everything except the stored hash. */
export type PatView = Omit<PatRecord, "tokenHash">;

export type IssuedPat = {
  plaintext: string;
  token: PatView;
};

export function generatePatSecret(): string {
  return crypto.randomBytes(PAT_SECRET_BYTES).toString("base64url");
}

export function hashPatSecret(plaintext: string): string {
  return crypto.createHash("sha3-256").update(plaintext, "utf8").digest("hex");
}

export function patExpiry(createdAt: Date): Date {
  return new Date(createdAt.getTime() + PAT_TTL_DAYS * 24 * 60 * 60 * 1000);
}

export function toPatView(record: PatRecord): PatView {
  const { tokenHash: _tokenHash, ...view } = record;
  return view;
}

export function buildPatRecord(input: { uid: string; label: string | null; plaintext: string; at: Date }): PatRecord {
  return {
    id: crypto.randomUUID(),
    uid: input.uid,
    tokenHash: hashPatSecret(input.plaintext),
    label: input.label,
    createdAt: input.at.toISOString(),
    expiresAt: patExpiry(input.at).toISOString(),
    revokedAt: null,
    revokedBy: null,
  };
}
