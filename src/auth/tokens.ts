import crypto from "node:crypto";
import { z } from "zod";
import type { Logger } from "../config/logger";
import type { StorageSession } from "../storage/session";
import type { PatLookup } from "../stores/interfaces";
import { createPrincipal, type Principal } from "../types/core";
import { AccessError } from "../types/errors";
import { hashPatSecret, type IssuedPat, type PatView } from "./pat";

export const JWT_TTL_SECONDS = 90 * 60;

const SIGNING_SECRET_BYTES = 32;

const JWT_HEADER = { alg: "HS256", typ: "JWT" } as const;

// An unpadded base64url HMAC-SHA256 digest.
const SIGNATURE_SEGMENT = /^[A-Za-z0-9_-]{43}$/;

export type SigningSecret = {
  readonly key: Buffer;
  readonly createdAt: string;
};

/** Generated once per process. Restarting the process invalidates every JWT. */
export function createSigningSecret(now: Date = new Date()): SigningSecret {
  return Object.freeze({ key: crypto.randomBytes(SIGNING_SECRET_BYTES), createdAt: now.toISOString() });
}

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().uuid(),
});

export type SessionClaims = z.infer<typeof ClaimsSchema>;

const HeaderSchema = z.object({
  alg: z.literal("HS256"),
  typ: z.literal("JWT").optional(),
});

export type IssuedJwt = {
  jwt: string;
  claims: SessionClaims;
};

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf8").toString("base64url");
}

function decodeSegment(segment: string): unknown {
  if (!/^[A-Za-z0-9_-]+$/.test(segment)) {
    throw new AccessError("MALFORMED", "token segment is not base64url");
  }
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch (error) {
    throw new AccessError("MALFORMED", "token segment is not JSON", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function epochSeconds(at: Date): number {
  return Math.floor(at.getTime() / 1000);
}

export class TokenService {
  private readonly secret: SigningSecret;
  private readonly pats: PatLookup;
  private readonly now: () => Date;
  private readonly logger: Logger | null;

  constructor(options: { secret: SigningSecret; pats: PatLookup; now?: () => Date; logger?: Logger }) {
    this.secret = options.secret;
    this.pats = options.pats;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? null;
  }

  /** Mints a PAT for the session's principal. The plaintext is returned only here. */
  async issuePat(session: StorageSession, label: string | null): Promise<IssuedPat> {
    const committer = await session.asFoundationCommitter();
    const issued = await committer.tokens.issue(label);
    this.logger?.info("pat_issued", { uid: committer.uid, patId: issued.token.id });
    return issued;
  }

  async revokePat(session: StorageSession, patId: string): Promise<PatView> {
    const committer = await session.asFoundationCommitter();
    const revoked = await committer.tokens.revoke(patId);
    this.logger?.info("pat_revoked", { uid: committer.uid, patId });
    return revoked;
  }

  /** Exchanges a PAT for a session token. Needs no prior session token. */
  async issueJwt(uid: string, plaintextPat: string): Promise<IssuedJwt> {
    const record = await this.pats.findTokenByHash(hashPatSecret(plaintextPat));
    if (!record || record.uid !== uid) {
      this.logger?.info("jwt_exchange_refused", { uid, code: "INVALID_CREDENTIAL" });
      throw new AccessError("INVALID_CREDENTIAL", "personal access token not recognised");
    }
    if (record.revokedAt) {
      this.logger?.info("jwt_exchange_refused", { uid, code: "REVOKED", patId: record.id });
      throw new AccessError("REVOKED", "personal access token has been revoked", { patId: record.id });
    }
    const now = this.now();
    if (Date.parse(record.expiresAt) <= now.getTime()) {
      this.logger?.info("jwt_exchange_refused", { uid, code: "EXPIRED", patId: record.id });
      throw new AccessError("EXPIRED", "personal access token has expired", { patId: record.id });
    }

    const iat = epochSeconds(now);
    const claims: SessionClaims = { sub: record.uid, iat, exp: iat + JWT_TTL_SECONDS, jti: crypto.randomUUID() };
    return { jwt: this.sign(claims), claims };
  }

  /** Pure computation: no store is consulted, so a valid JWT cannot be revoked early. */
  verifyJwt(token: string): Principal {
    const claims = this.verifyClaims(token);
    return createPrincipal(claims.sub, "session_token");
  }

  verifyClaims(token: string): SessionClaims {
    const segments = token.split(".");
    if (segments.length !== 3) {
      throw new AccessError("MALFORMED", "token must have three segments");
    }
    const [headerSegment = "", claimsSegment = "", signatureSegment = ""] = segments;
    if (!HeaderSchema.safeParse(decodeSegment(headerSegment)).success) {
      throw new AccessError("MALFORMED", "unsupported token header");
    }

    if (!SIGNATURE_SEGMENT.test(signatureSegment)) {
      throw new AccessError("MALFORMED", "token signature is not a base64url HS256 digest");
    }
    // Only the canonical encoding of the digest verifies.
    const expected = Buffer.from(this.signature(`${headerSegment}.${claimsSegment}`).toString("base64url"), "utf8");
    const provided = Buffer.from(signatureSegment, "utf8");
    if (!crypto.timingSafeEqual(provided, expected)) {
      throw new AccessError("INVALID_SIGNATURE", "token signature does not match");
    }

    const parsed = ClaimsSchema.safeParse(decodeSegment(claimsSegment));
    if (!parsed.success) {
      throw new AccessError("MALFORMED", "token claims are invalid", {
        issues: parsed.error.issues.map((issue) => issue.path.join(".")),
      });
    }
    if (epochSeconds(this.now()) >= parsed.data.exp) {
      throw new AccessError("EXPIRED", "session token has expired", { jti: parsed.data.jti });
    }
    return parsed.data;
  }

  private sign(claims: SessionClaims): string {
    const signingInput = `${encodeSegment(JWT_HEADER)}.${encodeSegment(claims)}`;
    return `${signingInput}.${this.signature(signingInput).toString("base64url")}`;
  }

  private signature(signingInput: string): Buffer {
    return crypto.createHmac("sha256", this.secret.key).update(signingInput, "utf8").digest();
  }
}
