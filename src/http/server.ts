import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import { z, ZodError } from "zod";
import type { Logger } from "../config/logger";
import { parseBearerToken, type IdentityVerifier } from "../auth/identity";
import type { TokenService } from "../auth/tokens";
import { checkKeys, regenerateAllKeysFiles } from "../storage/admin";
import type { ImportedKey, KeysFileArtifact } from "../storage/capabilities";
import { Outcomes, type Outcome } from "../storage/outcome";
import { settleDeletion, settleKeysFile, settleKeysFiles, settleUpload, settleWithKeysFile } from "../storage/settle";
import { withStorageSession, type StorageSession, type StorageSessionDeps } from "../storage/session";
import type { PublicSigningKeyRecord } from "../stores/interfaces";
import type { Principal } from "../types/core";
import { httpStatusFor, isAccessError, isDomainError, type DomainErrorCode } from "../types/errors";

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

// Credentials must never travel in a URL, where proxies and logs keep them.
const CREDENTIAL_QUERY_PARAMS = ["jwt", "pat", "token", "access_token"];

const COMMITTEE_ROUTE = /^\/api\/committees\/([a-z0-9][a-z0-9-]*)\/(keys|keys\/associate|keys\/remove|keys\/delete-all|keys-file\/regenerate)$/;
const KEY_ROUTE = /^\/api\/keys\/([0-9A-Fa-f]{40})$/;

const JwtExchangeSchema = z.object({
  asfuid: z.string().trim().min(1).max(64),
  pat: z.string().min(1).max(256),
});

const PatIssueSchema = z.object({
  label: z.string().max(120).nullable().optional(),
});

const PatRevokeSchema = z.object({
  id: z.string().min(1).max(64),
});

const KeysUploadSchema = z.object({
  keys: z.string().min(1),
});

const KeyCheckSchema = z.object({
  fix: z.boolean().optional(),
});

const FingerprintSchema = z.object({
  fingerprint: z.string().min(1).max(80),
});

class RequestBodyError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "RequestBodyError";
  }
}

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > maxBytes) {
      throw new RequestBodyError(413, `request body exceeds ${maxBytes} bytes`);
    }
    chunks.push(buffer);
  }
  if (!chunks.length) return {};
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new RequestBodyError(400, "request body is not valid JSON");
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function domainStatusFor(code: DomainErrorCode): number {
  switch (code) {
    case "KEY_NOT_FOUND":
    case "COMMITTEE_NOT_FOUND":
      return 404;
    case "KEY_MALFORMED":
    case "KEY_UNSUPPORTED":
    case "FOUNDATION_UID_MISSING":
      return 400;
    case "FOUNDATION_UID_MISMATCH":
      return 409;
    case "ARTIFACT_WRITE_FAILED":
      return 500;
  }
}

function keyView(key: PublicSigningKeyRecord): Record<string, unknown> {
  return {
    fingerprint: key.fingerprint,
    keyId: key.keyId,
    algorithm: key.algorithm,
    bits: key.bits,
    createdAt: key.createdAt,
    primaryUid: key.primaryUid,
    foundationUid: key.foundationUid,
    uploadedBy: key.uploadedBy,
    armored: key.armored,
  };
}

function importedView(imported: ImportedKey): Record<string, unknown> {
  return {
    status: imported.status,
    fingerprint: imported.key.fingerprint,
    foundationUid: imported.key.foundationUid,
  };
}

function keysFileView(artifact: KeysFileArtifact): Record<string, unknown> {
  return { committee: artifact.committee, keyCount: artifact.keyCount };
}

function outcomeView<T>(outcome: Outcome<T>, project: (value: T) => unknown): Record<string, unknown> {
  switch (outcome.kind) {
    case "result":
      return { status: "ok", value: project(outcome.value) };
    case "warning":
      return {
        status: "warning",
        value: project(outcome.value),
        message: outcome.warning.message,
        code: isDomainError(outcome.warning) ? outcome.warning.code : undefined,
      };
    case "exception":
      return {
        status: "error",
        message: outcome.error.message,
        code: isDomainError(outcome.error) ? outcome.error.code : undefined,
        partial: outcome.partial === null ? undefined : project(outcome.partial),
      };
  }
}

/** The HTTP status for a single-outcome response: a failed outcome answers with its domain code. */
function outcomeStatus(outcome: Outcome<unknown>, success = 200): number {
  if (outcome.kind !== "exception") return success;
  return isDomainError(outcome.error) ? domainStatusFor(outcome.error.code) : 500;
}

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  storage: StorageSessionDeps;
  tokens: TokenService;
  verifyIdentity: IdentityVerifier;
  allowedOrigins?: string[];
  maxBodyBytes?: number;
}): http.Server {
  const { host, port, logger, storage, tokens, verifyIdentity, allowedOrigins = [], maxBodyBytes = DEFAULT_MAX_BODY_BYTES } =
    params;

  const isOriginAllowed = (origin: string | null): boolean => {
    if (!origin) return true;
    return allowedOrigins.includes(origin);
  };

  const corsHeadersFor = (origin: string | null): Record<string, string> => {
    if (!origin || !isOriginAllowed(origin)) return {};
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-headers": "content-type, authorization",
      "access-control-allow-methods": "GET,POST,OPTIONS",
      "access-control-max-age": "600",
      vary: "Origin",
    };
  };

  const server = http.createServer(async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    const originHeader = req.headers.origin ?? null;
    const corsHeaders = corsHeadersFor(originHeader);
    const abort = new AbortController();
    let statusCode = 500;
    let uid: string | null = null;

    res.on("close", () => {
      if (!res.writableFinished) {
        abort.abort(new Error("client closed the connection"));
      }
    });

    const sendJson = (status: number, payload: Record<string, unknown>) => {
      statusCode = status;
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", ...corsHeaders, "x-request-id": requestId }));
      res.end(JSON.stringify(payload));
    };

    const sessionToken = (): Principal => {
      const principal = tokens.verifyJwt(parseBearerToken(firstHeader(req.headers.authorization)));
      uid = principal.uid;
      return principal;
    };

    const identity = async (): Promise<Principal> => {
      const principal = await verifyIdentity(parseBearerToken(firstHeader(req.headers.authorization)));
      uid = principal.uid;
      return principal;
    };

    const write = async <T>(
      principal: Principal,
      work: (session: StorageSession) => Promise<T>
    ): Promise<{ value: T; published: Outcomes<string> }> => {
      let published = new Outcomes<string>();
      const value = await withStorageSession(storage, principal, work, {
        signal: abort.signal,
        onPublish: (outcomes) => {
          published = outcomes;
        },
      });
      return { value, published };
    };

    const read = <T>(principal: Principal | null, work: (session: StorageSession) => Promise<T>): Promise<T> =>
      withStorageSession(storage, principal, work, { signal: abort.signal, readOnly: true });

    try {
      if (method === "OPTIONS") {
        statusCode = isOriginAllowed(originHeader) ? 204 : 403;
        res.writeHead(statusCode, withSecurityHeaders({ ...corsHeaders, "x-request-id": requestId }));
        res.end();
        return;
      }

      if (CREDENTIAL_QUERY_PARAMS.some((name) => url.searchParams.has(name))) {
        sendJson(400, { ok: false, code: "CREDENTIAL_IN_URL", message: "Credentials must not be sent in the URL." });
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        sendJson(200, { ok: true, service: "release-warden", at: new Date().toISOString() });
        return;
      }

      if (method === "GET" && url.pathname === "/readyz") {
        const health = await storage.backend.healthcheck();
        sendJson(health.ok ? 200 : 503, { ok: health.ok, checks: { storage: health }, at: new Date().toISOString() });
        return;
      }

      if (method === "POST" && url.pathname === "/api/jwt") {
        const body = JwtExchangeSchema.parse(await readJsonBody(req, maxBodyBytes));
        const issued = await tokens.issueJwt(body.asfuid, body.pat);
        uid = issued.claims.sub;
        sendJson(200, { asfuid: issued.claims.sub, jwt: issued.jwt });
        return;
      }

      if (url.pathname === "/api/pats" && (method === "GET" || method === "POST")) {
        const principal = await identity();
        if (method === "GET") {
          const listed = await read(principal, async (session) => (await session.asFoundationCommitter()).tokens.list());
          sendJson(200, { ok: true, tokens: listed });
          return;
        }
        const body = PatIssueSchema.parse(await readJsonBody(req, maxBodyBytes));
        const { value: issued } = await write(principal, (session) => tokens.issuePat(session, body.label ?? null));
        sendJson(201, { ok: true, pat: issued.plaintext, token: issued.token });
        return;
      }

      if (method === "POST" && url.pathname === "/api/pats/revoke") {
        const principal = await identity();
        const body = PatRevokeSchema.parse(await readJsonBody(req, maxBodyBytes));
        const { value: revoked } = await write(principal, (session) => tokens.revokePat(session, body.id));
        sendJson(200, { ok: true, token: revoked });
        return;
      }

      const keyRoute = method === "GET" ? KEY_ROUTE.exec(url.pathname) : null;
      if (keyRoute?.[1]) {
        const fingerprint = keyRoute[1];
        const outcome = await read(null, (session) => session.asGeneralPublic().keys.get(fingerprint));
        sendJson(outcomeStatus(outcome), { ok: outcome.kind !== "exception", ...outcomeView(outcome, keyView) });
        return;
      }

      if (method === "POST" && url.pathname === "/api/keys") {
        const principal = sessionToken();
        const body = KeysUploadSchema.parse(await readJsonBody(req, maxBodyBytes));
        const { value: outcomes } = await write(principal, async (session) =>
          (await session.asFoundationCommitter()).keys.ensureStored(body.keys)
        );
        sendJson(200, { ok: outcomes.exceptionCount === 0, report: outcomes.report(importedView) });
        return;
      }

      if (method === "POST" && url.pathname === "/api/keys/delete") {
        const principal = sessionToken();
        const body = FingerprintSchema.parse(await readJsonBody(req, maxBodyBytes));
        const deleted = await write(principal, async (session) =>
          (await session.asFoundationCommitter()).keys.deleteKey(body.fingerprint)
        );
        const outcome = settleDeletion(deleted.value, deleted.published);
        sendJson(outcomeStatus(outcome), {
          ok: outcome.kind !== "exception",
          ...outcomeView(outcome, (deletion) => ({
            fingerprint: deletion.fingerprint,
            committees: deletion.committees,
            keysFiles: deletion.keysFiles.report(keysFileView),
          })),
        });
        return;
      }

      if (method === "POST" && url.pathname === "/api/admin/keys/regenerate-all") {
        const principal = sessionToken();
        const regenerated = await write(principal, (session) => regenerateAllKeysFiles(session));
        const outcomes = settleKeysFiles(regenerated.value, regenerated.published);
        sendJson(200, { ok: outcomes.exceptionCount === 0, report: outcomes.report(keysFileView) });
        return;
      }

      if (method === "POST" && url.pathname === "/api/admin/keys/check") {
        const principal = sessionToken();
        const body = KeyCheckSchema.parse(await readJsonBody(req, maxBodyBytes));
        const checked = await write(principal, (session) => checkKeys(session, { fix: body.fix ?? false }));
        const keysFiles = settleKeysFiles(checked.value.keysFiles, checked.published);
        sendJson(200, {
          ok: checked.value.keys.exceptionCount === 0 && keysFiles.exceptionCount === 0,
          report: checked.value.keys.report(),
          keysFiles: keysFiles.report(keysFileView),
        });
        return;
      }

      const committeeRoute = COMMITTEE_ROUTE.exec(url.pathname);
      if (committeeRoute?.[1] && committeeRoute[2]) {
        const committee = committeeRoute[1];
        const action = committeeRoute[2];

        if (method === "GET" && action === "keys") {
          const outcome = await read(null, (session) => session.asGeneralPublic().keys.forCommittee(committee));
          sendJson(outcomeStatus(outcome), {
            ok: outcome.kind !== "exception",
            ...outcomeView(outcome, (keys) => keys.map(keyView)),
          });
          return;
        }

        if (method === "POST" && action === "keys") {
          const principal = sessionToken();
          const body = KeysUploadSchema.parse(await readJsonBody(req, maxBodyBytes));
          const uploaded = await write(principal, async (session) =>
            (await session.asCommitteeParticipant(committee)).keys.ensureAssociated(body.keys)
          );
          const upload = settleUpload(uploaded.value, uploaded.published);
          sendJson(200, {
            ok: upload.keys.exceptionCount === 0,
            report: upload.keys.report(importedView),
            keysFile: upload.keysFile ? outcomeView(upload.keysFile, keysFileView) : null,
          });
          return;
        }

        if (method === "POST" && action === "keys/associate") {
          const principal = sessionToken();
          const body = FingerprintSchema.parse(await readJsonBody(req, maxBodyBytes));
          const associated = await write(principal, async (session) =>
            (await session.asCommitteeParticipant(committee)).keys.associateFingerprint(body.fingerprint)
          );
          const outcome = settleWithKeysFile(associated.value, associated.published);
          sendJson(outcomeStatus(outcome), {
            ok: outcome.kind !== "exception",
            ...outcomeView(outcome, (association) => ({
              committee: association.committee,
              fingerprint: association.fingerprint,
              linked: association.linked,
              keysFile: outcomeView(association.keysFile, keysFileView),
            })),
          });
          return;
        }

        if (method === "POST" && action === "keys/remove") {
          const principal = sessionToken();
          const body = FingerprintSchema.parse(await readJsonBody(req, maxBodyBytes));
          const removed = await write(principal, async (session) =>
            (await session.asCommitteeMember(committee)).keys.removeAssociation(body.fingerprint)
          );
          const outcome = settleWithKeysFile(removed.value, removed.published);
          sendJson(outcomeStatus(outcome), {
            ok: outcome.kind !== "exception",
            ...outcomeView(outcome, (removal) => ({
              committee: removal.committee,
              fingerprint: removal.fingerprint,
              keysFile: outcomeView(removal.keysFile, keysFileView),
            })),
          });
          return;
        }

        if (method === "POST" && action === "keys-file/regenerate") {
          const principal = sessionToken();
          const regenerated = await write(principal, async (session) =>
            (await session.asCommitteeMember(committee)).keys.autogenerateKeysFile()
          );
          const outcome = settleKeysFile(regenerated.value, regenerated.published);
          sendJson(outcomeStatus(outcome), { ok: outcome.kind !== "exception", ...outcomeView(outcome, keysFileView) });
          return;
        }

        if (method === "POST" && action === "keys/delete-all") {
          const principal = sessionToken();
          const purged = await write(principal, async (session) =>
            (await session.asCommitteeMember(committee)).keys.deleteAllKeys()
          );
          const outcome = settleWithKeysFile(purged.value, purged.published);
          sendJson(outcomeStatus(outcome), {
            ok: outcome.kind !== "exception",
            ...outcomeView(outcome, (purge) => ({
              committee: purge.committee,
              unlinked: purge.unlinked,
              deleted: purge.deleted,
              keysFile: outcomeView(purge.keysFile, keysFileView),
            })),
          });
          return;
        }
      }

      sendJson(404, { ok: false, message: "Not found" });
    } catch (error) {
      if (isAccessError(error)) {
        sendJson(httpStatusFor(error.code), { ok: false, code: error.code, message: error.message });
        return;
      }
      if (error instanceof ZodError) {
        sendJson(400, {
          ok: false,
          code: "INVALID_REQUEST",
          message: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
        });
        return;
      }
      if (error instanceof RequestBodyError) {
        sendJson(error.statusCode, { ok: false, code: "INVALID_REQUEST", message: error.message });
        return;
      }
      logger.error("warden_http_handler_error", {
        requestId,
        method,
        path: url.pathname,
        message: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        sendJson(500, { ok: false, message: "Internal server error" });
      }
    } finally {
      logger.info("warden_http_request", {
        requestId,
        method,
        path: url.pathname,
        uid,
        statusCode,
        durationMs: Date.now() - startedAt,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("warden_http_listening", { host, port });
  });

  return server;
}
