import { getApps, initializeApp } from "firebase-admin/app";
import { getAuth, type DecodedIdToken } from "firebase-admin/auth";
import { createPrincipal, type Principal } from "../types/core";
import { AccessError } from "../types/errors";

/** Resolves an identity provider ID token to a foundation principal. */
export type IdentityVerifier = (idToken: string) => Promise<Principal>;

export function parseBearerToken(authorizationHeader: string | undefined): string {
  if (!authorizationHeader) {
    throw new AccessError("UNAUTHENTICATED", "missing Authorization header");
  }
  const match = authorizationHeader.match(/^Bearer\s+(\S+)\s*$/i);
  if (!match?.[1]) {
    throw new AccessError("MALFORMED", "Authorization header must use the Bearer scheme");
  }
  return match[1];
}

function ensureFirebaseAdmin(projectId: string | undefined): void {
  if (getApps().length > 0) return;
  initializeApp(projectId ? { projectId } : undefined);
}

/**
 * Verifies Firebase Auth ID tokens. The foundation uid comes from the
 * `asfuid` custom claim when present, otherwise from the Firebase uid.
 */
export function createFirebaseIdentityVerifier(options: { projectId?: string } = {}): IdentityVerifier {
  return async (idToken) => {
    ensureFirebaseAdmin(options.projectId);
    let decoded: DecodedIdToken;
    try {
      decoded = await getAuth().verifyIdToken(idToken);
    } catch (error) {
      throw new AccessError("INVALID_CREDENTIAL", "identity provider token rejected", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const foundationUid = typeof decoded.asfuid === "string" && decoded.asfuid.trim() ? decoded.asfuid : decoded.uid;
    return createPrincipal(foundationUid, "identity_provider");
  };
}
