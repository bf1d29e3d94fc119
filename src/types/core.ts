export type IsoDateString = string;

export type AuthenticationSource = "identity_provider" | "session_token" | "operator";

/** An authenticated foundation identity. Lives for one request or unit of work. */
export type Principal = {
  readonly uid: string;
  readonly via: AuthenticationSource;
};

export function createPrincipal(uid: string, via: AuthenticationSource): Principal {
  const trimmed = uid.trim();
  if (!trimmed) {
    throw new Error("principal uid must not be empty");
  }
  return Object.freeze({ uid: trimmed, via });
}
