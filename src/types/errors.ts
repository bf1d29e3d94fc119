export type AccessErrorCode =
  | "UNAUTHENTICATED"
  | "INVALID_CREDENTIAL"
  | "EXPIRED"
  | "REVOKED"
  | "INVALID_SIGNATURE"
  | "MALFORMED"
  | "INSUFFICIENT_PRIVILEGE"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "UNAVAILABLE";

/**
 * Raised for token and capability faults. These abort the request, unlike
 * domain faults, which travel inside Outcome values.
 */
export class AccessError extends Error {
  constructor(
    readonly code: AccessErrorCode,
    message: string,
    readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "AccessError";
  }
}

export type DomainErrorCode =
  | "KEY_MALFORMED"
  | "KEY_UNSUPPORTED"
  | "KEY_NOT_FOUND"
  | "COMMITTEE_NOT_FOUND"
  | "FOUNDATION_UID_MISSING"
  | "FOUNDATION_UID_MISMATCH"
  | "ARTIFACT_WRITE_FAILED";

export class DomainError extends Error {
  constructor(
    readonly code: DomainErrorCode,
    message: string,
    readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export function isAccessError(error: unknown, code?: AccessErrorCode): error is AccessError {
  if (!(error instanceof AccessError)) return false;
  return code === undefined || error.code === code;
}

export function isDomainError(error: unknown, code?: DomainErrorCode): error is DomainError {
  if (!(error instanceof DomainError)) return false;
  return code === undefined || error.code === code;
}

export function httpStatusFor(code: AccessErrorCode): number {
  switch (code) {
    case "UNAUTHENTICATED":
    case "INVALID_CREDENTIAL":
    case "EXPIRED":
    case "REVOKED":
    case "INVALID_SIGNATURE":
    case "MALFORMED":
      return 401;
    case "INSUFFICIENT_PRIVILEGE":
    case "FORBIDDEN":
      return 403;
    case "NOT_FOUND":
      return 404;
    case "UNAVAILABLE":
      return 503;
  }
}
