export type WikiRevisionErrorCode =
  | "DOCUMENT_NOT_FOUND"
  | "NO_PUBLISHABLE_REVISION"
  | "NO_MATCHING_REVISIONS"
  | "UNAUTHORIZED"
  | "PARENT_NOT_FOUND"
  | "PARENT_MISMATCH"
  | "INVALID_BASED_ON"
  | "REVISION_NOT_FOUND";

export class WikiRevisionError extends Error {
  readonly code: WikiRevisionErrorCode;
  readonly reason: string | null;

  constructor(
    code: WikiRevisionErrorCode,
    message: string,
    reason: string | null = null,
  ) {
    super(message);
    this.name = "WikiRevisionError";
    this.code = code;
    this.reason = reason;
  }
}

export const REVISIONS_LOGIN_REQUIRED = "revisions_login_required";

export const isWikiRevisionError = (
  error: unknown,
): error is WikiRevisionError => error instanceof WikiRevisionError;
