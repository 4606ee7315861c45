import {
  REVISIONS_LOGIN_REQUIRED,
  WikiRevisionError,
} from "./errors";
import type {
  HistoryAccess,
  HistoryWindowRequest,
  LinkedRevision,
  RevisionWindow,
} from "./types";

/** Page size used when the request carries no `limit` at all. */
export const DEFAULT_REVISIONS_LIMIT = 10;
/** Page size used when `limit` is present but is not a positive integer. */
export const REVISIONS_PER_PAGE = 100;

export const ALL_REVISIONS = "all";

export interface PaginationDefaults {
  defaultLimit: number;
  fallbackPerPage: number;
}

export const DEFAULT_PAGINATION: PaginationDefaults = {
  defaultLimit: DEFAULT_REVISIONS_LIMIT,
  fallbackPerPage: REVISIONS_PER_PAGE,
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

const parseInteger = (value: string): number | null => {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const parsePerPage = (
  limit: string | null | undefined,
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): number => {
  if (limit === undefined || limit === null) {
    return defaults.defaultLimit;
  }
  const parsed = parseInteger(limit);
  if (parsed === null || parsed <= 0) {
    return defaults.fallbackPerPage;
  }
  return parsed;
};

export const parsePageNumber = (page: string | null | undefined): number => {
  if (page === undefined || page === null) {
    return 1;
  }
  return parseInteger(page) ?? 1;
};

export const parseWindowRequest = (
  query: { limit?: string | null; page?: string | null },
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): HistoryWindowRequest => {
  if (query.limit === ALL_REVISIONS) {
    return { all: true };
  }
  return {
    all: false,
    perPage: parsePerPage(query.limit, defaults),
    page: parsePageNumber(query.page),
  };
};

export const assertWindowAllowed = (
  request: HistoryWindowRequest,
  access: HistoryAccess,
): void => {
  if (request.all && !access.canViewAll) {
    throw new WikiRevisionError(
      "UNAUTHORIZED",
      "Sign in to view the complete revision history",
      REVISIONS_LOGIN_REQUIRED,
    );
  }
};

/**
 * Selects the display window over revisions already ordered most recent first.
 * Pages outside `1..totalPages` fall back to the first page.
 */
export function paginateRevisions(
  revisions: readonly LinkedRevision[],
  request: HistoryWindowRequest,
  access: HistoryAccess,
): RevisionWindow {
  assertWindowAllowed(request, access);

  if (revisions.length === 0) {
    throw new WikiRevisionError(
      "NO_MATCHING_REVISIONS",
      "Document has no revisions",
    );
  }

  if (request.all) {
    return { mode: "all", revisions: [...revisions] };
  }

  const perPage = Math.max(1, request.perPage);
  const count = revisions.length;
  const totalPages = Math.ceil(count / perPage);
  const number =
    request.page >= 1 && request.page <= totalPages ? request.page : 1;
  const start = (number - 1) * perPage;

  return {
    mode: "paged",
    revisions: revisions.slice(start, start + perPage),
    page: {
      number,
      perPage,
      count,
      totalPages,
      hasNext: number < totalPages,
      hasPrevious: number > 1,
    },
  };
}
