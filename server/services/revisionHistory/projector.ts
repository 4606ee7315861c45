import { WikiRevisionError } from "./errors";
import { paginateRevisions } from "./pagination";
import type {
  DocumentSnapshot,
  HistoryAccess,
  HistoryEntry,
  HistoryPagination,
  HistoryWindowRequest,
  LinkedRevision,
  RevisionHistoryProjection,
  RevisionSnapshot,
  RevisionWindow,
} from "./types";

type Ordered = Pick<RevisionSnapshot, "id" | "createdAt">;

/** Ascending `(createdAt, id)` order; `id` breaks timestamp ties. */
export const compareRevisions = (left: Ordered, right: Ordered): number => {
  const delta = left.createdAt.getTime() - right.createdAt.getTime();
  if (delta !== 0) {
    return delta;
  }
  return left.id - right.id;
};

export const sortAscending = <T extends Ordered>(revisions: readonly T[]): T[] =>
  [...revisions].sort(compareRevisions);

export const sortDescending = <T extends Ordered>(revisions: readonly T[]): T[] =>
  [...revisions].sort((left, right) => compareRevisions(right, left));

export const earliestRevision = <T extends Ordered>(
  revisions: readonly T[],
): T | null =>
  revisions.reduce<T | null>(
    (earliest, revision) =>
      earliest === null || compareRevisions(revision, earliest) < 0
        ? revision
        : earliest,
    null,
  );

/**
 * Annotates every revision with the first approved revision, scanning in
 * ascending order, that was created strictly before it. That is the earliest
 * qualifying approved revision, not necessarily the closest one.
 * Output keeps the input order; inputs are copied, never mutated.
 */
export function linkPreviousRevisions(
  revisions: readonly RevisionSnapshot[],
): LinkedRevision[] {
  const candidates = sortAscending(revisions);

  return revisions.map((revision) => {
    let previousRevision: RevisionSnapshot | null = null;
    for (const candidate of candidates) {
      if (!candidate.isApproved || candidate.id === revision.id) {
        continue;
      }
      if (candidate.createdAt.getTime() < revision.createdAt.getTime()) {
        previousRevision = candidate;
        break;
      }
    }
    return { ...revision, previousRevision };
  });
}

/**
 * Appends the source-language revision the translation started from, but only
 * on the last page (or the unpaginated listing) of a translated document.
 */
export function attachTranslationParent(
  window: RevisionWindow,
  allRevisions: readonly RevisionSnapshot[],
  document: Pick<DocumentSnapshot, "parentId">,
): HistoryEntry[] {
  const entries = window.revisions.map(
    (revision): HistoryEntry => ({ kind: "revision", revision }),
  );

  const isLastPage = window.mode === "all" || !window.page.hasNext;
  if (!isLastPage || document.parentId === null) {
    return entries;
  }

  // Orphaned translations have no based-on revision.
  const source = earliestRevision(allRevisions)?.basedOn ?? null;
  if (source === null) {
    return entries;
  }

  return [...entries, { kind: "translationSource", revision: source }];
}

const describePagination = (window: RevisionWindow): HistoryPagination =>
  window.mode === "all" ? { mode: "all" } : { mode: "paged", ...window.page };

export interface ProjectionInput {
  document: DocumentSnapshot;
  revisions: readonly RevisionSnapshot[];
  window: HistoryWindowRequest;
  access: HistoryAccess;
}

export function projectRevisionHistory(
  input: ProjectionInput,
): RevisionHistoryProjection {
  const { document, revisions, window: request, access } = input;

  if (document.currentRevisionId === null) {
    throw new WikiRevisionError(
      "NO_PUBLISHABLE_REVISION",
      `Document ${document.locale}/${document.slug} has no current revision`,
    );
  }

  const ordered = sortDescending(revisions);
  const window = paginateRevisions(
    linkPreviousRevisions(ordered),
    request,
    access,
  );

  return {
    document,
    entries: attachTranslationParent(window, ordered, document),
    pagination: describePagination(window),
  };
}

export const RevisionHistoryProjector = {
  link: linkPreviousRevisions,
  paginate: paginateRevisions,
  attachTranslationParent,
  project: projectRevisionHistory,
} as const;
