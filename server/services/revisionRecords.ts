import type { RevisionRecord } from "../models/Revision";
import type { WikiDocumentRecord } from "../models/WikiDocument";
import type { DocumentSnapshot, RevisionSnapshot } from "./revisionHistory";

export type DocumentFields = Pick<
  WikiDocumentRecord,
  "_id" | "slug" | "locale" | "title" | "current_revision_id" | "parent_id"
>;

// Records written before a field existed come back from `lean()` without it.
export type RevisionFields = Pick<
  RevisionRecord,
  "revision_id" | "document_id" | "title" | "created_at"
> &
  Partial<
    Pick<
      RevisionRecord,
      "summary" | "comment" | "creator" | "is_approved" | "based_on_id"
    >
  >;

export const toDocumentSnapshot = (doc: DocumentFields): DocumentSnapshot => ({
  id: doc._id.toString(),
  slug: doc.slug,
  locale: doc.locale,
  title: doc.title,
  currentRevisionId: doc.current_revision_id ?? null,
  parentId: doc.parent_id ? doc.parent_id.toString() : null,
});

export const basedOnIdOf = (doc: RevisionFields): number | null =>
  typeof doc.based_on_id === "number" ? doc.based_on_id : null;

/** Drops the nested link so a resolved based-on revision stays one level deep. */
export const stripBasedOn = (
  revision: RevisionSnapshot | null | undefined,
): RevisionSnapshot | null => (revision ? { ...revision, basedOn: null } : null);

export const toRevisionSnapshot = (
  doc: RevisionFields,
  basedOn: RevisionSnapshot | null,
): RevisionSnapshot => ({
  id: doc.revision_id,
  documentId: doc.document_id.toString(),
  createdAt: doc.created_at,
  isApproved: Boolean(doc.is_approved),
  basedOn: stripBasedOn(basedOn),
  title: doc.title,
  summary: doc.summary ?? "",
  comment: doc.comment ?? "",
  creator: doc.creator ?? null,
});

/** Maps a record, resolving `based_on_id` through already-loaded revisions. */
export const toLinkedRevisionSnapshot = (
  doc: RevisionFields,
  sources: ReadonlyMap<number, RevisionSnapshot>,
): RevisionSnapshot => {
  const basedOnId = basedOnIdOf(doc);
  return toRevisionSnapshot(
    doc,
    basedOnId === null ? null : sources.get(basedOnId) ?? null,
  );
};
