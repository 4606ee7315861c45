import {
  DEFAULT_PAGINATION,
  WikiRevisionError,
  parseWindowRequest,
  projectRevisionHistory,
  type DocumentSnapshot,
  type PaginationDefaults,
  type RevisionHistoryProjection,
  type RevisionSnapshot,
} from "./revisionHistory";
import type { RevisionStore } from "./revisionStore";

export interface RevisionHistoryRequest {
  locale: string;
  slug: string;
  limit?: string | null;
  page?: string | null;
  authenticated: boolean;
}

async function requireDocument(
  store: RevisionStore,
  locale: string,
  slug: string,
): Promise<DocumentSnapshot> {
  const document = await store.findDocument(locale, slug);
  if (!document) {
    throw new WikiRevisionError(
      "DOCUMENT_NOT_FOUND",
      `Document ${locale}/${slug} not found`,
    );
  }
  return document;
}

export async function loadRevisionHistory(
  store: RevisionStore,
  request: RevisionHistoryRequest,
  pagination: PaginationDefaults = DEFAULT_PAGINATION,
): Promise<RevisionHistoryProjection> {
  const document = await requireDocument(store, request.locale, request.slug);
  const revisions =
    document.currentRevisionId === null
      ? []
      : await store.listRevisions(document.id);

  return projectRevisionHistory({
    document,
    revisions,
    window: parseWindowRequest(
      { limit: request.limit, page: request.page },
      pagination,
    ),
    access: { canViewAll: request.authenticated },
  });
}

export interface SaveRevisionInput {
  locale: string;
  slug: string;
  title: string;
  content: string;
  summary: string;
  comment: string;
  creator: string | null;
  approved: boolean;
  parent: { locale: string; slug: string } | null;
  basedOnRevisionId: number | null;
}

export interface SavedRevision {
  document: DocumentSnapshot;
  revision: RevisionSnapshot;
}

async function resolveParent(
  store: RevisionStore,
  parent: SaveRevisionInput["parent"],
): Promise<DocumentSnapshot | null> {
  if (!parent) {
    return null;
  }
  const found = await store.findDocument(parent.locale, parent.slug);
  if (!found) {
    throw new WikiRevisionError(
      "PARENT_NOT_FOUND",
      `Parent document ${parent.locale}/${parent.slug} not found`,
    );
  }
  return found;
}

async function resolveBasedOn(
  store: RevisionStore,
  document: DocumentSnapshot,
  basedOnRevisionId: number | null,
): Promise<number | null> {
  if (basedOnRevisionId === null) {
    return null;
  }
  if (document.parentId === null) {
    throw new WikiRevisionError(
      "INVALID_BASED_ON",
      "Only translations can be based on another document's revision",
    );
  }
  const source = await store.findRevision(basedOnRevisionId);
  if (!source || source.documentId !== document.parentId) {
    throw new WikiRevisionError(
      "INVALID_BASED_ON",
      `Revision ${basedOnRevisionId} does not belong to the parent document`,
    );
  }
  return source.id;
}

function assertParentMatches(
  document: DocumentSnapshot,
  parent: DocumentSnapshot | null,
): void {
  if (parent && document.parentId !== parent.id) {
    throw new WikiRevisionError(
      "PARENT_MISMATCH",
      `Document ${document.locale}/${document.slug} is not a translation of ${parent.locale}/${parent.slug}`,
    );
  }
}

export async function saveRevision(
  store: RevisionStore,
  input: SaveRevisionInput,
  now: () => Date = () => new Date(),
): Promise<SavedRevision> {
  const parent = await resolveParent(store, input.parent);
  let document =
    (await store.findDocument(input.locale, input.slug)) ??
    (await store.ensureDocument({
      slug: input.slug,
      locale: input.locale,
      title: input.title,
      parentId: parent ? parent.id : null,
    }));
  assertParentMatches(document, parent);

  const basedOnId = await resolveBasedOn(
    store,
    document,
    input.basedOnRevisionId,
  );

  const revision = await store.insertRevision({
    documentId: document.id,
    title: input.title,
    content: input.content,
    summary: input.summary,
    comment: input.comment,
    creator: input.creator,
    isApproved: input.approved,
    basedOnId,
    createdAt: now(),
  });

  if (revision.isApproved) {
    document = await store.advanceCurrentRevision(document.id, revision);
  }

  return { document, revision };
}

export interface ApproveRevisionInput {
  locale: string;
  slug: string;
  revisionId: number;
}

export async function approveRevision(
  store: RevisionStore,
  input: ApproveRevisionInput,
): Promise<SavedRevision> {
  const document = await requireDocument(store, input.locale, input.slug);
  const revision = await store.findRevision(input.revisionId);
  if (!revision || revision.documentId !== document.id) {
    throw new WikiRevisionError(
      "REVISION_NOT_FOUND",
      `Revision ${input.revisionId} not found for ${input.locale}/${input.slug}`,
    );
  }

  if (!revision.isApproved) {
    await store.markApproved(revision.id);
  }

  return {
    document: await store.advanceCurrentRevision(document.id, revision),
    revision: { ...revision, isApproved: true },
  };
}
