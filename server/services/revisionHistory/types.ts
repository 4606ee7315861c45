export interface RevisionSnapshot {
  id: number;
  documentId: string;
  createdAt: Date;
  isApproved: boolean;
  /** Revision of the original-language document this one was translated from. */
  basedOn: RevisionSnapshot | null;
  title: string;
  summary: string;
  comment: string;
  creator: string | null;
}

export interface DocumentSnapshot {
  id: string;
  slug: string;
  locale: string;
  title: string;
  currentRevisionId: number | null;
  parentId: string | null;
}

export interface LinkedRevision extends RevisionSnapshot {
  readonly previousRevision: RevisionSnapshot | null;
}

export type HistoryEntry =
  | { kind: "revision"; revision: LinkedRevision }
  | { kind: "translationSource"; revision: RevisionSnapshot };

export type HistoryWindowRequest =
  | { all: true }
  | { all: false; perPage: number; page: number };

export interface HistoryAccess {
  /** Set when the requester may retrieve the complete, unpaginated history. */
  canViewAll: boolean;
}

export interface PageDescriptor {
  number: number;
  perPage: number;
  count: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export type RevisionWindow =
  | { mode: "all"; revisions: LinkedRevision[] }
  | { mode: "paged"; revisions: LinkedRevision[]; page: PageDescriptor };

export type HistoryPagination = { mode: "all" } | ({ mode: "paged" } & PageDescriptor);

export interface RevisionHistoryProjection {
  document: DocumentSnapshot;
  entries: HistoryEntry[];
  pagination: HistoryPagination;
}
