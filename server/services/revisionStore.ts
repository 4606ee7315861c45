import { Types } from "mongoose";
import Counter, { type CounterRecord } from "../models/Counter";
import Revision, { type RevisionRecord } from "../models/Revision";
import WikiDocument, { type WikiDocumentRecord } from "../models/WikiDocument";
import type {
  DocumentSnapshot,
  RevisionSnapshot,
} from "./revisionHistory";
import {
  basedOnIdOf,
  toDocumentSnapshot,
  toLinkedRevisionSnapshot,
  toRevisionSnapshot,
} from "./revisionRecords";

export interface NewDocumentInput {
  slug: string;
  locale: string;
  title: string;
  parentId: string | null;
}

export interface NewRevisionInput {
  documentId: string;
  title: string;
  content: string;
  summary: string;
  comment: string;
  creator: string | null;
  isApproved: boolean;
  basedOnId: number | null;
  createdAt: Date;
}

/**
 * Persistence seen by the history service. Revisions come back with
 * `basedOn` resolved one level deep; the resolved revision's own `basedOn`
 * is left empty.
 */
export interface RevisionStore {
  findDocument(locale: string, slug: string): Promise<DocumentSnapshot | null>;
  /**
   * Returns the document for `(locale, slug)`, creating it from `input` when
   * absent. Concurrent callers all receive the same document.
   */
  ensureDocument(input: NewDocumentInput): Promise<DocumentSnapshot>;
  /**
   * Points the document at `revision` unless its current revision is already
   * the same or later in `(createdAt, id)` order.
   */
  advanceCurrentRevision(
    documentId: string,
    revision: Pick<RevisionSnapshot, "id" | "createdAt">,
  ): Promise<DocumentSnapshot>;
  listRevisions(documentId: string): Promise<RevisionSnapshot[]>;
  findRevision(revisionId: number): Promise<RevisionSnapshot | null>;
  insertRevision(input: NewRevisionInput): Promise<RevisionSnapshot>;
  markApproved(revisionId: number): Promise<void>;
}

const REVISION_COUNTER = "wiki_revision_id";
const DUPLICATE_KEY_CODE = 11000;

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === DUPLICATE_KEY_CODE;

const toObjectId = (value: string): Types.ObjectId | null =>
  Types.ObjectId.isValid(value) ? new Types.ObjectId(value) : null;

const requireObjectId = (value: string): Types.ObjectId => {
  const objectId = toObjectId(value);
  if (!objectId) {
    throw new Error(`Invalid document id ${value}`);
  }
  return objectId;
};

async function loadBasedOn(
  ids: number[],
): Promise<Map<number, RevisionSnapshot>> {
  const unique = [...new Set(ids)];
  if (!unique.length) {
    return new Map();
  }
  const rows = await Revision.find({ revision_id: { $in: unique } })
    .lean<RevisionRecord[]>()
    .exec();
  return new Map(
    rows.map((row) => [row.revision_id, toRevisionSnapshot(row, null)]),
  );
}

async function findRevisionSnapshot(
  revisionId: number,
): Promise<RevisionSnapshot | null> {
  const row = await Revision.findOne({ revision_id: revisionId })
    .lean<RevisionRecord>()
    .exec();
  if (!row) {
    return null;
  }
  const basedOnId = basedOnIdOf(row);
  const sources =
    basedOnId === null
      ? new Map<number, RevisionSnapshot>()
      : await loadBasedOn([basedOnId]);
  return toLinkedRevisionSnapshot(row, sources);
}

async function findDocumentSnapshot(
  filter: { locale: string; slug: string } | { _id: Types.ObjectId },
): Promise<DocumentSnapshot | null> {
  const doc = await WikiDocument.findOne(filter)
    .lean<WikiDocumentRecord>()
    .exec();
  return doc ? toDocumentSnapshot(doc) : null;
}

async function nextRevisionId(): Promise<number> {
  const counter = await Counter.findOneAndUpdate(
    { _id: REVISION_COUNTER },
    { $inc: { seq: 1 } },
    { new: true, upsert: true },
  )
    .lean<CounterRecord>()
    .exec();
  if (!counter) {
    throw new Error("Failed to allocate a revision id");
  }
  return counter.seq;
}

export function createMongooseRevisionStore(): RevisionStore {
  return {
    findDocument: (locale, slug) => findDocumentSnapshot({ locale, slug }),

    async ensureDocument(input) {
      const filter = { locale: input.locale, slug: input.slug };
      try {
        const doc = await WikiDocument.findOneAndUpdate(
          filter,
          {
            $setOnInsert: {
              title: input.title,
              current_revision_id: null,
              current_revision_created_at: null,
              parent_id: input.parentId ? requireObjectId(input.parentId) : null,
            },
          },
          { upsert: true, new: true },
        )
          .lean<WikiDocumentRecord>()
          .exec();
        if (doc) {
          return toDocumentSnapshot(doc);
        }
      } catch (error) {
        // Two upserts racing on the unique (locale, slug) index: one wins.
        if (!isDuplicateKeyError(error)) {
          throw error;
        }
      }
      const existing = await findDocumentSnapshot(filter);
      if (!existing) {
        throw new Error(`Failed to create document ${input.locale}/${input.slug}`);
      }
      return existing;
    },

    async advanceCurrentRevision(documentId, revision) {
      const _id = requireObjectId(documentId);
      const updated = await WikiDocument.findOneAndUpdate(
        {
          _id,
          $or: [
            { current_revision_id: null },
            { current_revision_created_at: null },
            { current_revision_created_at: { $lt: revision.createdAt } },
            {
              current_revision_created_at: revision.createdAt,
              current_revision_id: { $lt: revision.id },
            },
          ],
        },
        {
          $set: {
            current_revision_id: revision.id,
            current_revision_created_at: revision.createdAt,
          },
        },
        { new: true },
      )
        .lean<WikiDocumentRecord>()
        .exec();
      if (updated) {
        return toDocumentSnapshot(updated);
      }
      const current = await findDocumentSnapshot({ _id });
      if (!current) {
        throw new Error(`Unknown document ${documentId}`);
      }
      return current;
    },

    async listRevisions(documentId) {
      const objectId = toObjectId(documentId);
      if (!objectId) {
        return [];
      }
      const rows = await Revision.find({ document_id: objectId })
        .sort({ created_at: 1, revision_id: 1 })
        .lean<RevisionRecord[]>()
        .exec();
      const sources = await loadBasedOn(
        rows
          .map(basedOnIdOf)
          .filter((value): value is number => value !== null),
      );
      return rows.map((row) => toLinkedRevisionSnapshot(row, sources));
    },

    findRevision: findRevisionSnapshot,

    async insertRevision(input) {
      const created = await Revision.create({
        revision_id: await nextRevisionId(),
        document_id: requireObjectId(input.documentId),
        title: input.title,
        content: input.content,
        summary: input.summary,
        comment: input.comment,
        creator: input.creator,
        is_approved: input.isApproved,
        based_on_id: input.basedOnId,
        created_at: input.createdAt,
      });
      const basedOn =
        input.basedOnId === null
          ? null
          : await findRevisionSnapshot(input.basedOnId);
      return toRevisionSnapshot(created, basedOn);
    },

    async markApproved(revisionId) {
      await Revision.updateOne(
        { revision_id: revisionId },
        { $set: { is_approved: true } },
      ).exec();
    },
  };
}
