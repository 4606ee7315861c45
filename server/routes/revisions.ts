import type { FastifyPluginAsync, FastifyReply } from "fastify";
import { z } from "zod";
import { identifyRequester, requireAuth } from "../middleware/auth";
import {
  DEFAULT_PAGINATION,
  isWikiRevisionError,
  type DocumentSnapshot,
  type HistoryEntry,
  type PaginationDefaults,
  type RevisionSnapshot,
  type WikiRevisionError,
  type WikiRevisionErrorCode,
} from "../services/revisionHistory";
import {
  approveRevision,
  loadRevisionHistory,
  saveRevision,
} from "../services/revisionHistoryService";
import type { RevisionStore } from "../services/revisionStore";

export interface RevisionRoutesOptions {
  store: RevisionStore;
  jwtSecret: string;
  pagination?: PaginationDefaults;
  now?: () => Date;
}

type DocumentParams = { locale: string; slug: string };

const STATUS_BY_CODE: Record<WikiRevisionErrorCode, number> = {
  DOCUMENT_NOT_FOUND: 404,
  NO_PUBLISHABLE_REVISION: 404,
  NO_MATCHING_REVISIONS: 404,
  UNAUTHORIZED: 403,
  PARENT_NOT_FOUND: 404,
  PARENT_MISMATCH: 400,
  INVALID_BASED_ON: 400,
  REVISION_NOT_FOUND: 404,
};

const historyQuerySchema = z.object({
  limit: z.string().optional(),
  page: z.string().optional(),
  locale: z.string().trim().min(1).optional(),
});

const saveRevisionSchema = z.object({
  title: z.string().trim().min(1),
  content: z.string().default(""),
  summary: z.string().default(""),
  comment: z.string().default(""),
  approved: z.boolean().default(false),
  parent: z
    .object({
      locale: z.string().trim().min(1),
      slug: z.string().trim().min(1),
    })
    .nullish(),
  basedOnRevisionId: z.number().int().positive().nullish(),
});

const revisionIdSchema = z.coerce.number().int().positive();

const serializeDocument = (document: DocumentSnapshot) => ({
  id: document.id,
  slug: document.slug,
  locale: document.locale,
  title: document.title,
  currentRevisionId: document.currentRevisionId,
  parentId: document.parentId,
});

const serializeRevision = (revision: RevisionSnapshot) => ({
  id: revision.id,
  documentId: revision.documentId,
  title: revision.title,
  summary: revision.summary,
  comment: revision.comment,
  creator: revision.creator,
  isApproved: revision.isApproved,
  createdAt: revision.createdAt.toISOString(),
  basedOnId: revision.basedOn?.id ?? null,
});

const serializeEntry = (entry: HistoryEntry) =>
  entry.kind === "revision"
    ? {
        ...serializeRevision(entry.revision),
        previousRevisionId: entry.revision.previousRevision?.id ?? null,
        translationSource: false,
      }
    : {
        ...serializeRevision(entry.revision),
        previousRevisionId: null,
        translationSource: true,
      };

const sendWikiError = (reply: FastifyReply, error: WikiRevisionError) =>
  reply.status(STATUS_BY_CODE[error.code]).send({
    code: error.code,
    message: error.message,
    ...(error.reason ? { reason: error.reason } : {}),
  });

const revisionRoutes: FastifyPluginAsync<RevisionRoutesOptions> = async (
  fastify,
  options,
) => {
  const { store, jwtSecret } = options;
  const pagination = options.pagination ?? DEFAULT_PAGINATION;
  const now = options.now ?? (() => new Date());

  fastify.get<{ Params: DocumentParams }>(
    "/api/wiki/:locale/docs/:slug/revisions",
    { preHandler: identifyRequester(jwtSecret) },
    async (request, reply) => {
      const parsed = historyQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          code: "VALIDATION_ERROR",
          message: "Invalid history query",
          issues: parsed.error.issues,
        });
      }
      const { slug } = request.params;
      const locale = parsed.data.locale ?? request.params.locale;

      try {
        const history = await loadRevisionHistory(
          store,
          {
            locale,
            slug,
            limit: parsed.data.limit,
            page: parsed.data.page,
            authenticated: request.userId !== null,
          },
          pagination,
        );
        request.log.info(
          {
            documentId: history.document.id,
            entries: history.entries.length,
            mode: history.pagination.mode,
          },
          "[HISTORY] Revision history served",
        );
        return reply.send({
          document: serializeDocument(history.document),
          revisions: history.entries.map(serializeEntry),
          pagination: history.pagination,
        });
      } catch (error) {
        if (isWikiRevisionError(error)) {
          request.log.warn(
            { code: error.code, locale, slug },
            "[HISTORY] Revision history unavailable",
          );
          return sendWikiError(reply, error);
        }
        throw error;
      }
    },
  );

  fastify.post<{ Params: DocumentParams }>(
    "/api/wiki/:locale/docs/:slug/revisions",
    { preHandler: requireAuth(jwtSecret) },
    async (request, reply) => {
      const parsed = saveRevisionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          code: "VALIDATION_ERROR",
          message: "Invalid revision payload",
          issues: parsed.error.issues,
        });
      }
      const body = parsed.data;

      try {
        const saved = await saveRevision(
          store,
          {
            locale: request.params.locale,
            slug: request.params.slug,
            title: body.title,
            content: body.content,
            summary: body.summary,
            comment: body.comment,
            creator: request.userId,
            approved: body.approved,
            parent: body.parent ?? null,
            basedOnRevisionId: body.basedOnRevisionId ?? null,
          },
          now,
        );
        request.log.info(
          { documentId: saved.document.id, revisionId: saved.revision.id },
          "[REVISIONS] Revision recorded",
        );
        return reply.status(201).send({
          document: serializeDocument(saved.document),
          revision: serializeRevision(saved.revision),
        });
      } catch (error) {
        if (isWikiRevisionError(error)) {
          return sendWikiError(reply, error);
        }
        throw error;
      }
    },
  );

  fastify.post<{ Params: DocumentParams & { revisionId: string } }>(
    "/api/wiki/:locale/docs/:slug/revisions/:revisionId/approve",
    { preHandler: requireAuth(jwtSecret) },
    async (request, reply) => {
      const revisionId = revisionIdSchema.safeParse(request.params.revisionId);
      if (!revisionId.success) {
        return reply.status(400).send({
          code: "VALIDATION_ERROR",
          message: "Invalid revisionId",
        });
      }

      try {
        const approved = await approveRevision(store, {
          locale: request.params.locale,
          slug: request.params.slug,
          revisionId: revisionId.data,
        });
        request.log.info(
          {
            documentId: approved.document.id,
            revisionId: approved.revision.id,
            currentRevisionId: approved.document.currentRevisionId,
          },
          "[REVISIONS] Revision approved",
        );
        return reply.send({
          document: serializeDocument(approved.document),
          revision: serializeRevision(approved.revision),
        });
      } catch (error) {
        if (isWikiRevisionError(error)) {
          return sendWikiError(reply, error);
        }
        throw error;
      }
    },
  );
};

export default revisionRoutes;
