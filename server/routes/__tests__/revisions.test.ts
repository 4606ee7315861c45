import assert from "node:assert/strict";
import { after, before, describe, test } from "node:test";

import type { FastifyInstance } from "fastify";
import * as jwt from "jsonwebtoken";

import { buildApp } from "../../app";
import {
  createMemoryRevisionStore,
  type MemoryRevisionStore,
} from "../../services/__tests__/memoryRevisionStore";

const JWT_SECRET = "test-secret";

const authHeader = (userId = "user-1") => ({
  authorization: `Bearer ${jwt.sign({ user_id: userId }, JWT_SECRET)}`,
});

const clock = () => {
  let minute = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, ++minute));
};

describe("revision routes", () => {
  let app: FastifyInstance;
  let store: MemoryRevisionStore;

  before(async () => {
    store = createMemoryRevisionStore();
    app = await buildApp({
      store,
      env: {
        JWT_SECRET,
        CLIENT_ORIGIN: undefined,
        LOG_LEVEL: "silent",
        REVISIONS_DEFAULT_LIMIT: 10,
        REVISIONS_PER_PAGE: 100,
      },
      logger: false,
      now: clock(),
    });

    const post = (url: string, payload: Record<string, unknown>) =>
      app.inject({ method: "POST", url, headers: authHeader(), payload });

    await post("/api/wiki/en-US/docs/Glossary/revisions", {
      title: "Glossary",
      approved: true,
    });
    await post("/api/wiki/de/docs/Glossary/revisions", {
      title: "Glossar",
      approved: true,
      parent: { locale: "en-US", slug: "Glossary" },
      basedOnRevisionId: 1,
    });
    await post("/api/wiki/de/docs/Glossary/revisions", {
      title: "Glossar",
      comment: "Tippfehler",
    });
    await post("/api/wiki/de/docs/Glossary/revisions", {
      title: "Glossar",
      approved: true,
    });
  });

  after(async () => {
    await app.close();
  });

  test("POST records revisions for the requesting user", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/wiki/fr/docs/Glossary/revisions",
      headers: authHeader("user-7"),
      payload: {
        title: "Glossaire",
        approved: true,
        parent: { locale: "en-US", slug: "Glossary" },
        basedOnRevisionId: 1,
      },
    });

    assert.equal(response.statusCode, 201);
    const body = response.json();
    assert.equal(body.revision.id, 5);
    assert.equal(body.revision.creator, "user-7");
    assert.equal(body.revision.basedOnId, 1);
    assert.equal(body.document.currentRevisionId, 5);
  });

  test("POST requires a bearer token", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/wiki/en-US/docs/Glossary/revisions",
      payload: { title: "Glossary" },
    });

    assert.equal(response.statusCode, 401);
  });

  test("POST validates the payload", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/wiki/en-US/docs/Glossary/revisions",
      headers: authHeader(),
      payload: { title: "", basedOnRevisionId: "one" },
    });

    assert.equal(response.statusCode, 400);
    assert.equal(response.json().code, "VALIDATION_ERROR");
  });

  test("POST rejects a parent that disagrees with the stored document", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/wiki/en-US/docs/Glossary/revisions",
      headers: authHeader(),
      payload: { title: "Glossary", parent: { locale: "de", slug: "Glossary" } },
    });

    assert.equal(response.statusCode, 400);
    assert.equal(response.json().code, "PARENT_MISMATCH");
  });

  test("GET returns the first page with previous revision links", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Glossary/revisions?limit=2",
    });

    assert.equal(response.statusCode, 200);
    const body = response.json();
    assert.equal(body.document.locale, "de");
    assert.deepEqual(
      body.revisions.map(
        (revision: { id: number; previousRevisionId: number | null }) => [
          revision.id,
          revision.previousRevisionId,
        ],
      ),
      [
        [4, 2],
        [3, 2],
      ],
    );
    assert.deepEqual(body.pagination, {
      mode: "paged",
      number: 1,
      perPage: 2,
      count: 3,
      totalPages: 2,
      hasNext: true,
      hasPrevious: false,
    });
  });

  test("GET appends the source revision on the last page", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Glossary/revisions?limit=2&page=2",
    });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json().revisions, [
      {
        id: 2,
        documentId: "doc-2",
        title: "Glossar",
        summary: "",
        comment: "",
        creator: "user-1",
        isApproved: true,
        createdAt: "2024-01-01T00:02:00.000Z",
        basedOnId: 1,
        previousRevisionId: null,
        translationSource: false,
      },
      {
        id: 1,
        documentId: "doc-1",
        title: "Glossary",
        summary: "",
        comment: "",
        creator: "user-1",
        isApproved: true,
        createdAt: "2024-01-01T00:01:00.000Z",
        basedOnId: null,
        previousRevisionId: null,
        translationSource: true,
      },
    ]);
  });

  test("GET honours the locale query override", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Glossary/revisions?locale=en-US",
    });

    assert.equal(response.statusCode, 200);
    const body = response.json();
    assert.equal(body.document.locale, "en-US");
    assert.deepEqual(
      body.revisions.map((revision: { id: number }) => revision.id),
      [1],
    );
  });

  test("GET refuses all mode to anonymous requesters", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Glossary/revisions?limit=all",
    });

    assert.equal(response.statusCode, 403);
    assert.deepEqual(response.json(), {
      code: "UNAUTHORIZED",
      message: "Sign in to view the complete revision history",
      reason: "revisions_login_required",
    });
  });

  test("GET serves all mode to signed-in requesters", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Glossary/revisions?limit=all",
      headers: authHeader(),
    });

    assert.equal(response.statusCode, 200);
    const body = response.json();
    assert.deepEqual(body.pagination, { mode: "all" });
    assert.deepEqual(
      body.revisions.map(
        (revision: { id: number; translationSource: boolean }) => [
          revision.id,
          revision.translationSource,
        ],
      ),
      [
        [4, false],
        [3, false],
        [2, false],
        [1, true],
      ],
    );
  });

  test("GET reports unknown documents as not found", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/api/wiki/de/docs/Nowhere/revisions",
    });

    assert.equal(response.statusCode, 404);
    assert.equal(response.json().code, "DOCUMENT_NOT_FOUND");
  });

  test("approve publishes a pending revision", async () => {
    await app.inject({
      method: "POST",
      url: "/api/wiki/en-US/docs/Draft/revisions",
      headers: authHeader(),
      payload: { title: "Draft" },
    });

    const unpublished = await app.inject({
      method: "GET",
      url: "/api/wiki/en-US/docs/Draft/revisions",
    });
    assert.equal(unpublished.statusCode, 404);
    assert.equal(unpublished.json().code, "NO_PUBLISHABLE_REVISION");

    const draftId = [...store.revisions.values()].find(
      (revision) => revision.title === "Draft",
    )?.id;
    const approved = await app.inject({
      method: "POST",
      url: `/api/wiki/en-US/docs/Draft/revisions/${draftId}/approve`,
      headers: authHeader(),
    });

    assert.equal(approved.statusCode, 200);
    assert.equal(approved.json().document.currentRevisionId, draftId);
    const published = await app.inject({
      method: "GET",
      url: "/api/wiki/en-US/docs/Draft/revisions",
    });
    assert.equal(published.statusCode, 200);
  });

  test("approve rejects malformed revision ids", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/wiki/en-US/docs/Glossary/revisions/latest/approve",
      headers: authHeader(),
    });

    assert.equal(response.statusCode, 400);
  });
});
