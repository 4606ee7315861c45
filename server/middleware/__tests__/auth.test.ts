import assert from "node:assert/strict";
import { describe, test } from "node:test";

import * as jwt from "jsonwebtoken";

import { checkBearerToken } from "../auth";

const SECRET = "test-secret";

describe("checkBearerToken", () => {
  test("treats a missing header as anonymous", () => {
    assert.deepEqual(checkBearerToken(undefined, SECRET), {
      status: "anonymous",
    });
    assert.deepEqual(checkBearerToken("Basic abc", SECRET), {
      status: "anonymous",
    });
  });

  test("reads the user id from a valid token", () => {
    const token = jwt.sign({ user_id: 42 }, SECRET);

    assert.deepEqual(checkBearerToken(`Bearer ${token}`, SECRET), {
      status: "authenticated",
      userId: "42",
    });
  });

  test("rejects tokens signed with another secret", () => {
    const token = jwt.sign({ user_id: "user-1" }, "other-secret");

    assert.deepEqual(checkBearerToken(`Bearer ${token}`, SECRET), {
      status: "invalid",
    });
  });

  test("rejects tokens without a user id", () => {
    const token = jwt.sign({ role: "reader" }, SECRET);

    assert.deepEqual(checkBearerToken(`Bearer ${token}`, SECRET), {
      status: "invalid",
    });
  });
});
