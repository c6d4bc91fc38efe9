import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { parseLimit, statusForError } from "../../http/error-response";
import { truncateUserAgent } from "../../http/request-logging.middleware";
import { forwardableHeaders } from "../../proxy/upstream.client";
import {
  InvalidRecordError,
  MalformedInputError,
  NotFoundError,
  UnauthorizedError,
  UpstreamError,
} from "../../shared/errors";

describe("statusForError", () => {
  it("maps domain errors to HTTP statuses", () => {
    assert.equal(statusForError(new UnauthorizedError()), 401);
    assert.equal(statusForError(new NotFoundError("missing", "candidate")), 404);
    assert.equal(statusForError(new MalformedInputError("bad", "limit")), 400);
    assert.equal(statusForError(new InvalidRecordError("negative", "experience_required")), 500);
    assert.equal(statusForError(new UpstreamError("down", 503)), 502);
    assert.equal(statusForError(new Error("boom")), 500);
  });
});

describe("parseLimit", () => {
  it("falls back when the parameter is absent", () => {
    assert.equal(parseLimit(undefined, 5), 5);
    assert.equal(parseLimit("", 5), 5);
  });

  it("parses non-negative integers", () => {
    assert.equal(parseLimit("0", 5), 0);
    assert.equal(parseLimit("12", 5), 12);
  });

  it("rejects anything else", () => {
    assert.throws(() => parseLimit("-1", 5), MalformedInputError);
    assert.throws(() => parseLimit("2.5", 5), MalformedInputError);
    assert.throws(() => parseLimit("ten", 5), MalformedInputError);
    assert.throws(() => parseLimit(["1", "2"], 5), MalformedInputError);
  });
});

describe("forwardableHeaders", () => {
  it("drops host and content-length and joins repeated values", () => {
    assert.deepEqual(
      forwardableHeaders({
        host: "gateway.local",
        "content-length": "12",
        authorization: "Bearer test-token",
        "x-tags": ["a", "b"],
        "x-empty": undefined,
      }),
      {
        authorization: "Bearer test-token",
        "x-tags": "a, b",
      },
    );
  });
});

describe("truncateUserAgent", () => {
  it("keeps short agents as they are", () => {
    assert.equal(truncateUserAgent("curl/8.5.0"), "curl/8.5.0");
  });

  it("cuts at 100 characters without splitting a surrogate pair", () => {
    const agent = `${"a".repeat(99)}\u{1F600}tail`;
    const truncated = truncateUserAgent(agent);

    assert.equal(truncated, `${"a".repeat(99)}\u{1F600}`);
    assert.equal(Array.from(truncated).length, 100);
  });
});
