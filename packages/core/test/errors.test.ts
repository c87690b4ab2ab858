import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  AppShellError,
  CapacityExceededError,
  InvalidPatternError,
  formatErrorDetail,
  getErrorMessage,
  normalizeError,
} from "../src/errors.js";

describe("error types", () => {
  it("InvalidPatternError carries the pattern, code and cause", () => {
    const cause = new SyntaxError("Unterminated group");
    const err = new InvalidPatternError("(abc", cause);
    assert.ok(err instanceof AppShellError);
    assert.equal(err.name, "InvalidPatternError");
    assert.equal(err.code, "INVALID_PATTERN");
    assert.equal(err.pattern, "(abc");
    assert.equal(err.cause, cause);
    assert.equal(err.message, "Invalid redaction pattern: (abc (Unterminated group)");
  });

  it("InvalidPatternError names the rule when given", () => {
    const err = new InvalidPatternError("[", new Error("bad"), "employee-id");
    assert.equal(err.message, 'Invalid redaction pattern in rule "employee-id": [ (bad)');
  });

  it("CapacityExceededError reports the limit", () => {
    const err = new CapacityExceededError(10);
    assert.equal(err.code, "CAPACITY_EXCEEDED");
    assert.equal(err.limit, 10);
    assert.equal(err.message, "Maximum workspace limit (10) reached.");
  });
});

describe("normalizeError", () => {
  it("passes Error instances through", () => {
    const err = new TypeError("nope");
    assert.equal(normalizeError(err), err);
  });

  it("keeps message and code from error-like objects", () => {
    const err = normalizeError({ message: "disk full", code: "ENOSPC" });
    assert.equal(err.message, "disk full");
    assert.equal(err.code, "ENOSPC");
    assert.deepEqual(err.raw, { message: "disk full", code: "ENOSPC" });
  });

  it("uses strings as the message", () => {
    assert.equal(getErrorMessage("plain failure"), "plain failure");
  });

  it("serializes other values", () => {
    assert.equal(getErrorMessage({ status: 500 }), '{"status":500}');
    assert.equal(getErrorMessage(42), "42");
  });
});

describe("formatErrorDetail", () => {
  it("uses the stack of an Error", () => {
    const err = new Error("boom");
    assert.equal(formatErrorDetail(err), err.stack);
  });

  it("falls back to name and message without a stack", () => {
    const err = new RangeError("out of range");
    err.stack = undefined;
    assert.equal(formatErrorDetail(err), "RangeError: out of range");
  });

  it("renders non-errors as text", () => {
    assert.equal(formatErrorDetail("socket closed"), "socket closed");
    assert.equal(formatErrorDetail({ code: 7 }), '{"code":7}');
  });
});
