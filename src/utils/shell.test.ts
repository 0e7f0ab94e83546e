import assert from "node:assert/strict";
import test from "node:test";
import { shellQuote } from "./shell";

test("shellQuote wraps plain values in single quotes", () => {
  assert.equal(shellQuote("/tmp/nodepool"), "'/tmp/nodepool'");
  assert.equal(shellQuote(""), "''");
});

test("shellQuote escapes embedded single quotes", () => {
  assert.equal(shellQuote("it's"), String.raw`'it'\''s'`);
});

test("shellQuote leaves shell metacharacters inert", () => {
  assert.equal(shellQuote("$(reboot); `id`"), "'$(reboot); `id`'");
});
