import assert from "node:assert/strict";
import test from "node:test";
import { PoolStatus, describeStatus } from "./status";

test("describeStatus has a message for every status", () => {
  for (const status of Object.values(PoolStatus)) {
    assert.notEqual(describeStatus(status), "");
  }
});

test("describeStatus names the failing stage", () => {
  assert.equal(describeStatus(PoolStatus.DeployExtractionFailed), "archive extraction failed");
  assert.equal(describeStatus(PoolStatus.NotAuthenticated), "credentials were rejected");
});
