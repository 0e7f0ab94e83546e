import assert from "node:assert/strict";
import test from "node:test";
import { AuthenticationError, ConnectionError } from "./errors";
import { classifyConnectError } from "./ssh";

const target = { host: "10.0.0.5", port: 22 };

test("classifyConnectError detects rejected credentials", () => {
  const error = Object.assign(new Error("All configured authentication methods failed"), {
    level: "client-authentication",
  });

  const classified = classifyConnectError(error, target);

  assert.ok(classified instanceof AuthenticationError);
  assert.equal(classified.message, "Credentials not accepted by 10.0.0.5:22");
  assert.equal(classified.cause, error);
});

test("classifyConnectError treats everything else as a connection failure", () => {
  const error = Object.assign(new Error("connect ECONNREFUSED 10.0.0.5:22"), { level: "client-socket" });

  const classified = classifyConnectError(error, target);

  assert.ok(classified instanceof ConnectionError);
  assert.equal(classified.message, "Failed to connect to 10.0.0.5:22: connect ECONNREFUSED 10.0.0.5:22");
});
