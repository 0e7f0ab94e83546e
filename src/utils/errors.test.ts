import assert from "node:assert/strict";
import test from "node:test";
import { PoolStatus } from "../types";
import {
  AuthenticationError,
  CLIError,
  ConfigError,
  ConnectionError,
  DeployError,
  ErrorCode,
  statusToError,
} from "./errors";

test("statusToError maps pool statuses to CLI errors", () => {
  const notFound = statusToError(PoolStatus.NodeNotFound, "n1");
  assert.ok(notFound instanceof ConfigError);
  assert.equal(notFound.code, ErrorCode.NODE_NOT_FOUND);
  assert.equal(notFound.message, "n1: node not found");

  const auth = statusToError(PoolStatus.NotAuthenticated, "n1");
  assert.ok(auth instanceof AuthenticationError);
  assert.equal(auth.code, ErrorCode.SSH_AUTH_FAILED);

  const unreachable = statusToError(PoolStatus.ConnectFailed, "n1");
  assert.ok(unreachable instanceof ConnectionError);
  assert.equal(unreachable.code, ErrorCode.CONNECTION_FAILED);

  const extraction = statusToError(PoolStatus.DeployExtractionFailed, "n1");
  assert.ok(extraction instanceof DeployError);
  assert.equal(extraction.code, ErrorCode.DEPLOY_EXTRACTION_FAILED);
  assert.equal(extraction.message, "n1: archive extraction failed");

  assert.equal(statusToError(PoolStatus.RunFailed, "n1").code, ErrorCode.RUN_FAILED);
  assert.equal(statusToError(PoolStatus.InvalidArgument, "n1").code, ErrorCode.INVALID_ARGUMENT);
});

test("CLIError.from keeps CLI errors and wraps the rest", () => {
  const original = new ConfigError("bad config");
  assert.equal(CLIError.from(original), original);

  const cause = new Error("boom");
  const wrapped = CLIError.from(cause, ErrorCode.COMMAND_FAILED);
  assert.equal(wrapped.message, "boom");
  assert.equal(wrapped.code, ErrorCode.COMMAND_FAILED);
  assert.equal(wrapped.cause, cause);

  assert.equal(CLIError.from("plain").code, ErrorCode.UNKNOWN);
});
