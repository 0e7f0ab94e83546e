import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { ConfigError } from "./errors";
import { loadSecrets, parseDotenv, parseSecretsJson } from "./secrets";

test("parseDotenv reads keys, strips quotes and skips comments", () => {
  const content = ["# local secrets", "A=1", 'B="two words"', "C='x'", "BROKEN", " =orphan", ""].join("\n");

  assert.deepEqual(parseDotenv(content), { A: "1", B: "two words", C: "x" });
});

test("parseSecretsJson keeps string values only", () => {
  assert.deepEqual(parseSecretsJson('{"NODEPOOL_N1_PASSWORD":"test-secret","RETRIES":2}'), {
    NODEPOOL_N1_PASSWORD: "test-secret",
  });
});

test("parseSecretsJson rejects anything but an object", () => {
  assert.throws(() => parseSecretsJson("[1]"), ConfigError);
  assert.throws(() => parseSecretsJson("{"), /Failed to parse NODEPOOL_SECRETS/);
});

test("loadSecrets prefers the env file and skips empty values", async () => {
  const dir = await mkdtemp(join(tmpdir(), "nodepool-secrets-"));
  const envFile = join(dir, ".env.nodepool");
  await writeFile(envFile, "NODEPOOL_USERNAME=\nNODEPOOL_PASSWORD=test-secret\n");

  const env: NodeJS.ProcessEnv = { NODEPOOL_SECRETS: '{"NODEPOOL_DISTR":"./ignored.tar.xz"}' };
  loadSecrets(env, envFile);

  assert.equal(env.NODEPOOL_PASSWORD, "test-secret");
  assert.equal(env.NODEPOOL_USERNAME, undefined);
  assert.equal(env.NODEPOOL_DISTR, undefined);
});

test("loadSecrets falls back to NODEPOOL_SECRETS", async () => {
  const dir = await mkdtemp(join(tmpdir(), "nodepool-secrets-"));

  const env: NodeJS.ProcessEnv = { NODEPOOL_SECRETS: '{"NODEPOOL_N1_PASSWORD":"test-secret"}' };
  loadSecrets(env, join(dir, "missing.env"));

  assert.equal(env.NODEPOOL_N1_PASSWORD, "test-secret");
});
