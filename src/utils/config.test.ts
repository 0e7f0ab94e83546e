import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import test from "node:test";
import type { Inventory } from "../schemas";
import { applyEnvOverrides, loadInventory, nodeEnvKey, parseInventory, resolveConfigPath } from "./config";
import { ConfigError, ErrorCode } from "./errors";

const INVENTORY_YAML = `
defaults:
  username: deploy
  bind_port: 5700
nodes:
  n1:
    address: 10.0.0.5:22
    params:
      password: test-secret
options:
  startup_delay_seconds: 0
`;

function inventory(): Inventory {
  return {
    defaults: { username: "deploy" },
    nodes: {
      n1: { address: "10.0.0.5", params: {} },
      "web-1": { address: "10.0.0.6", params: { bind_addr: "0.0.0.0" } },
    },
    options: { remote_root: "/tmp/nodepool", startup_delay_seconds: 4, ready_timeout_ms: 10000 },
  };
}

test("parseInventory validates and fills defaults", () => {
  assert.deepEqual(parseInventory(INVENTORY_YAML, "nodes.yml"), {
    defaults: { username: "deploy", bind_port: "5700" },
    nodes: {
      n1: { address: "10.0.0.5:22", params: { password: "test-secret" } },
    },
    options: { remote_root: "/tmp/nodepool", startup_delay_seconds: 0, ready_timeout_ms: 10000 },
  });
});

test("parseInventory reports the failing path", () => {
  assert.throws(() => parseInventory("defaults: {}\n", "nodes.yml"), /→ nodes/);
  assert.throws(
    () => parseInventory("nodes:\n  n1:\n    address: a\noptions:\n  remote_root: relative\n", "nodes.yml"),
    /→ options\.remote_root/
  );
  assert.throws(() => parseInventory("nodes:\n  Bad Name:\n    address: a\n", "nodes.yml"), /→ nodes\.Bad Name/);
});

test("parseInventory rejects broken YAML", () => {
  assert.throws(() => parseInventory("nodes: [", "nodes.yml"), /Failed to parse nodes\.yml/);
});

test("nodeEnvKey upper cases and maps dashes", () => {
  assert.equal(nodeEnvKey("web-1"), "WEB_1");
});

test("applyEnvOverrides routes variables to nodes and defaults", () => {
  const original = inventory();
  const result = applyEnvOverrides(original, {
    NODEPOOL_USERNAME: "ops",
    NODEPOOL_N1_PASSWORD: "test-secret",
    NODEPOOL_WEB_1_BIND_PORT: "7000",
    NODEPOOL_EXTRA_FLAG: "on",
    NODEPOOL_SECRETS: "{}",
    NODEPOOL_CONFIG: "other.yml",
    HOME: "/root",
  });

  assert.deepEqual(result.defaults, { username: "ops", extra_flag: "on" });
  assert.deepEqual(result.nodes.n1.params, { password: "test-secret" });
  assert.deepEqual(result.nodes["web-1"].params, { bind_addr: "0.0.0.0", bind_port: "7000" });
  assert.deepEqual(original, inventory());
});

test("applyEnvOverrides sends well-known names to the defaults", () => {
  const base = inventory();
  base.nodes.bind = { address: "10.0.0.7", params: {} };

  const result = applyEnvOverrides(base, { NODEPOOL_BIND_PORT: "6000" });

  assert.equal(result.defaults.bind_port, "6000");
  assert.deepEqual(result.nodes.bind.params, {});
});

test("resolveConfigPath prefers the option, then NODEPOOL_CONFIG", () => {
  assert.equal(resolveConfigPath("a.yml", { NODEPOOL_CONFIG: "b.yml" }), resolve("a.yml"));
  assert.equal(resolveConfigPath(undefined, { NODEPOOL_CONFIG: "b.yml" }), resolve("b.yml"));
  assert.equal(resolveConfigPath(undefined, {}), resolve(".nodepool/nodes.yml"));
});

test("loadInventory reads the file and applies overrides", async () => {
  const dir = await mkdtemp(join(tmpdir(), "nodepool-config-"));
  const path = join(dir, "nodes.yml");
  await writeFile(path, INVENTORY_YAML);

  const result = loadInventory(path, { NODEPOOL_N1_BIND_ADDR: "0.0.0.0" });

  assert.deepEqual(result.nodes.n1.params, { password: "test-secret", bind_addr: "0.0.0.0" });
});

test("loadInventory fails with CONFIG_NOT_FOUND for a missing file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "nodepool-config-"));

  assert.throws(
    () => loadInventory(join(dir, "nodes.yml"), {}),
    (error: unknown) => error instanceof ConfigError && error.code === ErrorCode.CONFIG_NOT_FOUND
  );
});
