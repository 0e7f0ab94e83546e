import assert from "node:assert/strict";
import test from "node:test";
import { NodeRegistry } from "./node-registry";

test("add refuses a duplicate name and keeps the original", () => {
  const registry = new NodeRegistry();

  assert.equal(registry.add("n1", "10.0.0.5", { bind_port: "6000" }), true);
  assert.equal(registry.add("n1", "10.0.0.9", {}), false);
  assert.deepEqual(registry.get("n1"), { name: "n1", address: "10.0.0.5", params: { bind_port: "6000" } });
});

test("get hands out copies", () => {
  const registry = new NodeRegistry();
  registry.add("n1", "10.0.0.5", { username: "deploy" });

  const node = registry.get("n1");
  assert.ok(node);
  node.params.username = "root";

  assert.equal(registry.getParam("n1", "username"), "deploy");
});

test("getParam resolves node, then default, then empty", () => {
  const registry = new NodeRegistry({ username: "deploy", password: "test-secret" });
  registry.setDefault("bind_port", "5800");
  registry.add("n1", "10.0.0.5", { username: "root", bind_port: "" });

  assert.equal(registry.getParam("n1", "username"), "root");
  assert.equal(registry.getParam("n1", "password"), "test-secret");
  assert.equal(registry.getParam("n1", "bind_port"), "5800");
  assert.equal(registry.getParam("n1", "missing"), "");
  assert.equal(registry.getParam("ghost", "username"), "deploy");
});

test("list is sorted by name", () => {
  const registry = new NodeRegistry();
  registry.add("b", "10.0.0.2", {});
  registry.add("a", "10.0.0.1", {});

  assert.deepEqual(registry.list().map((node) => node.name), ["a", "b"]);
});

test("delete reports whether the node existed", () => {
  const registry = new NodeRegistry();
  registry.add("n1", "10.0.0.5", {});

  assert.equal(registry.delete("n1"), true);
  assert.equal(registry.delete("n1"), false);
  assert.equal(registry.has("n1"), false);
});

test("getParam ignores names inherited from Object.prototype", () => {
  const registry = new NodeRegistry({ constructor: "from-default" });
  registry.add("n1", "10.0.0.5", {});

  assert.equal(registry.getParam("n1", "constructor"), "from-default");
  assert.equal(registry.getParam("n1", "toString"), "");
  assert.equal(registry.getParam("ghost", "hasOwnProperty"), "");
});
