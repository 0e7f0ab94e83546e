import assert from "node:assert/strict";
import test from "node:test";
import { DeploySubject } from "../types";
import {
  binaryPath,
  createRemoteLayout,
  extractArchiveCommand,
  probeProcessCommand,
  readSentinelCommand,
  startCommands,
  stopPreviousCommand,
  versionCommand,
} from "./remote-commands";

test("createRemoteLayout places the archive beside the root", () => {
  assert.deepEqual(createRemoteLayout(), {
    root: "/tmp/nodepool",
    archivePath: "/tmp/nodepool-archive.tar.xz",
    pidFile: "/tmp/nodepool/pid",
    bindAddrFile: "/tmp/nodepool/bind_addr",
    bindPortFile: "/tmp/nodepool/bind_port",
  });
});

test("createRemoteLayout strips trailing slashes", () => {
  const layout = createRemoteLayout("/opt/np/");
  assert.equal(layout.root, "/opt/np");
  assert.equal(layout.archivePath, "/opt/np-archive.tar.xz");
});

test("deploy stage commands", () => {
  const layout = createRemoteLayout();
  assert.equal(binaryPath(layout, DeploySubject.Agent), "/tmp/nodepool/bin/agent");
  assert.equal(
    extractArchiveCommand(layout),
    "mkdir -p '/tmp/nodepool' && tar xf '/tmp/nodepool-archive.tar.xz' -C '/tmp/nodepool' > /dev/null 2> /dev/null && echo ok"
  );
  assert.equal(versionCommand(layout, DeploySubject.Agent), "'/tmp/nodepool/bin/agent' --version");
});

test("stopPreviousCommand wraps the kill script for /bin/sh", () => {
  assert.equal(
    stopPreviousCommand(createRemoteLayout()),
    String.raw`/bin/sh -c 'test -f '\''/tmp/nodepool/pid'\'' && test "$(cat '\''/tmp/nodepool/pid'\'')" -gt 0 && kill "$(cat '\''/tmp/nodepool/pid'\'')"'`
  );
});

test("sentinel and probe commands", () => {
  assert.equal(readSentinelCommand("/tmp/nodepool/pid"), "cat '/tmp/nodepool/pid' 2> /dev/null");
  assert.equal(probeProcessCommand(42), "kill -0 42 && echo runs");
});

test("paths with quotes stay one shell word", () => {
  const layout = createRemoteLayout("/tmp/it's");
  assert.equal(readSentinelCommand(layout.pidFile), String.raw`cat '/tmp/it'\''s/pid' 2> /dev/null`);
});

test("startCommands builds the start script", () => {
  const lines = startCommands(createRemoteLayout(), DeploySubject.Agent, { addr: "0.0.0.0", port: 6000 }, 4);

  assert.deepEqual(lines, [
    "'/tmp/nodepool/bin/agent' --server 'tcp://0.0.0.0:6000' < /dev/null > /dev/null 2> /dev/null &",
    "echo $! > '/tmp/nodepool/pid'",
    "echo '0.0.0.0' > '/tmp/nodepool/bind_addr'",
    "echo 6000 > '/tmp/nodepool/bind_port'",
    "sleep 4",
    `kill -0 "$(cat '/tmp/nodepool/pid')" && echo nodepool-running "$(cat '/tmp/nodepool/pid')"`,
  ]);
});
