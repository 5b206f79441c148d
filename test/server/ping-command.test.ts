import assert from "node:assert/strict";
import { test } from "node:test";

import { createPingCommandBuilder, unsupportedPlatformMarker } from "../../apps/server/src/probe/ping-command";

test("createPingCommandBuilder: windows takes milliseconds", () => {
  const build = createPingCommandBuilder("win32");

  assert.deepEqual(build({ target: "192.0.2.1", count: 2, timeoutSeconds: 1.5 }), {
    command: "ping",
    args: ["-n", "2", "-w", "1500", "192.0.2.1"]
  });
});

test("createPingCommandBuilder: linux rounds the wait up to whole seconds", () => {
  const build = createPingCommandBuilder("linux");

  assert.deepEqual(build({ target: "host.example", count: 1, timeoutSeconds: 0.2 }), {
    command: "ping",
    args: ["-c", "1", "-W", "1", "host.example"]
  });
  assert.deepEqual(build({ target: "::1", count: 3, timeoutSeconds: 2.5 }).args, ["-c", "3", "-W", "3", "::1"]);
});

test("createPingCommandBuilder: darwin uses ping6 for IPv6 literals", () => {
  const build = createPingCommandBuilder("darwin");

  assert.deepEqual(build({ target: "192.0.2.1", count: 1, timeoutSeconds: 3 }), {
    command: "ping",
    args: ["-c", "1", "-W", "3000", "192.0.2.1"]
  });
  assert.deepEqual(build({ target: "2001:db8::1", count: 4, timeoutSeconds: 3 }), {
    command: "ping6",
    args: ["-c", "4", "2001:db8::1"]
  });
});

test("createPingCommandBuilder: other platforms print the unsupported marker", () => {
  const build = createPingCommandBuilder("aix");

  const { command, args } = build({ target: "192.0.2.1", count: 1, timeoutSeconds: 1 });

  assert.equal(command, process.execPath);
  assert.equal(args[0], "-e");
  assert.ok(args[1]?.includes(unsupportedPlatformMarker));
});
