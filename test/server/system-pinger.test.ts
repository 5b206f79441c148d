import assert from "node:assert/strict";
import { test } from "node:test";

import type { PingCommandBuilder } from "../../apps/server/src/probe/ping-command";
import { SystemPinger } from "../../apps/server/src/probe/system-pinger";

// Stands in for ping: a node child that prints `output` and exits with `exitCode`.
const scripted =
  (output: string, exitCode: number): PingCommandBuilder =>
  () => ({
    command: process.execPath,
    args: ["-e", `process.stdout.write(${JSON.stringify(output)}); process.exitCode = ${exitCode};`]
  });

const hanging: PingCommandBuilder = () => ({
  command: process.execPath,
  args: ["-e", "setTimeout(() => {}, 30000);"]
});

test("SystemPinger: a reply from the child is reachable", async () => {
  const pinger = new SystemPinger({
    platform: "linux",
    buildCommand: scripted(
      "64 bytes from 192.0.2.1: icmp_seq=1 ttl=57 time=7.25 ms\n1 packets transmitted, 1 received, 0% packet loss\n",
      0
    )
  });

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 5, count: 1 });

  assert.deepEqual(outcome, { reachable: true, latencyMs: 7.25 });
});

test("SystemPinger: exit 1 with full loss is unreachable", async () => {
  const pinger = new SystemPinger({
    platform: "linux",
    buildCommand: scripted("1 packets transmitted, 0 received, 100% packet loss\n", 1)
  });

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 5, count: 1 });

  assert.deepEqual(outcome, { reachable: false, reason: "unreachable", detail: "no reply received" });
});

test("SystemPinger: the child is killed at the deadline", async () => {
  const pinger = new SystemPinger({ platform: "linux", buildCommand: hanging, graceSeconds: 0 });
  const startedAt = Date.now();

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 0.2, count: 1 });

  assert.deepEqual(outcome, { reachable: false, reason: "timeout", detail: "no answer within 0.2s" });
  assert.ok(Date.now() - startedAt < 5000);
});

test("SystemPinger: aborting cancels the probe", async () => {
  const pinger = new SystemPinger({ platform: "linux", buildCommand: hanging });
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 100);

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 10, count: 1, signal: controller.signal });

  assert.deepEqual(outcome, { reachable: false, reason: "tool-error", detail: "cancelled" });
});

test("SystemPinger: an already aborted signal never spawns", async () => {
  let built = 0;
  const pinger = new SystemPinger({
    platform: "linux",
    buildCommand: (input) => {
      built += 1;
      return hanging(input);
    }
  });

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 1, count: 1, signal: AbortSignal.abort() });

  assert.deepEqual(outcome, { reachable: false, reason: "tool-error", detail: "cancelled" });
  assert.equal(built, 0);
});

test("SystemPinger: a missing ping binary is a tool error", async () => {
  const pinger = new SystemPinger({
    platform: "linux",
    buildCommand: () => ({ command: "/nonexistent/reachwatch-ping", args: [] })
  });

  const outcome = await pinger.probe("192.0.2.1", { timeoutSeconds: 1, count: 1 });

  assert.equal(outcome.reachable, false);
  if (!outcome.reachable) {
    assert.equal(outcome.reason, "tool-error");
    assert.match(outcome.detail ?? "", /ENOENT/);
  }
});
