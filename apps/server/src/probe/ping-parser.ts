import type { PingOutcome } from "../types";
import { unsupportedPlatformMarker } from "./ping-command";

export interface PingStatistics {
  transmitted: number | null;
  received: number | null;
  packetLossPercent: number | null;
  replyCount: number;
  firstReplyMs: number | null;
  avgLatencyMs: number | null;
  resolutionFailure: boolean;
  unsupported: boolean;
}

const replyTimePattern = /(?:time|时间)\s*[=<]\s*([\d.]+)\s*ms/gi;
const resolutionFailurePattern =
  /(unknown host|name or service not known|could not find host|cannot resolve|temporary failure in name resolution|no address associated with hostname|nodename nor servname provided|找不到主机)/i;

const toNumber = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
};

export const parsePingOutput = (output: string): PingStatistics => {
  const replyTimes = [...output.matchAll(replyTimePattern)].map((match) => Number(match[1]));

  const unixCounts = output.match(/(\d+)\s+packets?\s+transmitted,\s*(\d+)\s+(?:packets\s+)?received/i);
  const windowsCounts = output.match(/(?:Sent|已发送)\s*=\s*(\d+)[,，]\s*(?:Received|已接收)\s*=\s*(\d+)/i);
  const counts = unixCounts ?? windowsCounts;

  const windowsLossMatch = output.match(/\(([\d.]+)%\s*(?:loss|丢失)\)/i);
  const unixLossMatch = output.match(/([\d.]+)%\s*packet\s*loss/i);
  const lossRaw = windowsLossMatch?.[1] ?? unixLossMatch?.[1];

  const windowsAvgMatch = output.match(/(?:Average|平均)\s*[=:：]\s*(\d+)\s*ms/i);
  const unixAvgMatch = output.match(/=\s*[\d.]+\/([\d.]+)\/[\d.]+(?:\/[\d.]+)?\s*ms/i);

  return {
    transmitted: toNumber(counts?.[1]),
    received: toNumber(counts?.[2]),
    packetLossPercent: toNumber(lossRaw),
    replyCount: replyTimes.length,
    firstReplyMs: replyTimes.length > 0 ? replyTimes[0] : null,
    avgLatencyMs: toNumber(windowsAvgMatch?.[1] ?? unixAvgMatch?.[1]),
    resolutionFailure: resolutionFailurePattern.test(output),
    unsupported: output.includes(unsupportedPlatformMarker)
  };
};

const firstLine = (output: string): string | undefined =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0)
    ?.slice(0, 200);

export interface ClassifyInput {
  output: string;
  exitCode: number | null;
  platform: NodeJS.Platform;
}

/**
 * Turns one ping run into a reachability outcome. Windows ping counts
 * "Destination host unreachable" as a received packet and exits 0, so there
 * only timed replies count.
 */
export const classifyPingOutput = ({ output, exitCode, platform }: ClassifyInput): PingOutcome => {
  const stats = parsePingOutput(output);

  if (stats.unsupported) {
    return { reachable: false, reason: "tool-error", detail: "ping is not supported on this platform" };
  }

  if (stats.resolutionFailure) {
    return { reachable: false, reason: "resolution-failure", detail: firstLine(output) };
  }

  const replied =
    platform === "win32" ? stats.replyCount > 0 : stats.replyCount > 0 || (stats.received ?? 0) > 0;

  if (exitCode === 0) {
    if (replied) {
      return { reachable: true, latencyMs: stats.firstReplyMs ?? stats.avgLatencyMs };
    }

    if (stats.received === 0 || platform === "win32") {
      return { reachable: false, reason: "unreachable", detail: "no reply received" };
    }

    return { reachable: true, latencyMs: null };
  }

  if (exitCode === null) {
    return { reachable: false, reason: "tool-error", detail: "ping terminated by a signal" };
  }

  if (stats.received === 0 || (stats.packetLossPercent ?? 0) >= 100 || exitCode === 1) {
    return { reachable: false, reason: "unreachable", detail: "no reply received" };
  }

  return { reachable: false, reason: "tool-error", detail: firstLine(output) ?? `ping exited with code ${exitCode}` };
};
