import { spawn, spawnSync } from "node:child_process";
import { TextDecoder } from "node:util";
import type { PingOutcome } from "../types";
import { createPingCommandBuilder, type PingCommandBuilder } from "./ping-command";
import { classifyPingOutput } from "./ping-parser";

export interface PingOptions {
  timeoutSeconds: number;
  count: number;
  signal?: AbortSignal;
}

/** The reachability primitive: one call per target, never retried by callers. */
export interface Pinger {
  probe(target: string, options: PingOptions): Promise<PingOutcome>;
}

export interface SystemPingerOptions {
  platform?: NodeJS.Platform;
  buildCommand?: PingCommandBuilder;
  /** Seconds added to `timeoutSeconds * count` before the child is killed. */
  graceSeconds?: number;
}

const codePageToEncoding = (codePage?: string): string => {
  switch (codePage) {
    case "65001":
      return "utf-8";
    case "936":
      return "gbk";
    case "54936":
      return "gb18030";
    case "950":
      return "big5";
    case "932":
      return "shift_jis";
    case "949":
      return "euc-kr";
    case "1252":
      return "windows-1252";
    case "437":
      return "ibm437";
    default:
      return "utf-8";
  }
};

// Localized Windows ping prints in the console code page, not UTF-8.
const resolveOutputEncoding = (platform: NodeJS.Platform): string => {
  if (platform !== "win32") {
    return "utf-8";
  }

  const result = spawnSync("cmd", ["/d", "/s", "/c", "chcp"], {
    windowsHide: true,
    encoding: "utf8"
  });
  const output = `${result.stdout ?? ""}\n${result.stderr ?? ""}`;
  return codePageToEncoding(output.match(/(\d{3,5})/)?.[1]);
};

const createDecoder = (encoding: string): TextDecoder => {
  try {
    return new TextDecoder(encoding);
  } catch {
    return new TextDecoder("utf-8");
  }
};

export class SystemPinger implements Pinger {
  private readonly platform: NodeJS.Platform;
  private readonly buildCommand: PingCommandBuilder;
  private readonly encoding: string;
  private readonly graceSeconds: number;

  constructor(options: SystemPingerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.buildCommand = options.buildCommand ?? createPingCommandBuilder(this.platform);
    this.encoding = resolveOutputEncoding(this.platform);
    this.graceSeconds = options.graceSeconds ?? 2;
  }

  probe(target: string, { timeoutSeconds, count, signal }: PingOptions): Promise<PingOutcome> {
    if (signal?.aborted) {
      return Promise.resolve({ reachable: false, reason: "tool-error", detail: "cancelled" });
    }

    const executable = this.buildCommand({ target, count, timeoutSeconds });

    return new Promise<PingOutcome>((resolve) => {
      const child = spawn(executable.command, executable.args, { windowsHide: true });
      const stdoutDecoder = createDecoder(this.encoding);
      const stderrDecoder = createDecoder(this.encoding);

      let output = "";
      let finalized = false;

      const finalize = (outcome: PingOutcome): void => {
        if (finalized) {
          return;
        }

        finalized = true;
        clearTimeout(deadline);
        signal?.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      const onAbort = (): void => {
        child.kill();
        finalize({ reachable: false, reason: "tool-error", detail: "cancelled" });
      };

      const deadlineSeconds = timeoutSeconds * count + this.graceSeconds;
      const deadline = setTimeout(() => {
        child.kill();
        finalize({ reachable: false, reason: "timeout", detail: `no answer within ${deadlineSeconds}s` });
      }, deadlineSeconds * 1000);

      signal?.addEventListener("abort", onAbort, { once: true });

      child.stdout.on("data", (chunk: Buffer) => {
        output += stdoutDecoder.decode(chunk, { stream: true });
      });

      child.stderr.on("data", (chunk: Buffer) => {
        output += stderrDecoder.decode(chunk, { stream: true });
      });

      child.on("error", (error) => {
        finalize({ reachable: false, reason: "tool-error", detail: error.message });
      });

      child.on("close", (exitCode) => {
        output += stdoutDecoder.decode() + stderrDecoder.decode();
        finalize(classifyPingOutput({ output, exitCode, platform: this.platform }));
      });
    });
  }
}
