export interface PingCommandInput {
  target: string;
  count: number;
  timeoutSeconds: number;
}

export interface CommandBuildResult {
  command: string;
  args: string[];
}

export type PingCommandBuilder = (input: PingCommandInput) => CommandBuildResult;

export const unsupportedPlatformMarker = "UNSUPPORTED_PLATFORM:";

const isIpv6Literal = (target: string): boolean => target.includes(":");

const wholeSeconds = (timeoutSeconds: number): string => String(Math.max(1, Math.ceil(timeoutSeconds)));

const milliseconds = (timeoutSeconds: number): string => String(Math.max(1, Math.round(timeoutSeconds * 1000)));

const unsupportedPlatform = (platform: string): PingCommandBuilder => () => ({
  command: process.execPath,
  args: ["-e", `console.log(${JSON.stringify(`${unsupportedPlatformMarker} ping on ${platform}`)}); process.exit(1);`]
});

/**
 * Picks the ping flag dialect for a platform. Called once per process; the
 * returned builder is reused for every target.
 */
export const createPingCommandBuilder = (platform: NodeJS.Platform = process.platform): PingCommandBuilder => {
  if (platform === "win32") {
    return ({ target, count, timeoutSeconds }) => ({
      command: "ping",
      args: ["-n", String(count), "-w", milliseconds(timeoutSeconds), target]
    });
  }

  if (platform === "darwin" || platform === "freebsd") {
    return ({ target, count, timeoutSeconds }) => {
      if (isIpv6Literal(target)) {
        return { command: "ping6", args: ["-c", String(count), target] };
      }
      return { command: "ping", args: ["-c", String(count), "-W", milliseconds(timeoutSeconds), target] };
    };
  }

  if (platform === "linux") {
    return ({ target, count, timeoutSeconds }) => ({
      command: "ping",
      args: ["-c", String(count), "-W", wholeSeconds(timeoutSeconds), target]
    });
  }

  return unsupportedPlatform(platform);
};
