import { existsSync } from "node:fs";
import * as path from "node:path";
import { SourceNotFoundError } from "../lib/errors";

export interface ResolveOptions {
  baseDir: string;
  cwd?: string;
}

export const candidateSourcePaths = (source: string, { baseDir, cwd = process.cwd() }: ResolveOptions): string[] => {
  if (path.isAbsolute(source)) {
    return [source];
  }

  const candidates = [
    path.resolve(cwd, source),
    path.resolve(baseDir, "config", source),
    path.resolve(baseDir, source)
  ];

  return [...new Set(candidates)];
};

/**
 * Finds a target or schedule file. Relative names are looked up in the working
 * directory, then `<baseDir>/config`, then `<baseDir>`.
 */
export const resolveSourcePath = (source: string, options: ResolveOptions): string => {
  const candidates = candidateSourcePaths(source, options);
  const found = candidates.find((candidate) => existsSync(candidate));

  if (!found) {
    throw new SourceNotFoundError(source, candidates);
  }

  return found;
};
