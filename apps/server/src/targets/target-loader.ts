import ipaddr from "ipaddr.js";
import type { InvalidTarget, LoadedTargets, Target, TargetEntry } from "../types";

const commentMarker = "#";
const hostnameLabelPattern = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;
const numericLabelPattern = /^\d+$/;
const maxHostnameLength = 253;

export const normalizeIdentifier = (raw: string): string => raw.trim().toLowerCase();

const isIpLiteral = (value: string): boolean =>
  ipaddr.IPv4.isValidFourPartDecimal(value) || ipaddr.IPv6.isValid(value);

const isHostname = (value: string): boolean => {
  if (value.length === 0 || value.length > maxHostnameLength) {
    return false;
  }

  const withoutRoot = value.endsWith(".") ? value.slice(0, -1) : value;
  const labels = withoutRoot.split(".");

  if (!labels.every((label) => label.length <= 63 && hostnameLabelPattern.test(label))) {
    return false;
  }

  // A name made of dotted numbers is an address attempt, not a host name.
  return !numericLabelPattern.test(labels[labels.length - 1]);
};

export const isValidTargetIdentifier = (identifier: string): boolean => {
  const normalized = normalizeIdentifier(identifier);
  return isIpLiteral(normalized) || isHostname(normalized);
};

const stripComment = (line: string): string => {
  const markerIndex = line.indexOf(commentMarker);
  return markerIndex === -1 ? line : line.slice(0, markerIndex);
};

interface CandidateLine extends TargetEntry {
  rawLine: string;
  lineNumber?: number;
}

const collectTargets = (candidates: CandidateLine[]): LoadedTargets => {
  const seen = new Set<string>();
  const targets: Target[] = [];
  const invalid: InvalidTarget[] = [];

  candidates.forEach((candidate) => {
    const identifier = normalizeIdentifier(candidate.identifier);

    // one set for both: validity is a function of the normalized identifier
    if (seen.has(identifier)) {
      return;
    }
    seen.add(identifier);

    if (!isValidTargetIdentifier(identifier)) {
      invalid.push({
        candidate: candidate.identifier.trim(),
        rawLine: candidate.rawLine,
        ...(candidate.lineNumber !== undefined ? { lineNumber: candidate.lineNumber } : {})
      });
      return;
    }

    const label = candidate.label?.trim();
    targets.push(label ? { identifier, label } : { identifier });
  });

  return { targets, invalid };
};

export const parseTargetList = (text: string): LoadedTargets => {
  const candidates: CandidateLine[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    const content = stripComment(line).trim();
    if (content.length === 0) {
      return;
    }

    const [identifier, label] = content.split(/\s+/);
    candidates.push({
      identifier,
      ...(label ? { label } : {}),
      rawLine: line.trim(),
      lineNumber: index + 1
    });
  });

  return collectTargets(candidates);
};

export const normalizeTargetEntries = (entries: TargetEntry[]): LoadedTargets =>
  collectTargets(
    entries.map((entry) => ({
      identifier: entry.identifier,
      ...(entry.label ? { label: entry.label } : {}),
      rawLine: entry.label ? `${entry.identifier} ${entry.label}` : entry.identifier
    }))
  );

export const tagTargets = (targets: Target[], jobName: string): Target[] =>
  targets.map((target) => ({ ...target, jobName }));
