import CronParser from "cron-parser";

import { ConfigurationError, errorMessage } from "../lib/errors";

export interface CronExpression {
  source: string;
  minute: ReadonlySet<number>;
  hour: ReadonlySet<number>;
  dayOfMonth: ReadonlySet<number>;
  month: ReadonlySet<number>;
  dayOfWeek: ReadonlySet<number>;
}

// Numbers, `*`, three-letter names, one range and one step. The parser also
// takes L, W, # and H, which the day matching below cannot honour.
const itemPattern = /^(\*|\d+|[a-z]{3})(?:-(\d+|[a-z]{3}))?(?:\/(\d+))?$/i;

// Anything past this many parser candidates means the rule never lines up.
const candidateLimit = 10_000;

const invalid = (source: string, reason: string): ConfigurationError =>
  new ConfigurationError(`Invalid schedule "${source}": ${reason}`);

const checkField = (field: string, source: string): void => {
  field.split(",").forEach((item) => {
    const match = itemPattern.exec(item);
    if (!match) {
      throw invalid(source, `"${item}" is not a supported field item`);
    }
    const [, from, to] = match;
    if (to !== undefined && /^\d+$/.test(from) && /^\d+$/.test(to) && Number(from) > Number(to)) {
      throw invalid(source, `range ${from}-${to} runs backwards`);
    }
  });
};

const numbers = (values: readonly (number | string)[]): number[] =>
  values.filter((value): value is number => typeof value === "number");

/**
 * Parses a five-field schedule (minute, hour, day of month, month, day of
 * week) with cron-parser and keeps the value set of each field. Sunday is 0
 * or 7.
 */
export const parseCronExpression = (source: string): CronExpression => {
  const trimmed = source.trim();
  const parts = trimmed.length === 0 ? [] : trimmed.split(/\s+/);
  if (parts.length !== 5) {
    throw invalid(source, `expected 5 fields, got ${parts.length}`);
  }
  parts.forEach((field) => checkField(field, source));

  let parsed: ReturnType<typeof CronParser.parse>;
  try {
    parsed = CronParser.parse(trimmed);
  } catch (error) {
    throw invalid(source, errorMessage(error));
  }

  const { fields } = parsed;
  return {
    source,
    minute: new Set(numbers(fields.minute.values)),
    hour: new Set(numbers(fields.hour.values)),
    dayOfMonth: new Set(numbers(fields.dayOfMonth.values)),
    month: new Set(numbers(fields.month.values)),
    dayOfWeek: new Set(numbers(fields.dayOfWeek.values).map((day) => (day === 7 ? 0 : day)))
  };
};

/** All five fields must match; day of month and day of week are not OR-ed. */
export const matchesCron = (expression: CronExpression, date: Date): boolean =>
  expression.minute.has(date.getMinutes()) &&
  expression.hour.has(date.getHours()) &&
  expression.dayOfMonth.has(date.getDate()) &&
  expression.month.has(date.getMonth() + 1) &&
  expression.dayOfWeek.has(date.getDay());

export const floorToMinute = (date: Date): Date => {
  const floored = new Date(date.getTime());
  floored.setSeconds(0, 0);
  return floored;
};

/**
 * The first matching minute strictly after `after`, or null. cron-parser
 * walks the candidates; when both day fields are restricted it yields the
 * union of the two, so each candidate is checked against both.
 */
export const nextCronMatch = (expression: CronExpression, after: Date): Date | null => {
  const interval = CronParser.parse(expression.source.trim(), { currentDate: floorToMinute(after) });

  for (let step = 0; step < candidateLimit; step += 1) {
    let candidate: Date;
    try {
      candidate = interval.next().toDate();
    } catch (error) {
      // the parser ran out of occurrences
      if (error instanceof Error) {
        return null;
      }
      throw error;
    }
    if (candidate.getTime() > after.getTime() && matchesCron(expression, candidate)) {
      return candidate;
    }
  }

  return null;
};
