/**
 * Cron Expression Parser
 *
 * Standard 5-field cron: minute hour day-of-month month day-of-week.
 * Fields take `*`, values, ranges (`1-5`), steps (`1-30/5`, `5/10`), comma
 * lists, and month/weekday names. Day-of-week 0 and 7 are Sunday.
 * All fields must match, day-of-month and day-of-week included.
 * Times are evaluated in local time.
 */

import { ok, err, type Result } from '../utils/result.js';

export interface CronField {
  values: number[];
  min: number;
  max: number;
}

export interface ParsedCron {
  minute: CronField;
  hour: CronField;
  dayOfMonth: CronField;
  month: CronField;
  dayOfWeek: CronField;
}

type FieldName = keyof ParsedCron;

const FIELD_ORDER: readonly FieldName[] = ['minute', 'hour', 'dayOfMonth', 'month', 'dayOfWeek'];

const FIELD_RANGES: Record<FieldName, { min: number; max: number }> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
  dayOfWeek: { min: 0, max: 7 },
};

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

/** Searches stop after this many years without a match */
const MAX_SEARCH_YEARS = 5;

function parseValue(token: string, field: FieldName): number | null {
  const lower = token.toLowerCase();
  if (field === 'month' && MONTH_NAMES.includes(lower)) {
    return MONTH_NAMES.indexOf(lower) + 1;
  }
  if (field === 'dayOfWeek' && DAY_NAMES.includes(lower)) {
    return DAY_NAMES.indexOf(lower);
  }
  if (!/^\d+$/.test(token)) {
    return null;
  }
  return parseInt(token, 10);
}

/**
 * Parse a single cron field
 */
function parseField(source: string, field: FieldName): Result<number[], string> {
  const { min, max } = FIELD_RANGES[field];
  const values: Set<number> = new Set();

  for (const part of source.split(',')) {
    const [range, stepStr, extra] = part.split('/');
    if (extra !== undefined || range === '') {
      return err(`${field}: invalid token "${part}"`);
    }

    let step = 1;
    if (stepStr !== undefined) {
      const parsedStep = /^\d+$/.test(stepStr) ? parseInt(stepStr, 10) : 0;
      if (parsedStep < 1) {
        return err(`${field}: invalid step "${stepStr}"`);
      }
      step = parsedStep;
    }

    let start: number;
    let end: number;
    if (range === '*') {
      start = min;
      end = max;
    } else if (range.includes('-')) {
      const [startStr, endStr, rest] = range.split('-');
      const from = parseValue(startStr, field);
      const to = endStr === undefined ? null : parseValue(endStr, field);
      if (rest !== undefined || from === null || to === null || from > to) {
        return err(`${field}: invalid range "${range}"`);
      }
      start = from;
      end = to;
    } else {
      const value = parseValue(range, field);
      if (value === null) {
        return err(`${field}: invalid value "${range}"`);
      }
      start = value;
      // "5/10" runs from 5 to the end of the range
      end = stepStr !== undefined ? max : value;
    }

    if (start < min || end > max) {
      return err(`${field}: ${range} out of range ${min}-${max}`);
    }
    for (let i = start; i <= end; i += step) {
      values.add(field === 'dayOfWeek' && i === 7 ? 0 : i);
    }
  }

  return ok(Array.from(values).sort((a, b) => a - b));
}

/**
 * Parse a full cron expression
 */
export function parseCron(expression: string): Result<ParsedCron, string> {
  const parts = expression.trim().split(/\s+/);
  if (parts.length !== 5) {
    return err(`expected 5 fields, got ${parts.length}`);
  }

  const fields: Partial<Record<FieldName, CronField>> = {};
  for (const [index, name] of FIELD_ORDER.entries()) {
    const parsed = parseField(parts[index], name);
    if (!parsed.ok) {
      return parsed;
    }
    fields[name] = { values: parsed.value, ...FIELD_RANGES[name] };
  }

  const { minute, hour, dayOfMonth, month, dayOfWeek } = fields;
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    return err('incomplete expression');
  }
  return ok({ minute, hour, dayOfMonth, month, dayOfWeek });
}

export function isValidCron(expression: string): boolean {
  return parseCron(expression).ok;
}

/**
 * Check if a date matches a cron expression
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  return (
    cron.minute.values.includes(date.getMinutes()) &&
    cron.hour.values.includes(date.getHours()) &&
    cron.dayOfMonth.values.includes(date.getDate()) &&
    cron.month.values.includes(date.getMonth() + 1) &&
    cron.dayOfWeek.values.includes(date.getDay())
  );
}

/**
 * First whole minute at or after `from` that matches. A `from` that sits
 * exactly on a minute boundary is itself a candidate.
 */
export function nextCronTime(cron: ParsedCron, from: Date): Date | null {
  const next = new Date(from);
  if (next.getSeconds() !== 0 || next.getMilliseconds() !== 0) {
    next.setSeconds(0, 0);
    next.setMinutes(next.getMinutes() + 1);
  }

  const limit = new Date(from);
  limit.setFullYear(limit.getFullYear() + MAX_SEARCH_YEARS);

  while (next < limit) {
    if (!cron.month.values.includes(next.getMonth() + 1)) {
      next.setMonth(next.getMonth() + 1, 1);
      next.setHours(0, 0, 0, 0);
      continue;
    }
    if (!cron.dayOfMonth.values.includes(next.getDate()) || !cron.dayOfWeek.values.includes(next.getDay())) {
      next.setDate(next.getDate() + 1);
      next.setHours(0, 0, 0, 0);
      continue;
    }
    if (!cron.hour.values.includes(next.getHours())) {
      next.setHours(next.getHours() + 1, 0, 0, 0);
      continue;
    }
    if (!cron.minute.values.includes(next.getMinutes())) {
      next.setMinutes(next.getMinutes() + 1, 0, 0);
      continue;
    }
    return next;
  }

  return null;
}

/**
 * Get the next run time for a cron expression, strictly after `from`
 */
export function getNextRunTime(expression: string, from: Date = new Date()): Date | null {
  const cron = parseCron(expression);
  if (!cron.ok) return null;

  return nextCronTime(cron.value, new Date(from.getTime() + 1));
}
