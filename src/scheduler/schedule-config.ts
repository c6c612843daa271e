/**
 * Schedule configuration validation and fire-time computation
 */

import { z } from 'zod';
import { InvalidScheduleError } from '../errors/index.js';
import { ok, err, type Result } from '../utils/result.js';
import { nextCronTime, parseCron } from './cron.js';
import { DEFAULT_RETRY_OPTIONS, type ResolvedScheduleConfig } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

/** Accepts Date instances, ISO strings and epoch milliseconds */
const dateField = z.preprocess(
  value => (typeof value === 'string' || typeof value === 'number' ? new Date(value) : value),
  z.date({ required_error: 'is required', invalid_type_error: 'must be a date' })
);

const retryFields = {
  retryOnFailure: z.boolean().default(DEFAULT_RETRY_OPTIONS.retryOnFailure),
  maxRetries: z.number().int().min(0).default(DEFAULT_RETRY_OPTIONS.maxRetries),
  retryDelay: z.number().min(0).default(DEFAULT_RETRY_OPTIONS.retryDelay),
};

const OneTimeScheduleSchema = z.object({
  kind: z.literal('one_time'),
  startAt: dateField,
  ...retryFields,
});

const RecurringScheduleSchema = z.object({
  kind: z.literal('recurring'),
  interval: z.number({ required_error: 'is required' }).positive('must be positive'),
  startAt: dateField.optional(),
  endAt: dateField.optional(),
  ...retryFields,
});

const CronScheduleSchema = z.object({
  kind: z.literal('cron'),
  cronExpression: z.string({ required_error: 'is required' }).min(1, 'is required'),
  startAt: dateField.optional(),
  endAt: dateField.optional(),
  ...retryFields,
});

export const ScheduleConfigSchema = z
  .discriminatedUnion('kind', [OneTimeScheduleSchema, RecurringScheduleSchema, CronScheduleSchema])
  .superRefine((config, ctx) => {
    if (config.kind === 'cron') {
      const parsed = parseCron(config.cronExpression);
      if (!parsed.ok) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cronExpression'],
          message: `unparsable expression (${parsed.error})`,
        });
      }
    }
    if (config.kind !== 'one_time' && config.startAt && config.endAt && config.endAt < config.startAt) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endAt'],
        message: 'precedes startAt',
      });
    }
  });

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate a schedule config for its kind and fill in retry defaults
 */
export function parseScheduleConfig(input: unknown): Result<ResolvedScheduleConfig, InvalidScheduleError> {
  const parsed = ScheduleConfigSchema.safeParse(input);
  if (!parsed.success) {
    return err(new InvalidScheduleError(parsed.error.issues.map(formatIssue)));
  }
  return ok(parsed.data);
}

// ============================================================================
// Fire times
// ============================================================================

function withinEnd(config: ResolvedScheduleConfig, at: Date | null): Date | null {
  if (!at || config.kind === 'one_time') return at;
  if (config.endAt && at.getTime() > config.endAt.getTime()) return null;
  return at;
}

/**
 * When a newly scheduled job first fires; null when it never will
 */
export function firstFireTime(config: ResolvedScheduleConfig, now: Date): Date | null {
  switch (config.kind) {
    case 'one_time':
      return config.startAt.getTime() < now.getTime() ? new Date(now) : new Date(config.startAt);

    case 'recurring': {
      if (!config.startAt) {
        return withinEnd(config, new Date(now.getTime() + config.interval));
      }
      const start = config.startAt.getTime();
      if (start >= now.getTime()) {
        return withinEnd(config, new Date(start));
      }
      // Keep the phase of a start time that already passed
      const periods = Math.ceil((now.getTime() - start) / config.interval);
      return withinEnd(config, new Date(start + periods * config.interval));
    }

    case 'cron': {
      const cron = parseCron(config.cronExpression);
      if (!cron.ok) return null;
      const from = config.startAt && config.startAt > now ? config.startAt : now;
      return withinEnd(config, nextCronTime(cron.value, from));
    }
  }
}

/**
 * The fire time following `previous`; null when the job is done
 */
export function nextFireTime(config: ResolvedScheduleConfig, previous: Date): Date | null {
  switch (config.kind) {
    case 'one_time':
      return null;

    case 'recurring':
      return withinEnd(config, new Date(previous.getTime() + config.interval));

    case 'cron': {
      const cron = parseCron(config.cronExpression);
      if (!cron.ok) return null;
      return withinEnd(config, nextCronTime(cron.value, new Date(previous.getTime() + 1)));
    }
  }
}
