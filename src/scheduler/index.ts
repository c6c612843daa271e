/**
 * Scheduler Module
 */

export { TaskScheduler } from './scheduler.js';
export { OfflineQueue } from './offline-queue.js';
export {
  ScheduleConfigSchema,
  parseScheduleConfig,
  firstFireTime,
  nextFireTime,
} from './schedule-config.js';
export {
  parseCron,
  isValidCron,
  matchesCron,
  nextCronTime,
  getNextRunTime,
  type CronField,
  type ParsedCron,
} from './cron.js';
export * from './types.js';
