/**
 * Config module - Runtime configuration from the environment
 */

import * as dotenv from 'dotenv';
import { ConfigurationError } from '../errors/index.js';
import type { StoreDriver } from '../store/types.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { EnvSchema } from './env-schema.js';

export { ENV_SCHEMA, EnvSchema, type EnvVarDef, type EnvVars } from './env-schema.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TaskloomConfig {
  maxWorkers: number;
  eventQueueSize: number;
  defaultMaxRetries: number;
  /** 0 disables agent timeouts */
  agentTimeoutMs: number;
  store: {
    driver: StoreDriver;
    path: string;
  };
  cleanupIntervalMs: number;
  taskRetentionMs: number;
  dispatchIntervalMs: number;
  exportDir: string;
}

export const DEFAULT_CONFIG: TaskloomConfig = {
  maxWorkers: 5,
  eventQueueSize: 1000,
  defaultMaxRetries: 3,
  agentTimeoutMs: 0,
  store: { driver: 'memory', path: './task_storage' },
  cleanupIntervalMs: 60 * 60 * 1000,
  taskRetentionMs: 7 * DAY_MS,
  dispatchIntervalMs: 100,
  exportDir: './exports',
};

/**
 * Load variables from a .env file into process.env
 */
export function loadEnvironment(path?: string): void {
  const loaded = dotenv.config(path ? { path } : undefined);
  if (loaded.error) {
    logger.debug(`No .env file loaded: ${loaded.error.message}`);
  }
}

/**
 * Build the configuration from environment variables, reporting every
 * invalid value at once
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<TaskloomConfig, ConfigurationError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return err(new ConfigurationError(issues));
  }

  const vars = parsed.data;
  return ok({
    maxWorkers: vars.TASKLOOM_MAX_WORKERS,
    eventQueueSize: vars.TASKLOOM_EVENT_QUEUE_SIZE,
    defaultMaxRetries: vars.TASKLOOM_DEFAULT_MAX_RETRIES,
    agentTimeoutMs: vars.TASKLOOM_AGENT_TIMEOUT_MS,
    store: {
      driver: vars.TASKLOOM_STORE_DRIVER,
      path: vars.TASKLOOM_STORE_PATH,
    },
    cleanupIntervalMs: vars.TASKLOOM_CLEANUP_INTERVAL_MS,
    taskRetentionMs: vars.TASKLOOM_TASK_RETENTION_DAYS * DAY_MS,
    dispatchIntervalMs: vars.TASKLOOM_DISPATCH_INTERVAL_MS,
    exportDir: vars.TASKLOOM_EXPORT_DIR,
  });
}
