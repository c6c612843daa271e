/**
 * Environment Variable Schema & Validation
 *
 * Every variable the orchestration core reads, with its default.
 * Empty values count as unset.
 */

import { z } from 'zod';

export interface EnvVarDef {
  name: string;
  default: string;
  description: string;
}

export const ENV_SCHEMA: EnvVarDef[] = [
  { name: 'TASKLOOM_MAX_WORKERS', default: '5', description: 'Worker pool size' },
  { name: 'TASKLOOM_EVENT_QUEUE_SIZE', default: '1000', description: 'Event bus capacity' },
  { name: 'TASKLOOM_DEFAULT_MAX_RETRIES', default: '3', description: 'Retries per task unless set on the task' },
  { name: 'TASKLOOM_AGENT_TIMEOUT_MS', default: '0', description: 'Default agent timeout, 0 for none' },
  { name: 'TASKLOOM_STORE_DRIVER', default: 'memory', description: 'Task store: memory, file or sqlite' },
  { name: 'TASKLOOM_STORE_PATH', default: './task_storage', description: 'Store directory or database file' },
  { name: 'TASKLOOM_CLEANUP_INTERVAL_MS', default: '3600000', description: 'Period of the finished-task cleanup' },
  { name: 'TASKLOOM_TASK_RETENTION_DAYS', default: '7', description: 'Age after which finished tasks are removed' },
  { name: 'TASKLOOM_DISPATCH_INTERVAL_MS', default: '100', description: 'Orchestrator dispatch tick' },
  { name: 'TASKLOOM_EXPORT_DIR', default: './exports', description: 'Directory for task result exports' },
];

function defaultOf(name: string): string {
  const def = ENV_SCHEMA.find(entry => entry.name === name);
  if (!def) {
    throw new Error(`Unknown environment variable ${name}`);
  }
  return def.default;
}

const unsetIfEmpty = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function integerVar(name: string, min: number) {
  return z.preprocess(
    unsetIfEmpty,
    z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(min, `must be at least ${min}`)
      .default(Number(defaultOf(name)))
  );
}

export const EnvSchema = z.object({
  TASKLOOM_MAX_WORKERS: integerVar('TASKLOOM_MAX_WORKERS', 1),
  TASKLOOM_EVENT_QUEUE_SIZE: integerVar('TASKLOOM_EVENT_QUEUE_SIZE', 1),
  TASKLOOM_DEFAULT_MAX_RETRIES: integerVar('TASKLOOM_DEFAULT_MAX_RETRIES', 0),
  TASKLOOM_AGENT_TIMEOUT_MS: integerVar('TASKLOOM_AGENT_TIMEOUT_MS', 0),
  TASKLOOM_STORE_DRIVER: z.preprocess(
    unsetIfEmpty,
    z
      .enum(['memory', 'file', 'sqlite'], {
        errorMap: () => ({ message: 'must be one of memory, file, sqlite' }),
      })
      .default('memory')
  ),
  TASKLOOM_STORE_PATH: z.preprocess(unsetIfEmpty, z.string().default(defaultOf('TASKLOOM_STORE_PATH'))),
  TASKLOOM_CLEANUP_INTERVAL_MS: integerVar('TASKLOOM_CLEANUP_INTERVAL_MS', 1),
  TASKLOOM_TASK_RETENTION_DAYS: integerVar('TASKLOOM_TASK_RETENTION_DAYS', 0),
  TASKLOOM_DISPATCH_INTERVAL_MS: integerVar('TASKLOOM_DISPATCH_INTERVAL_MS', 1),
  TASKLOOM_EXPORT_DIR: z.preprocess(unsetIfEmpty, z.string().default(defaultOf('TASKLOOM_EXPORT_DIR'))),
});

export type EnvVars = z.infer<typeof EnvSchema>;
