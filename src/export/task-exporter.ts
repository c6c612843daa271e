/**
 * Task Exporter - Writes task results to JSON or CSV files
 *
 * Exports that cannot be written are kept in an in-memory queue and
 * retried by processOfflineQueue(). Old export files are removed by
 * cleanOldExports().
 */

import fs from 'fs-extra';
import * as path from 'path';
import { promisify } from 'util';
import * as zlib from 'zlib';
import { ExportError, getErrorMessage, toError } from '../errors/index.js';
import type { Task } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import {
  DEFAULT_EXPORTER_CONFIG,
  EXPORT_FORMATS,
  type ExportData,
  type ExportFormat,
  type ExportOptions,
  type ExportRow,
  type OfflineExportResult,
  type QueuedExport,
  type TaskExporterConfig,
} from './types.js';

const gzip = promisify(zlib.gzip);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Nested objects become `parent_child` keys; other values are kept
 */
export function flattenRow(row: ExportRow, separator = '_', parentKey = ''): ExportRow {
  const flat: ExportRow = {};
  for (const [key, value] of Object.entries(row)) {
    const flatKey = parentKey ? `${parentKey}${separator}${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenRow(value, separator, flatKey));
    } else {
      flat[flatKey] = value;
    }
  }
  return flat;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function escapeCell(value: unknown): string {
  const text = cellText(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * One header line with the union of all flattened keys, then one line
 * per row
 */
export function toCsv(rows: ExportRow[], separator = '_'): string {
  if (rows.length === 0) return '';

  const flat = rows.map(row => flattenRow(row, separator));
  const headers = [...new Set(flat.flatMap(row => Object.keys(row)))];
  const lines = [headers.map(escapeCell).join(',')];
  for (const row of flat) {
    lines.push(headers.map(header => escapeCell(row[header])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * The exported shape of a task; `result` is the agent's return value
 * when one is known
 */
export function taskToRow(task: Task, result?: unknown): ExportRow {
  return {
    id: task.id,
    agentId: task.agentId,
    state: task.state,
    priority: task.priority,
    retries: task.metadata.retries,
    maxRetries: task.metadata.maxRetries,
    lastError: task.metadata.lastError ?? null,
    createdAt: task.metadata.createdAt,
    updatedAt: task.metadata.updatedAt,
    payload: task.payload,
    result: result ?? null,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class TaskExporter {
  private readonly config: TaskExporterConfig;
  private queue: QueuedExport[] = [];

  constructor(outputDir: string, config: Partial<Omit<TaskExporterConfig, 'outputDir'>> = {}) {
    this.config = { ...DEFAULT_EXPORTER_CONFIG, ...config, outputDir: path.resolve(outputDir) };
  }

  getOutputDir(): string {
    return this.config.outputDir;
  }

  getSupportedFormats(): ExportFormat[] {
    return [...EXPORT_FORMATS];
  }

  /**
   * Write one export file and return its path. A failed write is queued
   * for processOfflineQueue().
   */
  async exportData(data: ExportData, options: ExportOptions): Promise<Result<string, ExportError>> {
    const written = await this.write(data, options);
    if (!written.ok) {
      logger.error('Export failed, queued for a later attempt', written.error);
      this.enqueue({ data, options, queuedAt: new Date(), error: written.error.message });
    }
    return written;
  }

  /**
   * Export tasks as rows, one per task
   */
  async exportTasks(
    tasks: Task[],
    options: ExportOptions,
    resultOf: (task: Task) => unknown = () => undefined
  ): Promise<Result<string, ExportError>> {
    return this.exportData(tasks.map(task => taskToRow(task, resultOf(task))), options);
  }

  getQueuedExports(): QueuedExport[] {
    return this.queue.map(entry => ({ ...entry, queuedAt: new Date(entry.queuedAt) }));
  }

  /**
   * Re-attempt every queued export in order; failures go back on the queue
   */
  async processOfflineQueue(): Promise<OfflineExportResult> {
    const entries = this.queue;
    this.queue = [];

    let requeued = 0;
    for (const entry of entries) {
      const written = await this.exportData(entry.data, entry.options);
      if (!written.ok) {
        requeued++;
      }
    }

    if (entries.length > 0) {
      logger.info(`Processed export queue: ${entries.length} attempted, ${requeued} requeued`);
    }
    return { attempted: entries.length, requeued };
  }

  /**
   * Remove export files last modified more than `maxAgeMs` ago
   */
  async cleanOldExports(maxAgeMs: number, now: Date = new Date()): Promise<Result<number, ExportError>> {
    const dir = this.config.outputDir;
    const cutoff = now.getTime() - maxAgeMs;
    try {
      if (!(await fs.pathExists(dir))) {
        return ok(0);
      }

      let removed = 0;
      for (const name of await fs.readdir(dir)) {
        const file = path.join(dir, name);
        const stats = await fs.stat(file);
        if (!stats.isFile() || stats.mtimeMs >= cutoff) continue;

        await fs.remove(file);
        removed++;
        logger.debug(`Deleted old export ${file}`);
      }

      if (removed > 0) {
        logger.info(`Cleaned up ${removed} old export file(s)`);
      }
      return ok(removed);
    } catch (error) {
      return err(new ExportError(dir, `cannot clean old exports: ${getErrorMessage(error)}`, {
        cause: toError(error),
      }));
    }
  }

  private async write(data: ExportData, options: ExportOptions): Promise<Result<string, ExportError>> {
    let target = this.config.outputDir;
    try {
      const content = this.render(data, options.format);
      target = await this.nextFilePath(options);
      if (options.compress) {
        await fs.outputFile(target, await gzip(content));
      } else {
        await fs.outputFile(target, content, 'utf-8');
      }
      logger.info(`Exported ${options.format.toUpperCase()} to ${target}`);
      return ok(target);
    } catch (error) {
      return err(new ExportError(target, getErrorMessage(error), { cause: toError(error) }));
    }
  }

  private render(data: ExportData, format: ExportFormat): string {
    switch (format) {
      case 'json':
        return `${JSON.stringify(data, null, 2)}\n`;
      case 'csv':
        return toCsv(Array.isArray(data) ? data : [data], this.config.separator);
    }
  }

  /**
   * A name no existing export uses; exports within the same second get
   * a counter suffix
   */
  private async nextFilePath(options: ExportOptions): Promise<string> {
    const base = `${options.filenamePrefix ?? 'export'}_${fileTimestamp(new Date())}`;
    const extension = options.compress ? `.${options.format}.gz` : `.${options.format}`;

    let candidate = path.join(this.config.outputDir, `${base}${extension}`);
    for (let n = 1; await fs.pathExists(candidate); n++) {
      candidate = path.join(this.config.outputDir, `${base}_${n}${extension}`);
    }
    return candidate;
  }

  private enqueue(entry: QueuedExport): void {
    this.queue.push(entry);
    while (this.queue.length > this.config.maxQueuedExports) {
      const dropped = this.queue.shift();
      logger.warn(`Export queue full, dropped export queued at ${dropped?.queuedAt.toISOString()}`);
    }
  }
}
