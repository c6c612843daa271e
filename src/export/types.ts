/**
 * Type definitions for task result exports
 */

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

export type ExportRow = Record<string, unknown>;

/** One record, or a table of records */
export type ExportData = ExportRow | ExportRow[];

export interface ExportOptions {
  format: ExportFormat;
  /** File names are `<prefix>_<YYYYMMDD_HHMMSS>.<format>` */
  filenamePrefix?: string;
  /** Gzip the file and add `.gz` to its name */
  compress?: boolean;
}

/** An export that failed and waits for processOfflineQueue() */
export interface QueuedExport {
  data: ExportData;
  options: ExportOptions;
  queuedAt: Date;
  error: string;
}

export interface TaskExporterConfig {
  outputDir: string;
  /** Oldest queued export is dropped beyond this */
  maxQueuedExports: number;
  /** Key separator when nested objects are flattened into CSV columns */
  separator: string;
}

export const DEFAULT_EXPORTER_CONFIG: Omit<TaskExporterConfig, 'outputDir'> = {
  maxQueuedExports: 100,
  separator: '_',
};

export interface OfflineExportResult {
  attempted: number;
  requeued: number;
}
