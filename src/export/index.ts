/**
 * Export Module
 */

export { TaskExporter, flattenRow, toCsv, taskToRow, fileTimestamp } from './task-exporter.js';
export {
  EXPORT_FORMATS,
  DEFAULT_EXPORTER_CONFIG,
  type ExportFormat,
  type ExportRow,
  type ExportData,
  type ExportOptions,
  type QueuedExport,
  type TaskExporterConfig,
  type OfflineExportResult,
} from './types.js';
