/**
 * @fileoverview Import and export
 */

export { exportTasks, formatTasks } from './export.js';
export { detectImportFormat, importTasks, parseImport, parseJsonImport } from './import.js';
export { CSV_COLUMNS, escapeCsvField, formatCsv, parseCsv, splitCsvLine } from './csv.js';
export { formatLegacyLine, parseLegacy, parseLegacyLine } from './legacy.js';
export { parseImportTimestamp, taskFromFields } from './record.js';
export type { ExportOptions, ImportOptions, ImportResult, ParsedImport, TaskFormat } from './types.js';
