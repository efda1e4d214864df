/**
 * Utils Module Exports
 * 统一导出工具模块
 */

// Date & Time
export * from './date-utils';
// Export Utilities
export * from './export';
export { sanitizeSheetTitle, XlsxExportSink } from './spreadsheet-export';
// File Utilities
export { buildOutputPath, ensureDirExists, type ExportFormat, fileExists, sanitizeSegment } from './fileutils';
export { loadLinksFile } from './links-file';
// Logging
export {
  createModuleLogger,
  LOG_LEVELS,
  logger,
  type ModuleLogger,
  normalizeErrorMeta,
  setLogLevel,
} from './logger';
// Query building
export * from './query';
export * from './result';
// Retry & waits
export * from './retry';
// Normalization
export { buildPermalink, type CanonicalField, FIELD_ACCESSORS, normalizeTweet } from './tweet-normalizer';
// Validation
export * from './validation';
