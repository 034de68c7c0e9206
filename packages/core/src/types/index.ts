export { LANGUAGES, conversionOptionsSchema, resolveOptions, isLanguage } from './options.js';
export type { Language, ConversionOptions, ConversionOptionsInput } from './options.js';
export { Priority, PriorityName } from './priority.js';
export type { SchemaVariant, TaskMetadata, CanonicalTask } from './task.js';
export { Column, PriorityColumn } from './columns.js';
export type { OutputRow } from './columns.js';
export type { DataResult, BatchEntry, BatchResult } from './results.js';
export { isSuccess, isError, successCount, failureCount, anyFailed, errorResult } from './results.js';
