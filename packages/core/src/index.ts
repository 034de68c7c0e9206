// Types
export * from './types/index.js';

// Detection
export { detectFormat, detectSchema, extractRecords, isJsonObject, BULK_KEY } from './detect/format-detector.js';
export type { JsonObject, DocumentFormat, ExtractedRecords } from './detect/format-detector.js';

// Normalization
export { normalize, normalizeAll } from './normalize/record-normalizer.js';
export { deduplicate, duplicateKey } from './normalize/deduplicate.js';
export { parseRawRecord } from './normalize/raw-record.js';
export type { RawRecord } from './normalize/raw-record.js';

// Parsers
export * from './parsers/index.js';

// Rows
export * from './rows/index.js';

// Output
export { emit, serializeCsv, BOM } from './emit/csv-emitter.js';

// Pipeline
export { convertDocument, convertFile, parseDocument } from './pipeline/converter.js';
export type { Conversion, FileConversion } from './pipeline/converter.js';
