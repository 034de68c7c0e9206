export { buildRows, displayName, UNTITLED_SUBTASK } from './row-builder.js';
export type { RowBuildResult } from './row-builder.js';
export { getColumns } from './columns.js';
export { deriveAssigneeName, capitalize } from './assignee.js';
export { formatSection } from './section.js';
export { metadataLines, subtaskSummaryLines, appendBlock, MetadataMarker } from './notes.js';
