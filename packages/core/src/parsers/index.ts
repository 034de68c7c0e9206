export { extractTags, mergeTags } from './hashtag-parser.js';
export type { ExtractedTags } from './hashtag-parser.js';
export { formatDate } from './date-formatter.js';
export type { WarningSink } from './date-formatter.js';
export { parsePriority, mapPriority, isKnownPriority } from './priority-parser.js';
