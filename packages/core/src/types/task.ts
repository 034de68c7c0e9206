export type SchemaVariant = 'legacy' | 'current';

/** Extra reminder details only the current export schema carries */
export interface TaskMetadata {
  readonly flagged: boolean;
  readonly hasReminder: boolean;
  readonly location: string;
  readonly url: string;
}

/**
 * Schema-agnostic task, built by the normalizer and consumed by the row builder.
 * Priority and tags are kept as exported; they are resolved per output language later.
 */
export interface CanonicalTask {
  readonly schema: SchemaVariant;
  readonly title: string;
  readonly notes: string;
  readonly section: string;
  readonly dueDate: string; // ISO-8601 or ''
  readonly priority: string;
  readonly completed: boolean;
  readonly tags: readonly string[];
  readonly subtasks: readonly CanonicalTask[];
  readonly metadata: TaskMetadata | null;
}
