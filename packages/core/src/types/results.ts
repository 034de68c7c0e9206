/** Two-variant result union returned across the conversion boundary */
export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export interface BatchEntry<T> {
  readonly file: string;
  readonly result: DataResult<T>;
}

export interface BatchResult<T> {
  readonly results: readonly BatchEntry<T>[];
}

export function isSuccess<T>(r: DataResult<T>): r is { type: 'success'; data: T; message: string } {
  return r.type === 'success';
}

export function isError<T>(r: DataResult<T>): r is { type: 'error'; message: string } {
  return r.type === 'error';
}

export function successCount<T>(batch: BatchResult<T>): number {
  return batch.results.filter(entry => isSuccess(entry.result)).length;
}

export function failureCount<T>(batch: BatchResult<T>): number {
  return batch.results.filter(entry => isError(entry.result)).length;
}

export function anyFailed<T>(batch: BatchResult<T>): boolean {
  return batch.results.some(entry => isError(entry.result));
}

/** Wrap a thrown value as an error result */
export function errorResult(message: string, err?: unknown): { type: 'error'; message: string } {
  if (err === undefined) return { type: 'error', message };
  const detail = err instanceof Error ? err.message : String(err);
  return { type: 'error', message: `${message}: ${detail}` };
}
