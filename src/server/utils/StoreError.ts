// =============================================================================
// StoreError — Typed error for every persistence failure
// =============================================================================
// Both store backends wrap raw driver errors (better-sqlite3, mongoose) so
// callers see one predictable type carrying the failed operation's name.
// =============================================================================

export type StoreOperation =
  | 'init'
  | 'close'
  | 'mapping.find'
  | 'mapping.upsert'
  | 'mapping.status'
  | 'mapping.list'
  | 'state.get'
  | 'state.set'
  | 'change.track'
  | 'change.list'
  | 'change.mark'
  | 'change.stats'
  | 'change.cleanup'
  | 'activity.start'
  | 'activity.finish'
  | 'activity.record'
  | 'activity.list'
  | 'issue.add'
  | 'issue.list'
  | 'issue.resolve'
  | 'report.save'
  | 'report.list'
  | 'log.write';

export class StoreError extends Error {
  public readonly operation: StoreOperation;
  /** Raw driver error, for server-side logs only */
  public readonly cause: Error;

  constructor(operation: StoreOperation, cause: unknown) {
    const original = cause instanceof Error ? cause : new Error(String(cause));
    super(`Sync store ${operation} failed: ${sanitiseMessage(original.message)}`);
    this.name = 'StoreError';
    this.operation = operation;
    this.cause = original;

    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/** Connection strings can appear in driver messages; mask credentials. */
function sanitiseMessage(msg: string): string {
  return msg
    .replace(/\/\/[^/@\s]+@/g, '//[REDACTED]@')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[REDACTED_EMAIL]')
    .slice(0, 200);
}

/** Runs a store call and rethrows any failure as a StoreError. */
export async function safeStoreCall<T>(
  operation: StoreOperation,
  fn: () => T | Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    throw new StoreError(operation, err);
  }
}
