export type PersistenceOperation = 'read' | 'write' | 'decode';

/** The snapshot or history file could not be read, decoded or replaced. */
export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_ERROR';

  constructor(
    readonly operation: PersistenceOperation,
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to ${operation} ${filePath}: ${detail}`, options);
    this.name = 'PersistenceError';
  }
}
