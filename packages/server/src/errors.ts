/**
 * @daybook/server - Error types
 */

/**
 * A table name reached the engine without being in the registry. This is a
 * configuration or programming error; retrying will not help.
 */
export class UnknownSyncTableError extends Error {
  readonly tableName: string;

  constructor(tableName: string) {
    super(`Invalid table name: ${tableName}`);
    this.name = 'UnknownSyncTableError';
    this.tableName = tableName;
  }
}

/**
 * The store failed while reading changes or records for a pull.
 */
export class SyncRetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncRetrievalError';
  }
}

/**
 * Caller input the engine cannot act on, such as an unparseable checkpoint.
 */
export class SyncRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncRequestError';
  }
}
