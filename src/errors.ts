/**
 * A target references a column the table does not have.
 */
export class ColumnNotFoundError extends Error {
  readonly columnName: string;

  constructor(columnName: string) {
    super(`Column ${columnName} not found`);
    this.name = 'ColumnNotFoundError';
    this.columnName = columnName;
  }
}

/**
 * A target is shaped like a structured target but its content is unusable.
 */
export class MalformedTargetSpecError extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(detail);
    this.name = 'MalformedTargetSpecError';
    this.detail = detail;
  }
}

/**
 * The stored target of an index could not be parsed.
 */
export class ConfigurationError extends Error {
  readonly indexName: string;
  readonly target: string;

  constructor(indexName: string, target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to parse targets for index ${indexName} (${target}): ${reason}`, { cause });
    this.name = 'ConfigurationError';
    this.indexName = indexName;
    this.target = target;
  }
}
