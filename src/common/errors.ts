/**
 * Error taxonomy for column type metadata
 * None of these are retryable: every operation works on an in-memory string
 */

/**
 * Raw type descriptor does not match the descriptor grammar
 * Usually means the replication plugin emits a format this version does not understand
 */
export class ParseError extends Error {
  readonly name = 'ParseError';

  constructor(
    readonly columnName: string,
    readonly rawDescriptor: string,
  ) {
    super(`Failed to parse column type '${rawDescriptor}' for column ${columnName}`);
  }
}

/**
 * A caller used a column in a way its capabilities do not allow
 * e.g. asking for the element OID of a non-array column
 */
export class ContractViolationError extends Error {
  readonly name = 'ContractViolationError';

  constructor(
    readonly columnName: string,
    message: string,
  ) {
    super(`${message} (column ${columnName})`);
  }
}

/**
 * No OID is known for a type name
 * The catalog and the source database disagree; needs a catalog update, not a retry
 */
export class UnknownTypeError extends Error {
  readonly name = 'UnknownTypeError';

  constructor(readonly typeName: string) {
    super(`Unknown PostgreSQL type: ${typeName}`);
  }
}
