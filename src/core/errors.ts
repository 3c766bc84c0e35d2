/**
 * Base error for everything the advisor raises on purpose.
 * Carries an optional hint the CLI prints under the message.
 */
export class AdvisorError extends Error {
  readonly hint: string | undefined;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'AdvisorError';
    this.hint = hint;
  }
}

/** The database cannot be reached, or the connection dropped mid-run. Fatal. */
export class ConnectionError extends AdvisorError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'ConnectionError';
  }
}

/** The current role may not read the catalog of a schema. Recorded per schema. */
export class PermissionError extends AdvisorError {
  declare readonly hint: string;
  readonly schema: string;

  constructor(schema: string, message: string) {
    super(message, `Grant USAGE on schema ${schema} to the advisor role.`);
    this.name = 'PermissionError';
    this.schema = schema;
  }
}

/** A corrective statement failed during apply. Recorded per finding. */
export class ExecutionError extends AdvisorError {
  readonly statement: string;
  readonly sqlState: string | null;

  constructor(statement: string, message: string, sqlState: string | null) {
    super(message);
    this.name = 'ExecutionError';
    this.statement = statement;
    this.sqlState = sqlState;
  }
}

/** Extract a SQLSTATE code from a driver error, if it carries one. */
export function sqlStateOf(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
