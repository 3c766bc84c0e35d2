import pg from 'pg';
import type { Client } from 'pg';
import { ConnectionError, errorMessage, sqlStateOf } from '../errors.js';
import type { AdvisorConnection } from './types.js';

const APPLICATION_NAME = 'pg-index-advisor';
const SQLSTATE = /^[0-9A-Z]{5}$/;

/** Options for {@link connectPostgres}. */
export interface PgConnectionOptions {
  readonly connectionString: string;
  /** Put the session in read-only transaction mode. Use for dry runs. */
  readonly readOnly?: boolean | undefined;
  readonly connectionTimeoutMillis?: number | undefined;
  readonly statementTimeoutMillis?: number | undefined;
}

/**
 * Open a single pg Client and wrap it as an {@link AdvisorConnection}.
 * Throws ConnectionError if the server cannot be reached.
 */
export async function connectPostgres(options: PgConnectionOptions): Promise<AdvisorConnection> {
  const client = new pg.Client({
    connectionString: options.connectionString,
    application_name: APPLICATION_NAME,
    connectionTimeoutMillis: options.connectionTimeoutMillis,
    statement_timeout: options.statementTimeoutMillis,
  });

  try {
    await client.connect();
  } catch (error: unknown) {
    throw new ConnectionError(
      `Could not connect to database: ${errorMessage(error)}`,
      'Check --database-url or DATABASE_URL.',
    );
  }

  const connection = new PgConnection(client);
  if (options.readOnly === true) {
    try {
      await client.query('SET default_transaction_read_only = on');
    } catch (error: unknown) {
      await connection.release();
      throw toConnectionError(error);
    }
  }
  return connection;
}

/**
 * Server errors (anything carrying a SQLSTATE outside class 08) pass through
 * so callers can inspect the code; socket-level failures become ConnectionError.
 */
function toConnectionError(error: unknown): unknown {
  if (error instanceof ConnectionError) {
    return error;
  }
  const state = sqlStateOf(error);
  if (state !== null && SQLSTATE.test(state) && !state.startsWith('08')) {
    return error;
  }
  return new ConnectionError(`Lost connection to database: ${errorMessage(error)}`);
}

class PgConnection implements AdvisorConnection {
  private released = false;

  constructor(private readonly client: Client) {}

  async query(text: string, values?: readonly unknown[]): Promise<readonly unknown[]> {
    try {
      const result = await this.client.query(text, values === undefined ? undefined : [...values]);
      return result.rows;
    } catch (error: unknown) {
      throw toConnectionError(error);
    }
  }

  async execute(statement: string): Promise<void> {
    try {
      await this.client.query('BEGIN');
    } catch (error: unknown) {
      throw toConnectionError(error);
    }
    try {
      await this.client.query(statement);
      await this.client.query('COMMIT');
    } catch (error: unknown) {
      await this.rollback();
      throw toConnectionError(error);
    }
  }

  private async rollback(): Promise<void> {
    try {
      await this.client.query('ROLLBACK');
    } catch (error: unknown) {
      throw toConnectionError(error);
    }
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await this.client.end();
  }
}
