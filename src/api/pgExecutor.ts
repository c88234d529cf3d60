/**
 * PostgreSQL Statement Executor
 *
 * Runs statement text over a single `pg` client connection and converts the
 * driver's results into the renderer-facing shape:
 * - every value is the server's text representation (no type parsing)
 * - NULL becomes the NULL marker
 * - column types collapse to integer / fractional / other
 *
 * Text holding several `;`-separated statements yields one result per
 * statement. Server notices raised while a statement runs are returned as
 * warnings on its first result.
 */

import pg from 'pg';
import type { Client, ClientConfig, CustomTypesConfig, FieldDef, QueryArrayResult } from 'pg';
import {
  ColumnDescriptor,
  ColumnTypeTag,
  ConnectionError,
  NULL_MARKER,
  Row,
  StatementError,
  StatementExecutor,
  StatementResult,
  errorMessage,
} from '../types/index.js';

/** int8, int2, int4, oid */
const INTEGER_TYPE_OIDS = new Set([20, 21, 23, 26]);

/** float4, float8, numeric */
const FRACTIONAL_TYPE_OIDS = new Set([700, 701, 1700]);

/** Leave every value as the text the server sent */
const RAW_TEXT_TYPES: CustomTypesConfig = {
  getTypeParser: () => (value: string | Buffer) => value.toString(),
};

export function typeTagFor(dataTypeID: number): ColumnTypeTag {
  if (INTEGER_TYPE_OIDS.has(dataTypeID)) return 'integer';
  if (FRACTIONAL_TYPE_OIDS.has(dataTypeID)) return 'fractional';
  return 'other';
}

export function toColumns(fields: readonly FieldDef[]): ColumnDescriptor[] {
  return fields.map(field => ({ name: field.name, typeTag: typeTagFor(field.dataTypeID) }));
}

export function toCell(value: unknown): string {
  return value === null || value === undefined ? NULL_MARKER : String(value);
}

/** Stringify each driver row only as the renderer pulls it */
export function* toRows(rows: Iterable<unknown[]>): Generator<Row> {
  for (const row of rows) {
    yield row.map(toCell);
  }
}

/**
 * Convert one driver result. Results without columns (INSERT, UPDATE, DDL)
 * become update counts.
 */
export function toStatementResult(result: QueryArrayResult): StatementResult {
  if (result.fields.length === 0) {
    return { kind: 'update', count: result.rowCount ?? 0 };
  }
  return {
    kind: 'rows',
    columns: toColumns(result.fields),
    rows: toRows(result.rows),
  };
}

export interface PgExecutorConfig {
  connectionString: string;
  user?: string;
  password?: string;
}

export class PgStatementExecutor implements StatementExecutor {
  private readonly client: Client;
  private readonly connectionString: string;
  private notices: string[] = [];

  constructor(config: PgExecutorConfig) {
    const clientConfig: ClientConfig = { connectionString: config.connectionString };
    if (config.user !== undefined) clientConfig.user = config.user;
    if (config.password !== undefined) clientConfig.password = config.password;

    this.connectionString = config.connectionString;
    this.client = new pg.Client(clientConfig);
    this.client.on('notice', notice => {
      this.notices.push(notice.message ?? String(notice));
    });
  }

  /**
   * Open the connection
   * @throws ConnectionError when the server cannot be reached or rejects the login
   */
  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      throw new ConnectionError(
        `Unable to connect to database: ${errorMessage(error)}`,
        this.connectionString
      );
    }
  }

  async execute(sql: string): Promise<StatementResult[]> {
    this.notices = [];

    let raw: QueryArrayResult | QueryArrayResult[];
    try {
      raw = await this.client.query({ text: sql, rowMode: 'array', types: RAW_TEXT_TYPES });
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      throw new StatementError(errorMessage(error), sql, code);
    }

    const results = (Array.isArray(raw) ? raw : [raw]).map(toStatementResult);
    if (this.notices.length > 0 && results.length > 0) {
      results[0].warnings = [...this.notices];
    }
    this.notices = [];
    return results;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
