/**
 * Read-only database connections for generated query execution.
 *
 * Each configured connection reference gets its own Knex pool, opened with a
 * SELECT-only database user and a statement timeout applied to every new
 * session. Queries run inside a READ ONLY transaction that is closed when the
 * connection is released.
 */

import { createHash } from 'node:crypto';
import knex, { type Knex } from 'knex';
import type { Cell, SchemaDescription, SchemaTable, Table } from '../ai/types.js';
import type { ConnectionProvider, RelationalConnection } from '../ai/queryExecutor.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ReadonlyPoolOptions {
  poolMin: number;
  poolMax: number;
  acquireTimeoutMs: number;
  statementTimeoutMs: number;
}

// pg returns int8 and numeric columns as strings
const NUMERIC_STRING_TYPE_IDS = new Set([20, 1700]);

/** Connection URL with the password masked, for log lines. */
export function maskConnectionUrl(connectionUrl: string): string {
  try {
    const parsed = new URL(connectionUrl);
    if (parsed.password) parsed.password = '***';
    return parsed.toString();
  } catch {
    return '[invalid connection url]';
  }
}

export function createReadonlyDb(connectionUrl: string, options: ReadonlyPoolOptions): Knex {
  const db = knex({
    client: 'pg',
    connection: connectionUrl,
    acquireConnectionTimeout: options.acquireTimeoutMs,
    pool: {
      min: options.poolMin,
      max: options.poolMax,
      afterCreate(
        conn: { query: (sql: string, cb: (err: Error | null) => void) => void },
        done: (err: Error | null, conn: unknown) => void,
      ) {
        conn.query(
          `SET statement_timeout = ${options.statementTimeoutMs}`,
          (err: Error | null) => {
            done(err, conn);
          },
        );
      },
    },
  });

  logger.info(
    {
      connection: maskConnectionUrl(connectionUrl),
      poolMin: options.poolMin,
      poolMax: options.poolMax,
      acquireTimeoutMs: options.acquireTimeoutMs,
      statementTimeoutMs: options.statementTimeoutMs,
    },
    'Read-only database connection pool created',
  );

  return db;
}

function toCell(value: unknown, numericString: boolean): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    if (numericString) {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : value;
    }
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  if (typeof value === 'bigint') return Number(value);
  return JSON.stringify(value);
}

interface PgField {
  name: string;
  dataTypeID?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFields(raw: unknown): PgField[] | null {
  if (!Array.isArray(raw)) return null;
  const fields: PgField[] = [];
  for (const field of raw) {
    if (!isRecord(field) || typeof field.name !== 'string') return null;
    fields.push({
      name: field.name,
      dataTypeID: typeof field.dataTypeID === 'number' ? field.dataTypeID : undefined,
    });
  }
  return fields;
}

/**
 * Convert a pg raw result into a Table. Column order comes from the driver's
 * field list when present, otherwise from the first row.
 */
export function toTable(result: unknown): Table {
  if (!isRecord(result) || !Array.isArray(result.rows)) {
    return { columns: [], rows: [] };
  }

  const records = result.rows.filter(isRecord);
  const fields =
    readFields(result.fields) ??
    Object.keys(records[0] ?? {}).map((name): PgField => ({ name }));

  const rows = records.map((record) =>
    fields.map((field) =>
      toCell(record[field.name], NUMERIC_STRING_TYPE_IDS.has(field.dataTypeID ?? -1)),
    ),
  );

  return { columns: fields.map((field) => field.name), rows };
}

export function schemaVersion(tables: SchemaTable[]): string {
  const listing = tables
    .flatMap((table) => table.columns.map((column) => `${table.name}.${column.name}:${column.dataType}`))
    .sort()
    .join('\n');
  return createHash('sha256').update(listing).digest('hex');
}

interface ColumnRow {
  table_name: string;
  column_name: string;
  data_type: string;
  ordinal_position: number;
}

export function createConnectionProvider(deps: { databases: Record<string, Knex> }): ConnectionProvider {
  const { databases } = deps;

  function resolve(connectionRef: string): Knex {
    const db = databases[connectionRef];
    if (!db) {
      throw new NotFoundError(`Unknown connection reference: ${connectionRef}`);
    }
    return db;
  }

  async function describeSchema(connectionRef: string): Promise<SchemaDescription> {
    const db = resolve(connectionRef);

    const rows = await db<ColumnRow>('information_schema.columns')
      .select('table_name', 'column_name', 'data_type')
      .where('table_schema', 'public')
      .orderBy([
        { column: 'table_name', order: 'asc' },
        { column: 'ordinal_position', order: 'asc' },
      ]);

    const byTable = new Map<string, SchemaTable>();
    for (const row of rows) {
      let table = byTable.get(row.table_name);
      if (!table) {
        table = { name: row.table_name, columns: [] };
        byTable.set(row.table_name, table);
      }
      table.columns.push({ name: row.column_name, dataType: row.data_type });
    }

    const tables = [...byTable.values()];
    return { connectionId: connectionRef, version: schemaVersion(tables), tables };
  }

  async function acquire(connectionRef: string): Promise<RelationalConnection> {
    const db = resolve(connectionRef);
    const trx = await db.transaction({ readOnly: true });

    return {
      async query(sql: string): Promise<Table> {
        const result: unknown = await trx.raw(sql);
        return toTable(result);
      },
      async release(): Promise<void> {
        if (trx.isCompleted()) return;
        // Committing a READ ONLY transaction changes nothing; an aborted one rolls back.
        await trx.commit();
      },
    };
  }

  return { describeSchema, acquire };
}
