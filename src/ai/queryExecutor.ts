/**
 * Query Executor — runs a validated SELECT against a read-only connection.
 *
 * - The validator runs again here, so a plan cached against an older schema
 *   cannot slip through.
 * - Results are capped at `maxRows`; the query fetches one extra row so a
 *   truncated result is flagged rather than silently cut.
 * - The connection is acquired per attempt and released on every exit path.
 * - Transient connection failures are retried once on a fresh connection.
 */

import type { QueryExecutionResult, QueryPlan, SchemaDescription, Table } from './types.js';
import { validateSql } from './sqlValidator.js';
import {
  AppError,
  ExecutionError,
  PoolExhaustedError,
  QueryRejectedError,
  TimeoutError,
  toError,
} from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../utils/logger.js';

export const MAX_ROWS = 1000;
export const DEFAULT_EXECUTION_TIMEOUT_MS = 10_000;

export interface RelationalConnection {
  query(sql: string): Promise<Table>;
  release(): Promise<void>;
}

export interface ConnectionProvider {
  describeSchema(connectionRef: string): Promise<SchemaDescription>;
  acquire(connectionRef: string): Promise<RelationalConnection>;
}

export interface QueryExecutorDeps {
  connectionProvider: ConnectionProvider;
  maxRows?: number;
  timeoutMs?: number;
}

const POOL_EXHAUSTED_RE = /timeout acquiring a connection|pool is probably full|too many clients|remaining connection slots/i;
const STATEMENT_TIMEOUT_RE = /canceling statement due to statement timeout|statement timeout/i;
const TRANSIENT_RE = /ECONNRESET|EPIPE|connection terminated|server closed the connection|terminating connection|Connection ended unexpectedly/i;

export function classifyExecutionError(err: unknown, timeoutMs = DEFAULT_EXECUTION_TIMEOUT_MS): AppError {
  if (err instanceof AppError) return err;

  const cause = toError(err);

  if (cause.name === 'KnexTimeoutError' || POOL_EXHAUSTED_RE.test(cause.message)) {
    return new PoolExhaustedError(undefined, { cause });
  }

  if (STATEMENT_TIMEOUT_RE.test(cause.message)) {
    return new TimeoutError('Query execution', timeoutMs, { cause });
  }

  if (TRANSIENT_RE.test(cause.message)) {
    return new ExecutionError('The database connection was interrupted.', {
      cause,
      transient: true,
    });
  }

  if (/permission denied/i.test(cause.message)) {
    return new ExecutionError('Query execution failed due to a permissions error.', { cause });
  }

  if (/syntax error/i.test(cause.message)) {
    return new ExecutionError(
      'The generated query contained a syntax error. Please try rephrasing your question.',
      { cause },
    );
  }

  return new ExecutionError('Query execution failed unexpectedly.', { cause });
}

export function createQueryExecutor(deps: QueryExecutorDeps) {
  const { connectionProvider } = deps;
  const maxRows = deps.maxRows ?? MAX_ROWS;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;

  async function runOnce(sql: string, connectionRef: string): Promise<Table> {
    let connection: RelationalConnection;
    try {
      connection = await connectionProvider.acquire(connectionRef);
    } catch (err) {
      throw classifyExecutionError(err, timeoutMs);
    }

    try {
      return await withTimeout('Query execution', timeoutMs, () => connection.query(sql));
    } catch (err) {
      throw classifyExecutionError(err, timeoutMs);
    } finally {
      try {
        await connection.release();
      } catch (err) {
        logger.error({ err, connectionRef }, 'Query executor: connection release failed');
      }
    }
  }

  async function execute(plan: QueryPlan, connectionRef: string): Promise<QueryExecutionResult> {
    const validation = validateSql(plan.sql, plan.schema);
    if (!validation.valid) {
      throw new QueryRejectedError(validation.reason, validation.errors);
    }

    const boundedSql = `SELECT * FROM (${validation.sql}) AS bounded_result LIMIT ${maxRows + 1}`;

    logger.info(
      { connectionRef, sqlLength: validation.sql.length, maxRows },
      'Query executor: starting execution',
    );

    const startTime = Date.now();
    let table: Table;

    try {
      try {
        table = await runOnce(boundedSql, connectionRef);
      } catch (err) {
        if (!(err instanceof ExecutionError) || !err.transient) throw err;

        logger.warn(
          { connectionRef, error: err.message },
          'Query executor: transient failure, retrying on a fresh connection',
        );
        table = await runOnce(boundedSql, connectionRef);
      }
    } catch (err) {
      const error = toError(err);
      logger.error(
        { connectionRef, durationMs: Date.now() - startTime, error: error.message },
        'Query executor: execution failed',
      );
      throw err;
    }

    const durationMs = Date.now() - startTime;

    let truncated = false;
    if (table.rows.length > maxRows) {
      logger.warn(
        { originalCount: table.rows.length, maxRows },
        'Query executor: result set truncated',
      );
      truncated = true;
      table = { columns: table.columns, rows: table.rows.slice(0, maxRows) };
    }

    logger.info(
      { durationMs, rowCount: table.rows.length, truncated },
      'Query executor: execution completed',
    );

    return { table, rowCount: table.rows.length, durationMs, truncated };
  }

  return { execute };
}

export type QueryExecutor = ReturnType<typeof createQueryExecutor>;
