import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type { SchemaDescription, Table } from '../../../src/ai/types.js';

// ── Mock logger before importing the module under test ──────────────

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const { createQueryExecutor, classifyExecutionError } = await import('../../../src/ai/queryExecutor.js');
const { logger } = await import('../../../src/utils/logger.js');
const {
  ExecutionError,
  PoolExhaustedError,
  QueryRejectedError,
  TimeoutError,
  ValidationError,
} = await import('../../../src/utils/errors.js');

// ── Helpers ──────────────────────────────────────────────────────────

const schema: SchemaDescription = {
  connectionId: 'default',
  version: 'v1',
  tables: [
    {
      name: 'sales',
      columns: [
        { name: 'region', dataType: 'text' },
        { name: 'amount', dataType: 'numeric' },
      ],
    },
  ],
};

const SQL = 'SELECT region, amount FROM sales';

function makeTable(rowCount: number): Table {
  return {
    columns: ['region', 'amount'],
    rows: Array.from({ length: rowCount }, (_, i) => [`r${i}`, i]),
  };
}

function makeConnection(result: Table | Error) {
  return {
    query: jest.fn(async (_sql: string): Promise<Table> => {
      if (result instanceof Error) throw result;
      return result;
    }),
    release: jest.fn(async () => undefined),
  };
}

function makeProvider(...connections: Array<ReturnType<typeof makeConnection>>) {
  const queue = [...connections];
  return {
    describeSchema: jest.fn(async () => schema),
    acquire: jest.fn(async () => {
      const next = queue.shift();
      if (!next) throw new Error('no connection left');
      return next;
    }),
  };
}

describe('createQueryExecutor', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('execute', () => {
    it('wraps the validated query with a row cap and returns the table', async () => {
      const connection = makeConnection(makeTable(3));
      const executor = createQueryExecutor({ connectionProvider: makeProvider(connection), maxRows: 10 });

      const result = await executor.execute({ sql: `${SQL};`, schema }, 'default');

      expect(connection.query).toHaveBeenCalledWith(
        'SELECT * FROM (SELECT region, amount FROM sales) AS bounded_result LIMIT 11',
      );
      expect(result.rowCount).toBe(3);
      expect(result.truncated).toBe(false);
      expect(result.table).toEqual(makeTable(3));
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it('truncates to maxRows and flags the result', async () => {
      const executor = createQueryExecutor({
        connectionProvider: makeProvider(makeConnection(makeTable(6))),
        maxRows: 5,
      });

      const result = await executor.execute({ sql: SQL, schema }, 'default');

      expect(result.truncated).toBe(true);
      expect(result.rowCount).toBe(5);
      expect(result.table.rows[4]).toEqual(['r4', 4]);
      expect(logger.warn).toHaveBeenCalledWith(
        { originalCount: 6, maxRows: 5 },
        'Query executor: result set truncated',
      );
    });

    it('rejects an invalid query without acquiring a connection', async () => {
      const provider = makeProvider(makeConnection(makeTable(1)));
      const executor = createQueryExecutor({ connectionProvider: provider });

      const attempt = executor.execute({ sql: 'DROP TABLE sales', schema }, 'default');

      await expect(attempt).rejects.toBeInstanceOf(QueryRejectedError);
      await expect(attempt).rejects.toMatchObject({ reason: 'NotSelect', statusCode: 422 });
      expect(provider.acquire).not.toHaveBeenCalled();
    });

    it('retries once on a fresh connection after a transient failure', async () => {
      const broken = makeConnection(new Error('read ECONNRESET'));
      const healthy = makeConnection(makeTable(2));
      const provider = makeProvider(broken, healthy);
      const executor = createQueryExecutor({ connectionProvider: provider });

      const result = await executor.execute({ sql: SQL, schema }, 'default');

      expect(result.rowCount).toBe(2);
      expect(provider.acquire).toHaveBeenCalledTimes(2);
      expect(broken.release).toHaveBeenCalledTimes(1);
      expect(healthy.release).toHaveBeenCalledTimes(1);
    });

    it('gives up after the retry also fails', async () => {
      const provider = makeProvider(
        makeConnection(new Error('Connection terminated unexpectedly')),
        makeConnection(new Error('Connection terminated unexpectedly')),
      );
      const executor = createQueryExecutor({ connectionProvider: provider });

      await expect(executor.execute({ sql: SQL, schema }, 'default')).rejects.toMatchObject({
        code: 'EXECUTION_ERROR',
        transient: true,
      });
      expect(provider.acquire).toHaveBeenCalledTimes(2);
    });

    it('does not retry a non-transient failure and still releases', async () => {
      const connection = makeConnection(new Error('permission denied for table sales'));
      const provider = makeProvider(connection);
      const executor = createQueryExecutor({ connectionProvider: provider });

      await expect(executor.execute({ sql: SQL, schema }, 'default')).rejects.toThrow(
        'Query execution failed due to a permissions error.',
      );
      expect(provider.acquire).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it('reports pool exhaustion when no connection can be acquired', async () => {
      const timeout = new Error('Knex: Timeout acquiring a connection. The pool is probably full.');
      timeout.name = 'KnexTimeoutError';
      const provider = {
        describeSchema: jest.fn(async () => schema),
        acquire: jest.fn(async () => {
          throw timeout;
        }),
      };
      const executor = createQueryExecutor({ connectionProvider: provider });

      await expect(executor.execute({ sql: SQL, schema }, 'default')).rejects.toBeInstanceOf(
        PoolExhaustedError,
      );
    });

    it('passes typed provider errors through unchanged', async () => {
      const provider = {
        describeSchema: jest.fn(async () => schema),
        acquire: jest.fn(async () => {
          throw new ValidationError('Unknown connection reference: nope');
        }),
      };
      const executor = createQueryExecutor({ connectionProvider: provider });

      await expect(executor.execute({ sql: SQL, schema }, 'nope')).rejects.toThrow(
        'Unknown connection reference: nope',
      );
    });

    it('times out a query that never returns and releases the connection', async () => {
      const connection = {
        query: jest.fn((_sql: string) => new Promise<Table>(() => undefined)),
        release: jest.fn(async () => undefined),
      };
      const executor = createQueryExecutor({
        connectionProvider: makeProvider(connection),
        timeoutMs: 20,
      });

      await expect(executor.execute({ sql: SQL, schema }, 'default')).rejects.toBeInstanceOf(TimeoutError);
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it('logs and survives a failing release', async () => {
      const connection = makeConnection(makeTable(1));
      connection.release.mockRejectedValueOnce(new Error('already released'));
      const executor = createQueryExecutor({ connectionProvider: makeProvider(connection) });

      const result = await executor.execute({ sql: SQL, schema }, 'default');

      expect(result.rowCount).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ connectionRef: 'default' }),
        'Query executor: connection release failed',
      );
    });
  });
});

describe('classifyExecutionError', () => {
  it('maps a server statement timeout to TimeoutError', () => {
    const error = classifyExecutionError(new Error('canceling statement due to statement timeout'), 5000);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('Query execution did not finish within 5000ms');
  });

  it('maps a syntax error to a rephrase hint', () => {
    const error = classifyExecutionError(new Error('syntax error at or near "FORM"'));
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error.message).toBe('The generated query contained a syntax error. Please try rephrasing your question.');
  });

  it('maps unknown failures to a generic execution error', () => {
    const error = classifyExecutionError('something odd');
    expect(error.message).toBe('Query execution failed unexpectedly.');
    expect(error.statusCode).toBe(502);
  });

  it('flags too many clients as pool exhaustion', () => {
    expect(classifyExecutionError(new Error('sorry, too many clients already'))).toBeInstanceOf(
      PoolExhaustedError,
    );
  });
});
