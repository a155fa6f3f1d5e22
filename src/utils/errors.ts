export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      isOperational?: boolean;
      cause?: Error;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      ...options,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 404,
      code: 'NOT_FOUND',
      ...options,
    });
  }
}

/** Neither a file nor a relational connection was supplied with the question. */
export class MissingContextError extends AppError {
  constructor(
    message = 'Attach a data file or choose a database connection to ask a question.',
    options: { cause?: Error } = {},
  ) {
    super(message, {
      statusCode: 400,
      code: 'MISSING_CONTEXT',
      ...options,
    });
  }
}

export type QueryRejectionReason =
  | 'EmptyQuery'
  | 'MultipleStatements'
  | 'NotSelect'
  | 'ForbiddenKeyword'
  | 'UnknownIdentifier'
  | 'UnsafeConstruct';

export class QueryRejectedError extends AppError {
  public readonly reason: QueryRejectionReason;
  public readonly details: string[];

  constructor(
    reason: QueryRejectionReason,
    details: string[] = [],
    options: { cause?: Error } = {},
  ) {
    super(`The generated query was rejected (${reason}).`, {
      statusCode: 422,
      code: 'QUERY_REJECTED',
      ...options,
    });
    this.reason = reason;
    this.details = details;
  }

  override toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        reason: this.reason,
      },
    };
  }
}

export class ExecutionError extends AppError {
  public readonly transient: boolean;

  constructor(
    message: string,
    options: { cause?: Error; transient?: boolean; statusCode?: number; code?: string } = {},
  ) {
    super(message, {
      statusCode: options.statusCode ?? 502,
      code: options.code ?? 'EXECUTION_ERROR',
      cause: options.cause,
    });
    this.transient = options.transient ?? false;
  }
}

export class PoolExhaustedError extends ExecutionError {
  constructor(
    message = 'No database connection became available in time. Please retry shortly.',
    options: { cause?: Error } = {},
  ) {
    super(message, {
      statusCode: 503,
      code: 'POOL_EXHAUSTED',
      cause: options.cause,
    });
  }
}

export class AnalysisError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 422,
      code: 'ANALYSIS_ERROR',
      ...options,
    });
  }
}

export class TimeoutError extends AppError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options: { cause?: Error } = {}) {
    super(`${operation} did not finish within ${timeoutMs}ms`, {
      statusCode: 504,
      code: 'TIMEOUT',
      ...options,
    });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class PayloadTooLargeError extends AppError {
  public readonly sizeBytes: number;
  public readonly maxBytes: number;

  constructor(sizeBytes: number, maxBytes: number) {
    super(`File is ${sizeBytes} bytes; the limit is ${maxBytes} bytes`, {
      statusCode: 413,
      code: 'PAYLOAD_TOO_LARGE',
    });
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
  }
}

export class AIError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 502,
      code: 'AI_ERROR',
      ...options,
    });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
