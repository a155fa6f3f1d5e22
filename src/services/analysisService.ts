/**
 * Pipeline orchestrator — the single entry point `processQuery`.
 *
 * Start → ResolveContext → CacheCheck → (hit: Done)
 *   | miss → Classify → Relational | Tabular | Mixed → Analyze → Select
 *          → Insights → CacheWrite → Done
 *
 * Any failure ends in Failed(code): logged, rethrown to the caller as the
 * typed AppError, never cached. Concurrent requests with the same
 * fingerprint share one run through the cache's single-flight gate.
 */

import type {
  AnalysisResult,
  QueryContext,
  QueryRoute,
  ResolvedContext,
  SchemaDescription,
  Table,
} from '../ai/types.js';
import { contextIdentity, fingerprint } from '../ai/fingerprint.js';
import type { CacheSource, ResultCache } from '../ai/resultCache.js';
import { classify } from '../ai/queryClassifier.js';
import type { ConnectionProvider, QueryExecutor } from '../ai/queryExecutor.js';
import { analyzeTable, DEFAULT_CHUNK_SIZE } from '../ai/tabularAnalyzer.js';
import { buildProfile } from '../ai/dataProfile.js';
import { selectChart } from '../ai/chartSelector.js';
import { renderChart } from '../ai/chartSpec.js';
import { buildInsights } from '../ai/insights.js';
import { innerJoin } from '../ai/tableJoin.js';
import { normalizeTable } from '../ai/cells.js';
import type { FileProvider } from './fileProvider.js';
import type { LanguageInferenceService } from './inferenceService.js';
import { AIError, AppError, QueryRejectedError, ValidationError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const MAX_QUESTION_LENGTH = 2000;
const DEFAULT_MAX_ROWS = 1000;

export type PipelineState =
  | 'Start'
  | 'ResolveContext'
  | 'CacheCheck'
  | 'Classify'
  | 'Relational'
  | 'Tabular'
  | 'Mixed'
  | 'Analyze'
  | 'Select'
  | 'Insights'
  | 'CacheWrite'
  | 'Done';

export interface AnalysisServiceDeps {
  cache: ResultCache;
  fileProvider: FileProvider;
  connectionProvider: ConnectionProvider;
  executor: QueryExecutor;
  inference: LanguageInferenceService;
  chunkSize?: number;
  maxRows?: number;
  cacheTtlSeconds?: number;
}

export interface ProcessedQuery {
  result: AnalysisResult;
  fingerprint: string;
  cache: CacheSource;
}

export function createAnalysisService(deps: AnalysisServiceDeps) {
  const { cache, fileProvider, connectionProvider, executor, inference } = deps;
  const chunkSize = deps.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const maxRows = deps.maxRows ?? DEFAULT_MAX_ROWS;

  async function resolveContext(context: QueryContext): Promise<ResolvedContext> {
    const [file, connection] = await Promise.all([
      context.attachedFileRef ? fileProvider.describe(context.attachedFileRef) : undefined,
      context.connectionRef ? connectionProvider.describeSchema(context.connectionRef) : undefined,
    ]);
    return { ...(file ? { file } : {}), ...(connection ? { connection } : {}) };
  }

  async function runRelational(
    question: string,
    connectionRef: string,
    schema: SchemaDescription,
  ): Promise<{ table: Table; truncated: boolean; sql: string; explanation: string }> {
    const candidate = await inference.inferSql(question, schema);
    try {
      const execution = await executor.execute({ sql: candidate.sql, schema }, connectionRef);
      return {
        table: execution.table,
        truncated: execution.truncated,
        sql: candidate.sql,
        explanation: candidate.explanation,
      };
    } catch (err) {
      if (err instanceof QueryRejectedError) {
        logger.warn(
          { reason: err.reason, details: err.details, sqlPreview: candidate.sql.substring(0, 200) },
          'Pipeline: generated query rejected',
        );
      }
      throw err;
    }
  }

  async function compute(
    question: string,
    context: QueryContext,
    resolved: ResolvedContext,
    enter: (state: PipelineState, fields?: Record<string, unknown>) => void,
  ): Promise<AnalysisResult> {
    enter('Classify');
    const decision = classify(question, resolved);
    const route: QueryRoute = decision.route;
    enter(route === 'relational' ? 'Relational' : route === 'tabular' ? 'Tabular' : 'Mixed', {
      signals: decision.signals,
    });

    let analysed: Table;
    let truncated = false;
    let sql: string | undefined;
    let explanation: string | undefined;

    if (route === 'tabular') {
      analysed = await fileProvider.load(requireRef(context.attachedFileRef, 'attachedFileRef'));
    } else {
      const schema = resolved.connection;
      if (!schema) throw new ValidationError('A connection is required for this question.');
      const relational = await runRelational(
        question,
        requireRef(context.connectionRef, 'connectionRef'),
        schema,
      );
      sql = relational.sql;
      explanation = relational.explanation.trim() || undefined;
      truncated = relational.truncated;

      if (route === 'relational') {
        analysed = relational.table;
      } else {
        const fileTable = await fileProvider.load(requireRef(context.attachedFileRef, 'attachedFileRef'));
        // Both sides keyed the same way: pg dates arrive as Date, file dates as strings
        const joined = innerJoin(normalizeTable(relational.table), normalizeTable(fileTable), maxRows);
        logger.info(
          { keys: joined.keys, rows: joined.table.rows.length },
          'Pipeline: joined query result with attached file',
        );
        analysed = joined.table;
        truncated = truncated || joined.truncated;
      }
    }

    enter('Analyze', { rows: analysed.rows.length });
    const table = normalizeTable(analysed);
    const statistics = analyzeTable(table, { chunkSize });

    enter('Select');
    const profile = buildProfile(table, statistics);
    const chart = renderChart(selectChart(profile), table, statistics);

    enter('Insights', { chartType: chart.type, rule: chart.config.rule });
    const insights = buildInsights(chart, statistics, truncated);
    try {
      const narrative = await inference.inferAnalysisNarrative(table, statistics);
      if (narrative) insights.push(narrative);
    } catch (err) {
      // Unusable model output only loses the narrative; timeouts still fail the run
      if (!(err instanceof AIError)) throw err;
      logger.warn({ error: err.message }, 'Pipeline: narrative unavailable, returning rule-based insights');
    }

    const preview = table.rows.length > maxRows;
    enter('CacheWrite');
    return {
      route,
      table: preview ? { columns: table.columns, rows: table.rows.slice(0, maxRows) } : table,
      truncated: truncated || preview,
      statistics,
      chart,
      insights,
      ...(sql !== undefined ? { sql } : {}),
      ...(explanation !== undefined ? { explanation } : {}),
      generatedAt: new Date().toISOString(),
    };
  }

  async function processQueryWithMeta(question: string, context: QueryContext = {}): Promise<ProcessedQuery> {
    let state: PipelineState = 'Start';
    const startTime = Date.now();
    let key: string | undefined;

    const enter = (next: PipelineState, fields: Record<string, unknown> = {}) => {
      state = next;
      logger.debug({ state, fingerprint: key?.substring(0, 12), ...fields }, `Pipeline: ${state}`);
    };

    try {
      if (typeof question !== 'string' || !question.trim()) {
        throw new ValidationError('Question cannot be empty');
      }
      const trimmed = question.trim();
      if (trimmed.length > MAX_QUESTION_LENGTH) {
        throw new ValidationError(
          `Question too long: ${trimmed.length} chars (max ${MAX_QUESTION_LENGTH})`,
        );
      }

      enter('ResolveContext');
      const resolved = await resolveContext(context);
      key = fingerprint(trimmed, contextIdentity(resolved));

      enter('CacheCheck');
      const { value, source } = await cache.getOrCompute(
        key,
        () => compute(trimmed, context, resolved, enter),
        deps.cacheTtlSeconds,
      );

      enter('Done');
      logger.info(
        {
          fingerprint: key.substring(0, 12),
          route: value.route,
          chartType: value.chart.type,
          cache: source,
          durationMs: Date.now() - startTime,
        },
        'Pipeline: query processed',
      );
      return { result: value, fingerprint: key, cache: source };
    } catch (err) {
      const failedIn = state;
      const error = toError(err);
      const code = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
      const fields = {
        failedIn,
        code,
        fingerprint: key?.substring(0, 12),
        durationMs: Date.now() - startTime,
        error: error.message,
      };
      if (err instanceof AppError && err.isOperational) {
        logger.warn(fields, `Pipeline: Failed(${code})`);
      } else {
        logger.error({ ...fields, err: error }, `Pipeline: Failed(${code})`);
      }
      throw err;
    }
  }

  async function processQuery(question: string, context: QueryContext = {}): Promise<AnalysisResult> {
    return (await processQueryWithMeta(question, context)).result;
  }

  return { processQuery, processQueryWithMeta };
}

function requireRef(ref: string | undefined, name: string): string {
  if (!ref) throw new ValidationError(`Missing ${name} for this question.`);
  return ref;
}

export type AnalysisService = ReturnType<typeof createAnalysisService>;
