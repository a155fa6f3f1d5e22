/**
 * Language inference service backed by OpenAI chat completions.
 *
 * Two calls: question + schema → candidate SQL, and table + statistics →
 * narrative text. Both request a JSON object response and run under a hard
 * deadline. The candidate SQL is NOT trusted here; the executor validates it.
 */

import type { OpenAI } from 'openai';
import type { DescriptiveStats, SchemaDescription, Table } from '../ai/types.js';
import {
  buildNarrativeSystemPrompt,
  buildNarrativeUserMessage,
  buildSqlSystemPrompt,
} from '../ai/prompts/system.js';
import { AIError, TimeoutError, toError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../utils/logger.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_TIMEOUT_MS = 30_000;
const SQL_MAX_TOKENS = 1024;
const NARRATIVE_MAX_TOKENS = 400;
const TEMPERATURE = 0;

export interface SqlCandidate {
  sql: string;
  explanation: string;
}

export interface LanguageInferenceService {
  inferSql(question: string, schema: SchemaDescription): Promise<SqlCandidate>;
  inferAnalysisNarrative(table: Table, stats: DescriptiveStats): Promise<string>;
}

export interface InferenceServiceDeps {
  openai: OpenAI;
  model?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object out of a model reply, tolerating a markdown code fence.
 */
export function parseJsonReply(raw: string): Record<string, unknown> {
  let cleaned = raw.trim();
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```\w*\s*\n?/, '').replace(/\n?\s*```\s*$/, '');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new AIError('Failed to parse AI response as JSON. The AI returned invalid output.', {
      cause: toError(err),
    });
  }

  if (!isRecord(parsed)) {
    throw new AIError('AI response is not a valid JSON object');
  }
  return parsed;
}

export function createInferenceService(deps: InferenceServiceDeps): LanguageInferenceService {
  const { openai } = deps;
  const model = deps.model ?? DEFAULT_MODEL;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function complete(
    operation: string,
    systemPrompt: string,
    userContent: string,
    maxTokens: number,
  ): Promise<Record<string, unknown>> {
    const startTime = Date.now();
    let rawContent: string;

    try {
      const completion = await withTimeout(operation, timeoutMs, () =>
        openai.chat.completions.create(
          {
            model,
            temperature: TEMPERATURE,
            max_tokens: maxTokens,
            response_format: { type: 'json_object' },
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: userContent },
            ],
          },
          { timeout: timeoutMs },
        ),
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new AIError('OpenAI returned an empty response');
      }
      rawContent = content;
    } catch (err) {
      logger.warn(
        { operation, durationMs: Date.now() - startTime, error: toError(err).message },
        'Inference service: completion failed',
      );
      if (err instanceof AIError || err instanceof TimeoutError) throw err;
      throw new AIError('Failed to get response from OpenAI', { cause: toError(err) });
    }

    logger.debug({ operation, durationMs: Date.now() - startTime }, 'Inference service: completion received');
    return parseJsonReply(rawContent);
  }

  async function inferSql(question: string, schema: SchemaDescription): Promise<SqlCandidate> {
    const reply = await complete('SQL inference', buildSqlSystemPrompt(schema), question.trim(), SQL_MAX_TOKENS);

    if (typeof reply.sql !== 'string' || !reply.sql.trim()) {
      throw new AIError('AI response missing required "sql" field');
    }

    return {
      sql: reply.sql,
      explanation: typeof reply.explanation === 'string' ? reply.explanation : '',
    };
  }

  async function inferAnalysisNarrative(table: Table, stats: DescriptiveStats): Promise<string> {
    const reply = await complete(
      'Narrative inference',
      buildNarrativeSystemPrompt(),
      buildNarrativeUserMessage(table, stats),
      NARRATIVE_MAX_TOKENS,
    );

    if (typeof reply.narrative !== 'string') {
      throw new AIError('AI response missing required "narrative" field');
    }
    return reply.narrative.trim();
  }

  return { inferSql, inferAnalysisNarrative };
}
