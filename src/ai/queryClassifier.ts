/**
 * Query Classifier — routes a question to the relational source, the attached
 * file, or both. A fixed, ordered rule list; the first rule that fires wins.
 *
 * 1. file + connection + cross-referencing language  → mixed
 * 2. file only                                        → tabular
 * 3. connection only                                  → relational
 * 4. neither                                          → MissingContextError
 *
 * When both sources are attached but the question does not cross-reference
 * them, the question goes to the relational source only if it names schema
 * terms and no file column; otherwise to the file.
 */

import type { ClassificationDecision, ResolvedContext, SchemaDescription } from './types.js';
import { MissingContextError } from '../utils/errors.js';

const JOIN_PHRASES = [
  'join',
  'joined',
  'joining',
  'combine',
  'combined',
  'merge',
  'merged',
  'match',
  'matching',
  'cross reference',
  'cross-reference',
  'cross-referenced',
  'compare with',
  'compared with',
  'compared to',
  'against',
  'together with',
  'along with',
  'correlate with',
  'look up',
  'lookup',
  'enrich',
] as const;

const JOIN_PATTERNS = JOIN_PHRASES.map((phrase) => ({
  phrase,
  pattern: new RegExp(`(^|[^a-z0-9_])${phrase.replace(/[-\s]/g, '[-\\s]')}($|[^a-z0-9_])`, 'i'),
}));

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `term` (or its underscore-to-space spelling, or a simple plural)
 * appears in the question as a whole word.
 */
export function mentionsTerm(question: string, term: string): boolean {
  const lowered = term.toLowerCase().trim();
  if (lowered.length < 2) return false;

  const spellings = new Set([lowered, lowered.replace(/_/g, ' ')]);
  const text = question.toLowerCase();

  for (const spelling of spellings) {
    const pattern = new RegExp(`(^|[^a-z0-9_])${escapeRegExp(spelling)}(s|es)?($|[^a-z0-9_])`);
    if (pattern.test(text)) return true;
  }
  return false;
}

function schemaTerms(schema: SchemaDescription): string[] {
  const terms = new Set<string>();
  for (const table of schema.tables) {
    terms.add(table.name.toLowerCase());
    for (const column of table.columns) {
      terms.add(column.name.toLowerCase());
    }
  }
  return [...terms];
}

export function classify(question: string, context: ResolvedContext): ClassificationDecision {
  const { file, connection } = context;
  const signals: string[] = [];

  if (file) signals.push('file-attached');
  if (connection) signals.push('connection-attached');

  if (file && connection) {
    const joinPhrases = JOIN_PATTERNS.filter(({ pattern }) => pattern.test(question)).map(
      ({ phrase }) => phrase,
    );
    for (const phrase of joinPhrases) signals.push(`join-phrase:${phrase}`);

    const schemaVocabulary = new Set(schemaTerms(connection));
    const overlapping = file.columns
      .map((column) => column.toLowerCase())
      .filter((column) => schemaVocabulary.has(column) && mentionsTerm(question, column));
    for (const term of overlapping) signals.push(`shared-entity:${term}`);

    if (joinPhrases.length > 0 || overlapping.length > 0) {
      return { route: 'mixed', signals };
    }

    const mentionedSchema = [...schemaVocabulary].filter((term) => mentionsTerm(question, term));
    const mentionedFile = file.columns.filter((column) => mentionsTerm(question, column));
    for (const term of mentionedSchema) signals.push(`schema-term:${term}`);
    for (const term of mentionedFile) signals.push(`file-column:${term}`);

    if (mentionedSchema.length > 0 && mentionedFile.length === 0) {
      return { route: 'relational', signals };
    }
    return { route: 'tabular', signals };
  }

  if (file) {
    return { route: 'tabular', signals };
  }

  if (connection) {
    return { route: 'relational', signals };
  }

  throw new MissingContextError();
}
