/**
 * Prompt builders for the language inference service: SQL generation from a
 * schema description, and a short narrative over computed statistics.
 */

import type { DescriptiveStats, SchemaDescription, Table } from '../types.js';

export const NARRATIVE_PREVIEW_ROWS = 20;

const SQL_RULES = `## Critical Rules
1. Only generate a single SELECT statement. NEVER use INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, TRUNCATE, GRANT, or REVOKE.
2. Reference only the tables and columns listed in the schema. Do not invent columns.
3. Do not end the query with a semicolon and do not add comments.
4. Use PostgreSQL date functions (DATE_TRUNC, EXTRACT, INTERVAL) for time-based questions.
5. Alias every computed column with a short snake_case name (e.g. SUM(amount) AS revenue).
6. Order results meaningfully (e.g. by period ASC for trends, by value DESC for rankings).
7. Do not add a LIMIT unless the question asks for a specific number of rows.`;

const SQL_RESPONSE_FORMAT = `## Response Format
You MUST respond with valid JSON in this exact format:
{
  "sql": "SELECT ... FROM ...",
  "explanation": "Brief explanation of what the query does"
}`;

const NARRATIVE_RESPONSE_FORMAT = `## Response Format
You MUST respond with valid JSON in this exact format:
{
  "narrative": "Two to four sentences describing the most important findings."
}`;

export function formatSchema(schema: SchemaDescription): string {
  return schema.tables
    .map((table) => {
      const columns = table.columns.map((c) => `${c.name} (${c.dataType})`).join(', ');
      return `### ${table.name}\nColumns: ${columns}`;
    })
    .join('\n\n');
}

export function buildSqlSystemPrompt(schema: SchemaDescription): string {
  return [
    'You are a data analytics assistant. You convert natural language questions into PostgreSQL SQL queries.',
    '',
    '## Database Schema',
    formatSchema(schema),
    '',
    SQL_RULES,
    '',
    SQL_RESPONSE_FORMAT,
  ].join('\n');
}

export function buildNarrativeSystemPrompt(): string {
  return [
    'You are a data analytics assistant. You explain analysis results to a business user in plain language.',
    'Only state facts supported by the statistics and rows provided. Do not speculate about causes.',
    '',
    NARRATIVE_RESPONSE_FORMAT,
  ].join('\n');
}

export function buildNarrativeUserMessage(table: Table, stats: DescriptiveStats): string {
  const preview = table.rows.slice(0, NARRATIVE_PREVIEW_ROWS);
  return JSON.stringify({
    columns: table.columns,
    rowCount: stats.rowCount,
    sampleRows: preview,
    numeric: stats.numeric,
    categorical: stats.categorical,
    quality: stats.quality,
    ...(stats.correlation ? { correlation: stats.correlation } : {}),
  });
}
