/**
 * Shared types for the query processing and analysis pipeline.
 */

import type { QueryRejectionReason } from '../utils/errors.js';

export type Cell = string | number | boolean | Date | null;

export interface Table {
  columns: string[];
  rows: Cell[][];
}

export interface QueryContext {
  attachedFileRef?: string;
  connectionRef?: string;
}

export interface QueryRequest {
  readonly question: string;
  readonly context: Readonly<QueryContext>;
}

// ── Context identity ────────────────────────────────────────────────

export interface FileDescriptor {
  ref: string;
  name: string;
  sizeBytes: number;
  contentHash: string;
  columns: string[];
}

export interface SchemaColumn {
  name: string;
  dataType: string;
}

export interface SchemaTable {
  name: string;
  columns: SchemaColumn[];
}

export interface SchemaDescription {
  connectionId: string;
  /** Hash of the sorted table/column/type listing. Changes whenever the schema does. */
  version: string;
  tables: SchemaTable[];
}

export interface ResolvedContext {
  file?: FileDescriptor;
  connection?: SchemaDescription;
}

export interface ContextIdentity {
  fileContentHash?: string;
  connectionId?: string;
  schemaVersion?: string;
}

// ── Classification ──────────────────────────────────────────────────

export type QueryRoute = 'relational' | 'tabular' | 'mixed';

export interface ClassificationDecision {
  route: QueryRoute;
  /** Which rule inputs fired. Observability only. */
  signals: string[];
}

// ── Relational path ─────────────────────────────────────────────────

export interface QueryPlan {
  sql: string;
  schema: SchemaDescription;
}

export type SqlValidationResult =
  | { valid: true; sql: string }
  | {
      valid: false;
      reason: QueryRejectionReason;
      errors: string[];
    };

export interface QueryExecutionResult {
  table: Table;
  rowCount: number;
  durationMs: number;
  truncated: boolean;
}

// ── Profiling & statistics ──────────────────────────────────────────

export type SemanticType = 'numeric' | 'categorical' | 'datetime' | 'text';

export interface ColumnProfile {
  name: string;
  semanticType: SemanticType;
  cardinality: number;
  nullCount: number;
}

export interface DataProfile {
  rowCount: number;
  columns: ColumnProfile[];
  hasTimeAxis: boolean;
  timeColumn?: string;
  /** A single categorical column whose numeric companion splits a total into non-negative shares. */
  partOfWhole: boolean;
}

export interface NumericStats {
  count: number;
  missing: number;
  sum: number;
  mean: number;
  std: number;
  min: number;
  max: number;
  q1: number;
  median: number;
  q3: number;
}

export interface ValueCount {
  value: string;
  count: number;
}

export interface CategoricalStats {
  count: number;
  missing: number;
  cardinality: number;
  /** True when cardinality comes from a sketch rather than an exact count. */
  cardinalityEstimated: boolean;
  topValues: ValueCount[];
}

export interface CorrelationMatrix {
  columns: string[];
  /** Pearson r per pair; null where a column has no variance. */
  values: Array<Array<number | null>>;
}

export interface DataQuality {
  duplicateRows: number;
  /** Percentages are rounded to two decimals. */
  duplicatePercentage: number;
  missingPercentage: Record<string, number>;
  /** 0-100; missing values cost up to 50 points, duplicate rows up to 30. */
  score: number;
}

export interface DescriptiveStats {
  rowCount: number;
  columnCount: number;
  numeric: Record<string, NumericStats>;
  categorical: Record<string, CategoricalStats>;
  correlation?: CorrelationMatrix;
  quality: DataQuality;
  chunked: boolean;
  chunkCount: number;
}

// ── Charts ──────────────────────────────────────────────────────────

export type ChartType = 'line' | 'bar' | 'pie' | 'scatter' | 'heatmap' | 'table';

export interface ChartConfig {
  title: string;
  /** Name of the decision-table rule that produced the chart type. */
  rule: string;
  xKey?: string;
  yKey?: string;
  labelKey?: string;
  valueKey?: string;
  columns?: string[];
}

export type ChartSelection = Pick<ChartSpec, 'type' | 'config'>;

export interface ChartDataset {
  label: string;
  data: number[] | Array<{ x: number; y: number }>;
  backgroundColor: string[];
  borderColor?: string[];
  borderWidth?: number;
}

export interface ChartConfiguration {
  type: 'bar' | 'line' | 'pie' | 'scatter';
  data: {
    labels?: string[];
    datasets: ChartDataset[];
  };
  options: {
    responsive: boolean;
    plugins: {
      title: { display: boolean; text: string };
      legend?: { display: boolean; position: string };
    };
    scales?: {
      x: { title: { display: boolean; text: string } };
      y: { title: { display: boolean; text: string } };
    };
  };
}

export interface HeatmapPayload {
  type: 'heatmap';
  title: string;
  labels: string[];
  matrix: Array<Array<number | null>>;
}

export interface TablePayload {
  type: 'table';
  title: string;
  headers: string[];
  rows: Cell[][];
}

export type RenderPayload = ChartConfiguration | HeatmapPayload | TablePayload;

export interface ChartSpec {
  type: ChartType;
  config: ChartConfig;
  renderPayload: RenderPayload;
}

// ── Result ──────────────────────────────────────────────────────────

export interface AnalysisResult {
  route: QueryRoute;
  table: Table;
  truncated: boolean;
  statistics: DescriptiveStats;
  chart: ChartSpec;
  insights: string[];
  sql?: string;
  /** The model's account of what the generated query does. */
  explanation?: string;
  generatedAt: string;
}
