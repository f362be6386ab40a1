export interface DataRecord {
  name: string;
  primaryMetric: number;
  costMetric?: number;
  category: string;
  year?: number;
}

export interface Dataset {
  records: readonly DataRecord[];
  hasCost: boolean;
  /** Set when every record carries a `year`. */
  hasYear?: boolean;
}

export interface NumericRange {
  min: number;
  max: number;
}

export type FilterCriteria = {
  categories: readonly string[];
  primaryRange: NumericRange;
  costCeiling?: number;
  year?: number;
};

export type FilteredResult = readonly DataRecord[];

export interface NoDataSummary {
  kind: "no-data";
  count: 0;
  total: number;
}

export interface DataSummary {
  kind: "data";
  count: number;
  total: number;
  meanPrimary: number;
  minPrimary: number;
  maxPrimary: number;
  meanCost?: number;
  bestValue?: DataRecord;
  bestPrimary: DataRecord;
}

export type Summary = NoDataSummary | DataSummary;

export interface CategoryStat {
  category: string;
  count: number;
  meanPrimary: number;
  meanCost?: number;
}

export type PipelineOutcome =
  | { status: "empty-dataset" }
  | { status: "invalid-criteria"; message: string }
  | { status: "ready"; filtered: FilteredResult; summary: Summary };

export interface ColumnSpec {
  aliases: string[];
  required: boolean;
}

export interface DatasetSchema {
  name: ColumnSpec;
  primary: ColumnSpec;
  cost?: ColumnSpec;
  category: ColumnSpec;
  year?: ColumnSpec;
}

export interface MetricOption {
  id: string;
  label: string;
  column: ColumnSpec;
}

export interface MetricLabels {
  name: string;
  primary: string;
  cost: string;
  category: string;
  costPrefix?: string;
}

export interface ViewConfig {
  id: string;
  title: string;
  description: string;
  source: string;
  schema: DatasetSchema;
  labels: MetricLabels;
  /** Alternative primary metrics; the first is the default. */
  metrics?: MetricOption[];
}

export interface RowsResult {
  rows: Record<string, unknown>[];
  error: string | null;
}

export interface LoadResult {
  dataset: Dataset;
  error: string | null;
  dropped: number;
}
