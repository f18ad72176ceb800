export const AGGREGATION_LEVELS = ['timeseries', 'summary', 'comparison'] as const;
export const ORG_AGGREGATION_LEVELS = ['timeseries', 'summary'] as const;
export const AGGREGATION_RULES = ['sum', 'avg', 'min', 'max'] as const;
export const CONTENT_ITEM_TYPES = ['video', 'article', 'slideshow', 'interactive', 'podcast'] as const;

export type AggregationLevel = (typeof AGGREGATION_LEVELS)[number];
export type AggregationRule = (typeof AGGREGATION_RULES)[number];
export type ContentItemType = (typeof CONTENT_ITEM_TYPES)[number];
export type MetricType = 'count' | 'computed';
export type MetricScope = 'content' | 'org';

export type FormulaOperator = '+' | '-' | '*' | '/';

export type FormulaNode =
  | { kind: 'literal'; value: number }
  | { kind: 'metric'; name: string }
  | { kind: 'binary'; operator: FormulaOperator; left: FormulaNode; right: FormulaNode };

export interface Formula {
  source: string;
  root: FormulaNode;
  references: string[];
}

export interface MetricDefinition {
  name: string;
  display_name: string;
  type: MetricType;
  content_levels: AggregationLevel[];
  org_levels: AggregationLevel[];
  faceted: boolean;
  formula: Formula | null;
  agg: AggregationRule;
}

export interface TaskOptionHelp {
  placeholder?: unknown;
  description?: string;
}

export interface TaskOptionSpec {
  input_type: string;
  value_types: string[];
  default?: unknown;
  input_options?: string[];
  help?: TaskOptionHelp;
}

export interface SchemaWarning {
  code: 'duplicate_metric_key';
  metric: string;
  message: string;
}

export interface MetricTask {
  slug: string;
  name: string;
  description: string;
  runs: string;
  creates: string;
  option_order: string[];
  options: Record<string, TaskOptionSpec>;
  metrics: MetricDefinition[];
  evaluation_order: string[];
  warnings: SchemaWarning[];
}

export type ContentItemTypeSelection = 'all' | ContentItemType[];

export interface TaskOptions {
  max_age: number;
  content_item_types: ContentItemTypeSelection;
  max_facets: number | null;
}

export interface EligibleWindow {
  start: string;
  end: string;
}

export type TaskTarget =
  | { scope: 'content'; id: string; created_at: string; type: ContentItemType }
  | { scope: 'org'; id: string; created_at: string };

export type BucketValue = number | null;

export interface TimeBucket {
  scope_id: string;
  timestamp: string;
  values: Record<string, BucketValue>;
}

export interface RawMetricPoint {
  timestamp: string;
  scope_id: string;
  value: number;
}

export interface RawFacetPoint {
  facet_key: string;
  scope_id: string;
  value: number;
}

export interface FacetValue {
  facet_key: string;
  value: number;
}

export interface TimeseriesPoint {
  timestamp: string;
  value: BucketValue;
}

export interface RawMetricIngestor {
  fetch(
    metricName: string,
    scope: MetricScope,
    window: EligibleWindow,
    contentItemTypes: ContentItemTypeSelection
  ): Promise<RawMetricPoint[]>;
  fetchFacets(
    metricName: string,
    facetDimension: string,
    window: EligibleWindow,
    maxFacetsHint: number
  ): Promise<RawFacetPoint[]>;
}

export type LevelValue =
  | { level: 'timeseries'; points: TimeseriesPoint[] }
  | { level: 'summary'; value: number | null }
  | { level: 'comparison'; current: number | null; prior: number | null };

export type FacetLevelValue =
  | { level: 'summary'; facets: FacetValue[] }
  | { level: 'comparison'; current: FacetValue[]; prior: FacetValue[] };

export interface MetricOutputTags {
  metric: string;
  display_name: string;
  type: MetricType;
  scope: MetricScope;
  scope_id: string;
}

export type MetricOutput = MetricOutputTags & (LevelValue | FacetLevelValue);

export interface MetricLevelError {
  metric: string;
  level: AggregationLevel;
  code: string;
  message: string;
}

export interface MetricTaskRequest {
  task: string;
  target: TaskTarget;
  options?: Record<string, unknown>;
  levels?: AggregationLevel[];
  prior_window?: EligibleWindow;
}

export interface MetricTaskResult {
  task: string;
  scope: MetricScope;
  scope_id: string;
  window: EligibleWindow | null;
  skipped: 'content_item_type' | null;
  metrics: MetricOutput[];
  errors: MetricLevelError[];
  warnings: SchemaWarning[];
}
