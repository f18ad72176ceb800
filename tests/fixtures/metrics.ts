import type { StaticMetricPoint } from '../../functions/_shared/metric_engine/static_ingestor.ts';

export const CONTENT_TYPE_OPTIONS = ['video', 'article', 'slideshow', 'interactive', 'podcast', 'all'];

export const TEST_OPTIONS = {
  max_age: {
    input_type: 'number',
    value_types: ['numeric'],
    default: 30,
    help: { placeholder: 30, description: 'Days after creation to keep counting.' },
  },
  content_item_types: {
    input_type: 'text',
    input_options: CONTENT_TYPE_OPTIONS,
    value_types: ['string'],
    default: 'all',
    help: { placeholder: 'all', description: 'Content item types to include.' },
  },
};

const ALL_CONTENT_LEVELS = ['timeseries', 'summary', 'comparison'];
const ALL_ORG_LEVELS = ['timeseries', 'summary'];

export function buildTaskDocument(metrics: Record<string, Record<string, unknown>>, overrides: Record<string, unknown> = {}) {
  return {
    slug: 'test-content-timeseries',
    name: 'Test Content Timeseries',
    description: 'Timeseries used by the unit tests.',
    runs: 'google_analytics.ContentTimeseries',
    creates: 'metrics',
    option_order: [],
    options: TEST_OPTIONS,
    metrics,
    ...overrides,
  };
}

export function countMetric(displayName: string, extra: Record<string, unknown> = {}) {
  return {
    display_name: displayName,
    type: 'count',
    content_levels: ALL_CONTENT_LEVELS,
    org_levels: ALL_ORG_LEVELS,
    ...extra,
  };
}

export function computedMetric(displayName: string, formula: string, extra: Record<string, unknown> = {}) {
  return {
    display_name: displayName,
    type: 'computed',
    content_levels: ALL_CONTENT_LEVELS,
    org_levels: ALL_ORG_LEVELS,
    formula,
    agg: 'avg',
    ...extra,
  };
}

export const TRAFFIC_TASK_DOCUMENT = buildTaskDocument({
  ga_pageviews: countMetric('Pageviews'),
  ga_entrances: countMetric('Entrances'),
  ga_per_external: computedMetric('Percent External Traffic', '{ga_entrances} / {ga_pageviews}'),
});

export function series(scopeId: string, values: Array<[string, number]>, contentItemType?: StaticMetricPoint['content_item_type']): StaticMetricPoint[] {
  return values.map(([timestamp, value]) => ({
    timestamp,
    scope_id: scopeId,
    value,
    ...(contentItemType ? { content_item_type: contentItemType } : {}),
  }));
}
