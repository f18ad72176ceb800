import { LevelNotSupportedError } from './errors.ts';
import { computeBuckets } from './evaluator.ts';
import { toDay, windowDays } from './window.ts';
import type {
  AggregationLevel,
  AggregationRule,
  BucketValue,
  EligibleWindow,
  LevelValue,
  MetricDefinition,
  MetricScope,
  MetricTask,
  RawMetricPoint,
  TimeBucket,
  TimeseriesPoint,
} from './types.ts';

export function levelsFor(metric: MetricDefinition, scope: MetricScope): AggregationLevel[] {
  return scope === 'content' ? metric.content_levels : metric.org_levels;
}

export function assertLevelSupported(metric: MetricDefinition, level: AggregationLevel, scope: MetricScope): void {
  if (!levelsFor(metric, scope).includes(level)) {
    throw new LevelNotSupportedError(metric.name, level, scope);
  }
}

function definedValues(values: BucketValue[]): number[] {
  return values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
}

/**
 * Rolls bucket values into one scalar. Undefined buckets are left out of
 * every rule, so an average only counts buckets that produced a value.
 */
export function summarize(values: BucketValue[], agg: AggregationRule): number | null {
  const defined = definedValues(values);

  switch (agg) {
    case 'sum':
      return defined.reduce((sum, value) => sum + value, 0);
    case 'avg':
      return defined.length > 0 ? defined.reduce((sum, value) => sum + value, 0) / defined.length : null;
    case 'min':
      return defined.length > 0 ? defined.reduce((min, value) => (value < min ? value : min)) : null;
    case 'max':
      return defined.length > 0 ? defined.reduce((max, value) => (value > max ? value : max)) : null;
  }
}

function sortByTimestamp(buckets: TimeBucket[]): TimeBucket[] {
  return [...buckets].sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
}

export function toTimeseries(metric: MetricDefinition, buckets: TimeBucket[]): TimeseriesPoint[] {
  return sortByTimestamp(buckets).map((bucket) => {
    const value = bucket.values[metric.name];
    return {
      timestamp: bucket.timestamp,
      value: typeof value === 'number' && Number.isFinite(value) ? value : null,
    };
  });
}

export function aggregate(
  metric: MetricDefinition,
  level: AggregationLevel,
  scope: MetricScope,
  current: TimeBucket[],
  prior: TimeBucket[] = []
): LevelValue {
  assertLevelSupported(metric, level, scope);
  const valuesOf = (buckets: TimeBucket[]) => buckets.map((bucket) => bucket.values[metric.name] ?? null);

  switch (level) {
    case 'timeseries':
      return { level, points: toTimeseries(metric, current) };
    case 'summary':
      return { level, value: summarize(valuesOf(current), metric.agg) };
    case 'comparison':
      return {
        level,
        current: summarize(valuesOf(current), metric.agg),
        prior: summarize(valuesOf(prior), metric.agg),
      };
  }
}

/**
 * Joins per-metric raw series into buckets keyed by scope and day. A metric
 * with no point on a day is undefined for that bucket; repeated points for
 * the same metric, scope and day are added up.
 */
export function joinMetricPoints(
  metricNames: string[],
  pointsByMetric: Record<string, RawMetricPoint[]>
): TimeBucket[] {
  const buckets = new Map<string, TimeBucket>();

  for (const name of metricNames) {
    for (const point of pointsByMetric[name] ?? []) {
      if (!Number.isFinite(point.value)) {
        continue;
      }
      const timestamp = toDay(point.timestamp);
      const key = `${point.scope_id}|${timestamp}`;
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = { scope_id: point.scope_id, timestamp, values: {} };
        for (const metricName of metricNames) {
          bucket.values[metricName] = null;
        }
        buckets.set(key, bucket);
      }
      bucket.values[name] = (bucket.values[name] ?? 0) + point.value;
    }
  }

  return sortByTimestamp([...buckets.values()]);
}

/**
 * Adds an empty bucket for every day of the window that `scopeId` has no
 * bucket for, so timeseries carry one point per eligible day.
 */
export function fillWindowDays(
  buckets: TimeBucket[],
  window: EligibleWindow,
  metricNames: string[],
  scopeId: string
): TimeBucket[] {
  const present = new Set(buckets.filter((bucket) => bucket.scope_id === scopeId).map((bucket) => bucket.timestamp));
  const missing = windowDays(window)
    .filter((day) => !present.has(day))
    .map((timestamp) => ({
      scope_id: scopeId,
      timestamp,
      values: Object.fromEntries(metricNames.map((name): [string, BucketValue] => [name, null])),
    }));

  return sortByTimestamp([...buckets, ...missing]);
}

/**
 * Sums the count metrics of many buckets per day into buckets for one scope,
 * then recomputes computed metrics from the summed counts.
 */
export function rollupBuckets(task: MetricTask, buckets: TimeBucket[], scopeId: string): TimeBucket[] {
  const counts = task.metrics.filter((metric) => metric.type === 'count');
  const byDay = new Map<string, TimeBucket>();

  for (const bucket of buckets) {
    let rolled = byDay.get(bucket.timestamp);
    if (!rolled) {
      rolled = { scope_id: scopeId, timestamp: bucket.timestamp, values: {} };
      for (const metric of counts) {
        rolled.values[metric.name] = null;
      }
      byDay.set(bucket.timestamp, rolled);
    }
    for (const metric of counts) {
      const value = bucket.values[metric.name];
      if (typeof value === 'number' && Number.isFinite(value)) {
        rolled.values[metric.name] = (rolled.values[metric.name] ?? 0) + value;
      }
    }
  }

  return computeBuckets(task, sortByTimestamp([...byDay.values()]));
}
