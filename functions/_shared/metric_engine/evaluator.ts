import { evaluateFormula } from './expression.ts';
import { getMetric } from './schema.ts';
import type { BucketValue, MetricTask, TimeBucket } from './types.ts';

/**
 * Fills the computed metrics of one bucket. Count values are taken as given;
 * computed values are evaluated in the task's dependency order so a formula
 * can reference another computed metric.
 */
export function resolveComputedMetrics(
  task: MetricTask,
  values: Record<string, BucketValue>
): Record<string, BucketValue> {
  const resolved: Record<string, BucketValue> = {};

  for (const metric of task.metrics) {
    if (metric.type === 'count') {
      const value = values[metric.name];
      resolved[metric.name] = typeof value === 'number' && Number.isFinite(value) ? value : null;
    }
  }

  for (const name of task.evaluation_order) {
    const formula = getMetric(task, name)?.formula;
    resolved[name] = formula ? evaluateFormula(formula, resolved) : null;
  }

  return resolved;
}

export function computeBuckets(task: MetricTask, buckets: TimeBucket[]): TimeBucket[] {
  return buckets.map((bucket) => ({
    ...bucket,
    values: resolveComputedMetrics(task, bucket.values),
  }));
}
