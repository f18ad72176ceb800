import {
  aggregate,
  assertLevelSupported,
  fillWindowDays,
  joinMetricPoints,
  levelsFor,
  rollupBuckets,
} from './aggregator.ts';
import { LevelNotSupportedError, SchemaError } from './errors.ts';
import { computeBuckets } from './evaluator.ts';
import { groupFacets, limitFacets } from './facets.ts';
import { filterBuckets } from './window.ts';
import type {
  AggregationLevel,
  EligibleWindow,
  FacetLevelValue,
  FacetValue,
  LevelValue,
  MetricDefinition,
  MetricLevelError,
  MetricOutput,
  MetricTask,
  RawMetricIngestor,
  TaskOptions,
  TaskTarget,
  TimeBucket,
} from './types.ts';

export interface TaskRunContext {
  target: TaskTarget;
  ingestor: RawMetricIngestor;
  window: EligibleWindow;
  priorWindow: EligibleWindow;
  levels?: AggregationLevel[];
}

export interface TaskRunOutput {
  metrics: MetricOutput[];
  errors: MetricLevelError[];
}

export interface MetricTaskHandler {
  readonly runs: string;
  /** Throws when the task declares metrics this handler cannot produce. */
  assertCompatible(task: MetricTask): void;
  execute(options: TaskOptions, task: MetricTask, context: TaskRunContext): Promise<TaskRunOutput>;
}

function tag(metric: MetricDefinition, target: TaskTarget, value: LevelValue | FacetLevelValue): MetricOutput {
  return {
    metric: metric.name,
    display_name: metric.display_name,
    type: metric.type,
    scope: target.scope,
    scope_id: target.id,
    ...value,
  };
}

/**
 * Runs `produce` for every requested level of every metric. A level the metric
 * does not declare is reported against that metric and level only.
 */
async function produceLevels<T extends LevelValue | FacetLevelValue>(
  metrics: MetricDefinition[],
  context: TaskRunContext,
  produce: (metric: MetricDefinition, level: AggregationLevel) => T | Promise<T>
): Promise<TaskRunOutput> {
  const output: TaskRunOutput = { metrics: [], errors: [] };
  const scope = context.target.scope;

  for (const metric of metrics) {
    for (const level of new Set(context.levels ?? levelsFor(metric, scope))) {
      try {
        assertLevelSupported(metric, level, scope);
        output.metrics.push(tag(metric, context.target, await produce(metric, level)));
      } catch (error) {
        if (!(error instanceof LevelNotSupportedError)) {
          throw error;
        }
        output.errors.push({ metric: metric.name, level, code: error.name, message: error.message });
      }
    }
  }

  return output;
}

function needsLevel(metrics: MetricDefinition[], context: TaskRunContext, level: AggregationLevel): boolean {
  const scope = context.target.scope;
  return metrics.some((metric) => levelsFor(metric, scope).includes(level) && (context.levels ?? [level]).includes(level));
}

/**
 * Produces timeseries, summary and comparison values from daily buckets.
 * Content targets keep their own buckets; organization targets roll every
 * bucket the ingestor returns up into one series.
 */
export class BucketMetricsHandler implements MetricTaskHandler {
  constructor(readonly runs: string) {}

  assertCompatible(task: MetricTask): void {
    const faceted = task.metrics.find((metric) => metric.faceted);
    if (faceted) {
      throw new SchemaError(`handler ${this.runs} does not produce faceted metrics`, task.slug, faceted.name);
    }
  }

  async execute(options: TaskOptions, task: MetricTask, context: TaskRunContext): Promise<TaskRunOutput> {
    const current = await this.loadBuckets(options, task, context, context.window);
    const prior = needsLevel(task.metrics, context, 'comparison')
      ? await this.loadBuckets(options, task, context, context.priorWindow)
      : [];

    return produceLevels(task.metrics, context, (metric, level) =>
      aggregate(metric, level, context.target.scope, current, prior)
    );
  }

  private async loadBuckets(
    options: TaskOptions,
    task: MetricTask,
    context: TaskRunContext,
    window: EligibleWindow
  ): Promise<TimeBucket[]> {
    const { target, ingestor } = context;
    const counts = task.metrics.filter((metric) => metric.type === 'count').map((metric) => metric.name);
    const fetched = await Promise.all(
      counts.map(async (name) => [name, await ingestor.fetch(name, target.scope, window, options.content_item_types)] as const)
    );
    const joined = filterBuckets(joinMetricPoints(counts, Object.fromEntries(fetched)), window);
    const buckets = fillWindowDays(joined, window, counts, target.id);

    if (target.scope === 'org') {
      return rollupBuckets(task, buckets, target.id);
    }
    return computeBuckets(
      task,
      buckets.filter((bucket) => bucket.scope_id === target.id)
    );
  }
}

/**
 * Produces ranked facet lists (referring domain, device, ...) for faceted
 * count metrics, capped at the task's `max_facets`.
 */
export class FacetMetricsHandler implements MetricTaskHandler {
  constructor(
    readonly runs: string,
    readonly dimension: string
  ) {}

  assertCompatible(task: MetricTask): void {
    const unfaceted = task.metrics.find((metric) => !metric.faceted || metric.type !== 'count');
    if (unfaceted) {
      throw new SchemaError(`handler ${this.runs} only produces faceted count metrics`, task.slug, unfaceted.name);
    }
  }

  async execute(options: TaskOptions, task: MetricTask, context: TaskRunContext): Promise<TaskRunOutput> {
    const limit = options.max_facets ?? Number.MAX_SAFE_INTEGER;

    return produceLevels<FacetLevelValue>(task.metrics, context, async (metric, level) => {
      const current = await this.loadFacets(metric, context, context.window, limit);
      if (level === 'comparison') {
        const prior = await this.loadFacets(metric, context, context.priorWindow, limit);
        return { level, current, prior };
      }
      return { level: 'summary', facets: current };
    });
  }

  private async loadFacets(
    metric: MetricDefinition,
    context: TaskRunContext,
    window: EligibleWindow,
    limit: number
  ): Promise<FacetValue[]> {
    const { target, ingestor } = context;
    const points = await ingestor.fetchFacets(metric.name, this.dimension, window, limit);
    const scoped = target.scope === 'content' ? points.filter((point) => point.scope_id === target.id) : points;
    return limitFacets(groupFacets(scoped), limit);
  }
}

export const CONTENT_TIMESERIES = 'google_analytics.ContentTimeseries';
export const CONTENT_DEVICE_SUMMARIES = 'google_analytics.ContentDeviceSummaries';
export const CONTENT_DOMAIN_FACETS = 'google_analytics.ContentDomainFacets';

export function createDefaultHandlers(): MetricTaskHandler[] {
  return [
    new BucketMetricsHandler(CONTENT_TIMESERIES),
    new BucketMetricsHandler(CONTENT_DEVICE_SUMMARIES),
    new FacetMetricsHandler(CONTENT_DOMAIN_FACETS, 'domain'),
  ];
}
