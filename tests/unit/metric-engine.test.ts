import { beforeAll, describe, expect, it } from 'vitest';

import { DEFAULT_TASKS_DIR } from '../../functions/_shared/config.ts';
import { MetricTaskService } from '../../functions/_shared/metric_engine/engine.ts';
import {
  HandlerNotFound,
  InvalidTaskOptions,
  InvalidTimeContext,
  SchemaError,
  TaskNotFound,
} from '../../functions/_shared/metric_engine/errors.ts';
import { createDefaultHandlers } from '../../functions/_shared/metric_engine/handlers.ts';
import { loadTaskDefinitionsFromDirectory } from '../../functions/_shared/metric_engine/node_loader.ts';
import { HandlerRegistry, TaskRegistry } from '../../functions/_shared/metric_engine/registry.ts';
import { parseTaskDocument } from '../../functions/_shared/metric_engine/schema.ts';
import { StaticMetricIngestor } from '../../functions/_shared/metric_engine/static_ingestor.ts';
import type { MetricTaskResult } from '../../functions/_shared/metric_engine/types.ts';
import { buildTaskDocument, countMetric, series } from '../fixtures/metrics.ts';

const TIMESERIES = 'google-analytics-to-content-timeseries';
const DEVICE_SUMMARIES = 'google-analytics-to-content-device-summaries';
const DOMAIN_FACETS = 'google-analytics-to-content-domain-facets';

let service: MetricTaskService;

beforeAll(async () => {
  const tasks = await loadTaskDefinitionsFromDirectory(DEFAULT_TASKS_DIR);
  const registry = new TaskRegistry(tasks, new HandlerRegistry(createDefaultHandlers()));
  service = new MetricTaskService(registry);
});

function outputOf(result: MetricTaskResult, metric: string, level: string) {
  const output = result.metrics.find((entry) => entry.metric === metric && entry.level === level);
  if (!output) {
    throw new Error(`No ${level} output for ${metric}`);
  }
  return output;
}

const article = { scope: 'content', id: 'a1', created_at: '2024-03-01T09:00:00Z', type: 'article' } as const;

const trafficIngestor = new StaticMetricIngestor({
  points: {
    ga_pageviews: [
      ...series('a1', [
        ['2024-03-01', 100],
        ['2024-03-02', 0],
        ['2024-03-03', 50],
        ['2024-03-04', 999],
        ['2024-02-28', 40],
      ]),
      ...series('a2', [['2024-03-01', 7]]),
    ],
    ga_entrances: series('a1', [
      ['2024-03-01', 25],
      ['2024-03-02', 0],
      ['2024-03-03', 25],
      ['2024-02-28', 10],
    ]),
    ga_exits: series('a1', [['2024-03-01', 30]]),
    ga_total_time_on_page: series('a1', [
      ['2024-03-01', 1000],
      ['2024-03-03', 500],
    ]),
  },
});

describe('MetricTaskService - Content Timeseries', () => {
  let result: MetricTaskResult;

  beforeAll(async () => {
    result = await service.execute({ task: TIMESERIES, target: article, options: { max_age: 3 } }, trafficIngestor);
  });

  it('runs every declared content level of every metric', () => {
    expect(result.task).toBe(TIMESERIES);
    expect(result.window).toEqual({ start: '2024-03-01', end: '2024-03-04' });
    expect(result.skipped).toBeNull();
    expect(result.errors).toEqual([]);
    expect(result.metrics).toHaveLength(18);
  });

  it('produces timeseries inside the eligible window only', () => {
    expect(outputOf(result, 'ga_pageviews', 'timeseries')).toEqual({
      metric: 'ga_pageviews',
      display_name: 'Pageviews',
      type: 'count',
      scope: 'content',
      scope_id: 'a1',
      level: 'timeseries',
      points: [
        { timestamp: '2024-03-01', value: 100 },
        { timestamp: '2024-03-02', value: 0 },
        { timestamp: '2024-03-03', value: 50 },
      ],
    });
  });

  it('evaluates computed metrics per bucket', () => {
    expect(outputOf(result, 'ga_per_external', 'timeseries')).toMatchObject({
      type: 'computed',
      points: [
        { timestamp: '2024-03-01', value: 0.25 },
        { timestamp: '2024-03-02', value: null },
        { timestamp: '2024-03-03', value: 0.5 },
      ],
    });
  });

  it('summarizes counts by sum and computed metrics by average', () => {
    expect(outputOf(result, 'ga_pageviews', 'summary')).toMatchObject({ value: 150 });
    expect(outputOf(result, 'ga_exits', 'summary')).toMatchObject({ value: 30 });
    expect(outputOf(result, 'ga_avg_time_on_page', 'summary')).toMatchObject({ value: 10 });
    expect(outputOf(result, 'ga_per_external', 'summary')).toMatchObject({ value: 0.375 });
  });

  it('compares against the preceding window of equal length', () => {
    expect(outputOf(result, 'ga_pageviews', 'comparison')).toMatchObject({ current: 150, prior: 40 });
    expect(outputOf(result, 'ga_per_external', 'comparison')).toMatchObject({ current: 0.375, prior: 0.25 });
  });

  it('uses the prior window supplied by the caller', async () => {
    const ingestor = new StaticMetricIngestor({
      points: { ga_pageviews: series('a1', [['2024-03-01', 10], ['2024-02-02', 70]]) },
    });

    const compared = await service.execute(
      {
        task: TIMESERIES,
        target: article,
        options: { max_age: 3 },
        levels: ['comparison'],
        prior_window: { start: '2024-02-01', end: '2024-02-04' },
      },
      ingestor
    );

    expect(outputOf(compared, 'ga_pageviews', 'comparison')).toMatchObject({ current: 10, prior: 70 });
  });

  it('skips content items outside the configured types', async () => {
    const skipped = await service.execute(
      { task: TIMESERIES, target: article, options: { content_item_types: 'video' } },
      trafficIngestor
    );

    expect(skipped).toMatchObject({ skipped: 'content_item_type', window: null, metrics: [], errors: [] });
  });
});

describe('MetricTaskService - windows', () => {
  const pageviews = series('a1', [
    ['2024-03-01', 5],
    ['2024-03-03', 7],
  ]);
  const request = { task: TIMESERIES, target: article, options: { max_age: 3 }, levels: ['timeseries' as const] };
  const expectedPoints = [
    { timestamp: '2024-03-01', value: 5 },
    { timestamp: '2024-03-02', value: null },
    { timestamp: '2024-03-03', value: 7 },
  ];

  it('returns one timeseries point per eligible day', async () => {
    const result = await service.execute(request, new StaticMetricIngestor({ points: { ga_pageviews: pageviews } }));

    expect(outputOf(result, 'ga_pageviews', 'timeseries')).toMatchObject({ points: expectedPoints });
    expect(outputOf(result, 'ga_exits', 'timeseries')).toMatchObject({
      points: [
        { timestamp: '2024-03-01', value: null },
        { timestamp: '2024-03-02', value: null },
        { timestamp: '2024-03-03', value: null },
      ],
    });
  });

  it('keeps a series independent of the days sibling metrics report', async () => {
    const ingestor = new StaticMetricIngestor({
      points: { ga_pageviews: pageviews, ga_exits: series('a1', [['2024-03-02', 4]]) },
    });
    const result = await service.execute(request, ingestor);

    expect(outputOf(result, 'ga_pageviews', 'timeseries')).toMatchObject({ points: expectedPoints });
  });

  it('rejects a prior window that ends before it starts', async () => {
    await expect(
      service.execute(
        {
          task: TIMESERIES,
          target: article,
          options: { max_age: 3 },
          prior_window: { start: '2024-02-20', end: '2024-02-10' },
        },
        new StaticMetricIngestor({})
      )
    ).rejects.toThrow(new InvalidTimeContext('prior_window must start before it ends, got 2024-02-20 to 2024-02-10'));
  });

  it('rejects a prior window shorter than the eligible window', async () => {
    const pending = service.execute(
      {
        task: TIMESERIES,
        target: article,
        options: { max_age: 3 },
        prior_window: { start: '2024-02-26', end: '2024-02-28' },
      },
      new StaticMetricIngestor({})
    );

    await expect(pending).rejects.toThrow(InvalidTimeContext);
    await expect(pending).rejects.toMatchObject({
      field: 'prior_window',
      message: 'prior_window must span 3 days like the eligible window, got 2',
    });
  });

  it('produces each requested level once', async () => {
    const result = await service.execute(
      { task: TIMESERIES, target: article, options: { max_age: 3 }, levels: ['summary', 'summary'] },
      new StaticMetricIngestor({ points: { ga_pageviews: pageviews } })
    );

    expect(result.metrics).toHaveLength(6);
    expect(outputOf(result, 'ga_pageviews', 'summary')).toMatchObject({ value: 12 });
  });
});

describe('MetricTaskService - Device Summaries', () => {
  const ingestor = new StaticMetricIngestor({
    points: {
      ga_pageviews_mobile: [
        ...series('a1', [['2024-03-02', 10]], 'article'),
        ...series('a2', [['2024-03-05', 5]], 'video'),
      ],
      ga_pageviews_tablet: series('a1', [['2024-03-02', 4]], 'article'),
    },
  });
  const org = { scope: 'org', id: 'org-1', created_at: '2024-03-01' } as const;

  it('rolls content items up to the organization', async () => {
    const result = await service.execute({ task: DEVICE_SUMMARIES, target: org }, ingestor);

    expect(result.metrics.map((output) => [output.metric, output.level, 'value' in output ? output.value : undefined])).toEqual([
      ['ga_pageviews_mobile', 'summary', 15],
      ['ga_pageviews_tablet', 'summary', 4],
      ['ga_pageviews_desktop', 'summary', 0],
    ]);
  });

  it('passes the content type filter to the ingestor', async () => {
    const result = await service.execute(
      { task: DEVICE_SUMMARIES, target: org, options: { content_item_types: 'article' } },
      ingestor
    );

    expect(outputOf(result, 'ga_pageviews_mobile', 'summary')).toMatchObject({ value: 10 });
  });

  it('reports undeclared levels per metric without dropping the others', async () => {
    const result = await service.execute(
      { task: DEVICE_SUMMARIES, target: org, levels: ['summary', 'comparison'] },
      ingestor
    );

    expect(result.metrics).toHaveLength(3);
    expect(result.errors).toEqual(
      ['ga_pageviews_mobile', 'ga_pageviews_tablet', 'ga_pageviews_desktop'].map((metric) => ({
        metric,
        level: 'comparison',
        code: 'LevelNotSupportedError',
        message: `Metric ${metric} does not support comparison at org level`,
      }))
    );
  });
});

describe('MetricTaskService - Domain Facets', () => {
  const ingestor = new StaticMetricIngestor({
    facets: {
      ga_pageviews_by_domain: [
        { facet_key: 'google.com', scope_id: 'a1', value: 5 },
        { facet_key: 't.co', scope_id: 'a1', value: 5 },
        { facet_key: 'facebook.com', scope_id: 'a1', value: 9 },
        { facet_key: 'google.com', scope_id: 'a2', value: 100 },
        { facet_key: 'reddit.com', scope_id: 'a1', value: 50, timestamp: '2024-05-01' },
      ],
    },
  });

  it('ranks facets and caps them at max_facets', async () => {
    const result = await service.execute(
      { task: DOMAIN_FACETS, target: article, options: { max_facets: 2 } },
      ingestor
    );

    expect(result.metrics).toEqual([
      {
        metric: 'ga_pageviews_by_domain',
        display_name: 'Pageviews By Refering Domain',
        type: 'count',
        scope: 'content',
        scope_id: 'a1',
        level: 'summary',
        facets: [
          { facet_key: 'facebook.com', value: 9 },
          { facet_key: 'google.com', value: 5 },
        ],
      },
    ]);
  });

  it('never produces faceted timeseries', async () => {
    const result = await service.execute(
      { task: DOMAIN_FACETS, target: article, levels: ['timeseries'] },
      ingestor
    );

    expect(result.metrics).toEqual([]);
    expect(result.errors).toMatchObject([{ metric: 'ga_pageviews_by_domain', level: 'timeseries' }]);
  });
});

describe('MetricTaskService - errors', () => {
  const ingestor = new StaticMetricIngestor({});

  it('rejects unknown tasks', async () => {
    await expect(service.execute({ task: 'missing-task', target: article }, ingestor)).rejects.toThrow(TaskNotFound);
  });

  it('rejects invalid options', async () => {
    await expect(
      service.execute({ task: TIMESERIES, target: article, options: { max_age: 'soon' } }, ingestor)
    ).rejects.toThrow(InvalidTaskOptions);
  });
});

describe('TaskRegistry', () => {
  const handlers = new HandlerRegistry(createDefaultHandlers());

  it('fails at startup when no handler is registered for a task', () => {
    const task = parseTaskDocument(
      buildTaskDocument({ ga_pageviews: countMetric('Pageviews') }, { runs: 'google_analytics.Unknown' })
    );

    expect(() => new TaskRegistry([task], handlers)).toThrow(HandlerNotFound);
  });

  it('fails at startup when a handler cannot produce the task metrics', () => {
    const task = parseTaskDocument(
      buildTaskDocument({
        ga_pageviews_by_domain: countMetric('Pageviews By Domain', {
          faceted: true,
          content_levels: ['summary'],
          org_levels: [],
        }),
      })
    );

    expect(() => new TaskRegistry([task], handlers)).toThrow(SchemaError);
  });

  it('rejects duplicate task slugs', () => {
    const task = parseTaskDocument(buildTaskDocument({ ga_pageviews: countMetric('Pageviews') }));

    expect(() => new TaskRegistry([task, task], handlers)).toThrow('duplicate task slug');
  });
});
