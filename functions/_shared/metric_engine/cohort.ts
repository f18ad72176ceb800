import type { BucketValue, ContentItemType } from './types.ts';

export interface CohortItem {
  id: string;
  type: ContentItemType;
  values: Record<string, BucketValue>;
}

export interface CohortStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p25: number;
  p75: number;
}

export type CohortMetricStats = Record<string, CohortStats | null>;

export interface CohortComparisons {
  all: CohortMetricStats;
  types: Partial<Record<ContentItemType, CohortMetricStats>>;
}

function percentile(sorted: number[], fraction: number): number {
  const rank = fraction * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const low = sorted[lower] ?? 0;
  const high = sorted[upper] ?? low;
  return low + (high - low) * (rank - lower);
}

export function describeValues(values: BucketValue[]): CohortStats | null {
  const sorted = values
    .filter((value): value is number => typeof value === 'number' && Number.isFinite(value))
    .sort((a, b) => a - b);
  if (sorted.length === 0) {
    return null;
  }
  return {
    count: sorted.length,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    mean: sorted.reduce((sum, value) => sum + value, 0) / sorted.length,
    median: percentile(sorted, 0.5),
    p25: percentile(sorted, 0.25),
    p75: percentile(sorted, 0.75),
  };
}

function describeCohort(items: CohortItem[], metricNames: string[]): CohortMetricStats {
  const stats: CohortMetricStats = {};
  for (const name of metricNames) {
    stats[name] = describeValues(items.map((item) => item.values[name] ?? null));
  }
  return stats;
}

/**
 * Distribution of content-item summaries across the whole cohort and within
 * each content type, used to place one item's summary against its peers.
 */
export function compareCohorts(items: CohortItem[], metricNames: string[]): CohortComparisons {
  const byType = new Map<ContentItemType, CohortItem[]>();
  for (const item of items) {
    const group = byType.get(item.type) ?? [];
    group.push(item);
    byType.set(item.type, group);
  }

  const types: CohortComparisons['types'] = {};
  for (const [type, group] of byType) {
    types[type] = describeCohort(group, metricNames);
  }

  return { all: describeCohort(items, metricNames), types };
}
