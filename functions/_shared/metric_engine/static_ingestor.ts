import { isWithinWindow, matchesType } from './window.ts';
import type {
  ContentItemType,
  ContentItemTypeSelection,
  EligibleWindow,
  MetricScope,
  RawFacetPoint,
  RawMetricIngestor,
  RawMetricPoint,
} from './types.ts';

export interface StaticMetricPoint extends RawMetricPoint {
  content_item_type?: ContentItemType;
}

export interface StaticFacetPoint extends RawFacetPoint {
  timestamp?: string;
}

export interface StaticIngestorData {
  points?: Record<string, StaticMetricPoint[]>;
  facets?: Record<string, StaticFacetPoint[]>;
}

/**
 * Serves raw values that were fetched ahead of time. Points are returned when
 * they fall in the requested window; facet points without a timestamp belong
 * to every window.
 */
export class StaticMetricIngestor implements RawMetricIngestor {
  constructor(private data: StaticIngestorData) {}

  async fetch(
    metricName: string,
    _scope: MetricScope,
    window: EligibleWindow,
    contentItemTypes: ContentItemTypeSelection
  ): Promise<RawMetricPoint[]> {
    return (this.data.points?.[metricName] ?? [])
      .filter((point) => isWithinWindow(point.timestamp, window))
      .filter((point) => !point.content_item_type || matchesType(point.content_item_type, contentItemTypes))
      .map(({ timestamp, scope_id, value }) => ({ timestamp, scope_id, value }));
  }

  async fetchFacets(
    metricName: string,
    _facetDimension: string,
    window: EligibleWindow,
    _maxFacetsHint: number
  ): Promise<RawFacetPoint[]> {
    return (this.data.facets?.[metricName] ?? [])
      .filter((point) => !point.timestamp || isWithinWindow(point.timestamp, window))
      .map(({ facet_key, scope_id, value }) => ({ facet_key, scope_id, value }));
  }
}
