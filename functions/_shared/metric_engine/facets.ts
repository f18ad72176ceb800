import type { FacetValue, RawFacetPoint } from './types.ts';

export function groupFacets(points: RawFacetPoint[]): FacetValue[] {
  const totals = new Map<string, number>();
  for (const point of points) {
    if (!Number.isFinite(point.value)) {
      continue;
    }
    totals.set(point.facet_key, (totals.get(point.facet_key) ?? 0) + point.value);
  }
  return [...totals].map(([facet_key, value]) => ({ facet_key, value }));
}

function compareFacets(a: FacetValue, b: FacetValue): number {
  const diff = b.value - a.value;
  if (diff !== 0) {
    return diff;
  }
  if (a.facet_key === b.facet_key) {
    return 0;
  }
  return a.facet_key < b.facet_key ? -1 : 1;
}

/**
 * Keeps the `maxFacets` largest facets, highest value first. Equal values are
 * ordered by facet key; facets past the cut are dropped, not merged.
 */
export function limitFacets(values: Iterable<FacetValue>, maxFacets: number): FacetValue[] {
  if (!Number.isInteger(maxFacets) || maxFacets <= 0) {
    return [];
  }
  return [...values]
    .filter((facet) => Number.isFinite(facet.value))
    .sort(compareFacets)
    .slice(0, maxFacets);
}
