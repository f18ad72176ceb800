import { describe, expect, it } from 'vitest';

import { groupFacets, limitFacets } from '../../functions/_shared/metric_engine/facets.ts';

describe('limitFacets', () => {
  it('keeps the largest facets and breaks ties by key', () => {
    const facets = [
      { facet_key: 'a', value: 5 },
      { facet_key: 'b', value: 5 },
      { facet_key: 'c', value: 9 },
    ];

    expect(limitFacets(facets, 2)).toEqual([
      { facet_key: 'c', value: 9 },
      { facet_key: 'a', value: 5 },
    ]);
  });

  it('returns every facet when the cap is larger than the set', () => {
    const facets = [
      { facet_key: 't.co', value: 3 },
      { facet_key: 'google.com', value: 12 },
    ];

    expect(limitFacets(facets, 20)).toEqual([
      { facet_key: 'google.com', value: 12 },
      { facet_key: 't.co', value: 3 },
    ]);
  });

  it('returns nothing when the cap is zero', () => {
    expect(limitFacets([{ facet_key: 'google.com', value: 12 }], 0)).toEqual([]);
  });

  it('drops non-finite values', () => {
    expect(
      limitFacets(
        [
          { facet_key: 'broken', value: Number.NaN },
          { facet_key: 'google.com', value: 1 },
        ],
        5
      )
    ).toEqual([{ facet_key: 'google.com', value: 1 }]);
  });
});

describe('groupFacets', () => {
  it('sums raw points by facet key', () => {
    expect(
      groupFacets([
        { facet_key: 'google.com', scope_id: 'a1', value: 4 },
        { facet_key: 'facebook.com', scope_id: 'a1', value: 2 },
        { facet_key: 'google.com', scope_id: 'a2', value: 6 },
      ])
    ).toEqual([
      { facet_key: 'google.com', value: 10 },
      { facet_key: 'facebook.com', value: 2 },
    ]);
  });
});
