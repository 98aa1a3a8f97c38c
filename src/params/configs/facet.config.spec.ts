import { ConfigurationError } from '../../common/errors/configuration.error';
import { FacetParamsConfig, FacetRange } from './facet.config';

describe('FacetParamsConfig', () => {
  it('should turn faceting on even without options', () => {
    expect(new FacetParamsConfig().flatten()).toEqual({ facet: true });
  });

  it('should write options under the facet namespace', () => {
    const config = new FacetParamsConfig({
      fields: ['category', 'brand'],
      queries: 'price:[0 TO 10]',
      mincount: 1,
      containsIgnoreCase: true,
      pivotFields: 'cat,inStock',
    });

    expect(config.flatten()).toEqual({
      facet: true,
      'facet.query': ['price:[0 TO 10]'],
      'facet.field': ['category', 'brand'],
      'facet.contains.ignoreCase': true,
      'facet.mincount': 1,
      'facet.pivot': ['cat,inStock'],
    });
  });

  it('should write range facets with per-field keys', () => {
    const config = new FacetParamsConfig({
      ranges: [
        { field: 'price', start: 0, end: 100, gap: 10, other: 'after' },
        { field: 'date', start: 'NOW-1YEAR', end: 'NOW', gap: '+1MONTH' },
      ],
    });

    expect(config.flatten()).toEqual({
      facet: true,
      'facet.range': ['price', 'date'],
      'f.price.facet.range.start': 0,
      'f.price.facet.range.end': 100,
      'f.price.facet.range.gap': 10,
      'f.price.facet.range.other': ['after'],
      'f.date.facet.range.start': 'NOW-1YEAR',
      'f.date.facet.range.end': 'NOW',
      'f.date.facet.range.gap': '+1MONTH',
    });
  });

  it('should accept constructed ranges', () => {
    const range = new FacetRange({ field: 'price', start: 0, end: 10, gap: 5 });
    const config = new FacetParamsConfig({ ranges: [range] });

    expect(config.ranges).toEqual([range]);
  });

  it('should reject two ranges on the same field', () => {
    expect(
      () =>
        new FacetParamsConfig({
          ranges: [
            { field: 'price', start: 0, end: 10, gap: 1 },
            { field: 'price', start: 10, end: 20, gap: 1 },
          ],
        }),
    ).toThrow('Invalid FacetParamsConfig: ranges: ranges must not repeat a field');
  });

  it('should reject a range without a field', () => {
    expect(() => new FacetRange({ field: '', start: 0, end: 10, gap: 1 })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject a limit below -1', () => {
    expect(() => new FacetParamsConfig({ limit: -2 })).toThrow(ConfigurationError);
  });
});
