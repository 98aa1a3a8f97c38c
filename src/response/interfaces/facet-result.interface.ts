export interface FacetBucket {
  value: unknown;
  count: number;
  /** Nested payload of pair/map buckets, e.g. stats next to the count */
  extra: Record<string, unknown>;
}

export interface FieldFacetResult {
  buckets: FacetBucket[];
  missing: number | null;
  numBuckets: number | null;
  /** Holds the unparsed value (`raw`) when the facet had an unknown shape */
  metadata: Record<string, unknown>;
}

export interface RangeFacetResult {
  buckets: FacetBucket[];
  gap: unknown;
  start: unknown;
  end: unknown;
  before: number | null;
  after: number | null;
  between: number | null;
  metadata: Record<string, unknown>;
}

export interface JsonFacetBucket {
  value: unknown;
  count: number;
  /** Aggregations such as `avg(price)` */
  metrics: Record<string, unknown>;
  facets: Record<string, JsonFacetNode>;
}

/**
 * One node of a JSON Facet API response
 */
export interface JsonFacetNode {
  count: number | null;
  missing: number | null;
  buckets: JsonFacetBucket[];
  metrics: Record<string, unknown>;
  facets: Record<string, JsonFacetNode>;
}

/**
 * Classic (`facet_counts`) and JSON (`facets`) facet results
 */
export interface FacetResult {
  queries: Record<string, number>;
  fields: Record<string, FieldFacetResult>;
  ranges: Record<string, RangeFacetResult>;
  intervals: Record<string, unknown>;
  pivots: Record<string, unknown>;
  heatmaps: Record<string, unknown>;
  jsonFacets: JsonFacetNode | null;
}
