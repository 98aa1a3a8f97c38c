import {
  FacetBucket,
  FacetResult,
  FieldFacetResult,
  JsonFacetBucket,
  JsonFacetNode,
  RangeFacetResult,
} from './interfaces/facet-result.interface';
import { JsonRecord, coerceInt, isRecord, setEntry } from './utils/json-value';

const RANGE_METADATA_KEYS = ['hardend', 'other', 'include', 'within', 'mean'];

/**
 * Buckets from Solr's list encodings: flat `[v1, c1, v2, c2]` (the default
 * `json.nl=flat`) or pairs `[[v1, c1, {extra}], ...]` (`json.nl=arrarr`)
 */
function parseBucketList(entries: unknown[]): FacetBucket[] {
  const buckets: FacetBucket[] = [];

  if (entries.length > 0 && Array.isArray(entries[0])) {
    for (const entry of entries) {
      if (!Array.isArray(entry) || entry.length === 0) continue;
      const extra: unknown = entry[2];
      buckets.push({
        value: entry[0],
        count: coerceInt(entry[1]),
        extra: isRecord(extra) ? extra : {},
      });
    }
    return buckets;
  }

  for (let index = 0; index < entries.length; index += 2) {
    buckets.push({ value: entries[index], count: coerceInt(entries[index + 1]), extra: {} });
  }
  return buckets;
}

export function parseFieldFacet(raw: unknown): FieldFacetResult {
  const result: FieldFacetResult = { buckets: [], missing: null, numBuckets: null, metadata: {} };

  if (Array.isArray(raw)) {
    result.buckets = parseBucketList(raw);
  } else if (isRecord(raw)) {
    // json.nl=map
    for (const [key, value] of Object.entries(raw)) {
      if (key === 'missing') {
        result.missing = coerceInt(value);
      } else if (key === 'numBuckets') {
        result.numBuckets = coerceInt(value);
      } else if (isRecord(value)) {
        const { count, ...extra } = value;
        result.buckets.push({ value: key, count: coerceInt(count), extra });
      } else {
        result.buckets.push({ value: key, count: coerceInt(value), extra: {} });
      }
    }
  } else {
    result.metadata.raw = raw;
  }

  return result;
}

export function parseRangeFacet(raw: unknown): RangeFacetResult {
  const result: RangeFacetResult = {
    buckets: [],
    gap: null,
    start: null,
    end: null,
    before: null,
    after: null,
    between: null,
    metadata: {},
  };

  if (!isRecord(raw)) {
    result.metadata.raw = raw;
    return result;
  }

  const counts = raw.counts;
  if (Array.isArray(counts)) {
    result.buckets = parseBucketList(counts);
  } else if (isRecord(counts)) {
    result.buckets = Object.entries(counts).map(([value, count]) => ({
      value,
      count: coerceInt(count),
      extra: {},
    }));
  }

  result.gap = raw.gap ?? null;
  result.start = raw.start ?? null;
  result.end = raw.end ?? null;
  if ('before' in raw) result.before = coerceInt(raw.before);
  if ('after' in raw) result.after = coerceInt(raw.after);
  if ('between' in raw) result.between = coerceInt(raw.between);

  for (const key of RANGE_METADATA_KEYS) {
    if (key in raw) {
      setEntry(result.metadata, key, raw[key]);
    }
  }

  return result;
}

function isFacetNode(value: unknown): value is JsonRecord {
  return isRecord(value) && ('buckets' in value || 'count' in value);
}

function missingCount(value: unknown): number | null {
  if (value === undefined || value === null) return null;
  return coerceInt(isRecord(value) ? value.count : value);
}

/**
 * Decode a JSON Facet API node; nested facets are recognised by their
 * `buckets` or `count` key, everything else is a metric
 */
export function parseJsonFacetNode(raw: JsonRecord): JsonFacetNode {
  const node: JsonFacetNode = {
    count: 'count' in raw ? coerceInt(raw.count) : null,
    missing: missingCount(raw.missing),
    buckets: [],
    metrics: {},
    facets: {},
  };

  if (Array.isArray(raw.buckets)) {
    for (const entry of raw.buckets) {
      if (!isRecord(entry)) continue;

      const bucket: JsonFacetBucket = {
        value: entry.val,
        count: coerceInt(entry.count),
        metrics: {},
        facets: {},
      };
      for (const [key, value] of Object.entries(entry)) {
        if (key === 'val' || key === 'count') continue;
        if (isFacetNode(value)) {
          setEntry(bucket.facets, key, parseJsonFacetNode(value));
        } else {
          setEntry(bucket.metrics, key, value);
        }
      }
      node.buckets.push(bucket);
    }
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'count' || key === 'missing' || key === 'buckets') continue;
    if (isFacetNode(value)) {
      setEntry(node.facets, key, parseJsonFacetNode(value));
    } else {
      setEntry(node.metrics, key, value);
    }
  }

  return node;
}

/**
 * Structured view of `facet_counts` and `facets`, or null when the payload
 * carries neither
 */
export function parseFacetResult(payload: JsonRecord): FacetResult | null {
  const classic = isRecord(payload.facet_counts) ? payload.facet_counts : null;
  const json = isRecord(payload.facets) ? payload.facets : null;

  if (classic === null && json === null) {
    return null;
  }

  const result: FacetResult = {
    queries: {},
    fields: {},
    ranges: {},
    intervals: {},
    pivots: {},
    heatmaps: {},
    jsonFacets: json === null ? null : parseJsonFacetNode(json),
  };

  if (classic !== null) {
    if (isRecord(classic.facet_queries)) {
      for (const [query, count] of Object.entries(classic.facet_queries)) {
        if (count !== null && count !== undefined) {
          setEntry(result.queries, query, coerceInt(count));
        }
      }
    }

    if (isRecord(classic.facet_fields)) {
      for (const [field, raw] of Object.entries(classic.facet_fields)) {
        setEntry(result.fields, field, parseFieldFacet(raw));
      }
    }

    if (isRecord(classic.facet_ranges)) {
      for (const [field, raw] of Object.entries(classic.facet_ranges)) {
        setEntry(result.ranges, field, parseRangeFacet(raw));
      }
    }

    if (isRecord(classic.facet_intervals)) result.intervals = classic.facet_intervals;
    if (isRecord(classic.facet_pivot)) result.pivots = classic.facet_pivot;
    if (isRecord(classic.facet_heatmaps)) result.heatmaps = classic.facet_heatmaps;
  }

  return result;
}
