import { FacetResult } from './facet-result.interface';

/**
 * What the transport hands to the decoder
 */
export interface SolrRawResponse {
  status: number;
  /** Parsed JSON, or the body text when it was not parsed yet */
  data: unknown;
}

/**
 * A document as returned by Solr, without a declared shape
 */
export type SolrRecord = Record<string, unknown>;

/**
 * `{ docId: { field: ['<em>snippet</em>'] } }`
 */
export type Highlighting = Record<string, Record<string, string[]>>;

export interface DocList<T> {
  numFound: number;
  start: number;
  docs: T[];
}

export interface ResultGroup<T> extends DocList<T> {
  groupValue: unknown;
}

/**
 * One `group.field`, `group.func` or `group.query` result
 */
export interface GroupCommandResult<T> {
  matches: number;
  /** Set when `group.ngroups=true` */
  ngroups: number | null;
  /** Field and function grouping */
  groups: ResultGroup<T>[];
  /** Query grouping and `group.format=simple` */
  doclist: DocList<T> | null;
}

export type GroupingResult<T> = Record<string, GroupCommandResult<T>>;

export interface MoreLikeThisMatch<T> extends DocList<T> {
  numFoundExact: boolean | null;
  interestingTerms: unknown;
}

/**
 * Similar documents keyed by the id of the result they belong to
 */
export type MoreLikeThisResult<T> = Record<string, MoreLikeThisMatch<T>>;

export interface SearchResult<T> {
  status: number;
  /** Milliseconds, as reported by Solr */
  queryTime: number;
  numFound: number;
  start: number;
  numFoundExact: boolean | null;
  maxScore: number | null;
  docs: T[];
  /** `facet_counts` exactly as returned */
  facetCounts: Record<string, unknown> | null;
  facets: FacetResult | null;
  highlighting: Highlighting | null;
  grouping: GroupingResult<T> | null;
  moreLikeThis: MoreLikeThisResult<T> | null;
  /** Whole decoded payload */
  raw: Record<string, unknown>;
}
