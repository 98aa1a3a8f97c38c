import { ArrayNotEmpty, IsArray, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { CommonParamsOptions } from '../../params/common-params';
import { WireParams } from '../../params/wire-params';
import { formatLocalParams } from '../dense/local-params';
import { QueryParser } from '../query-parser';

export const TERMS_METHODS = [
  'termsFilter',
  'booleanQuery',
  'automaton',
  'docValuesTermsFilter',
  'docValuesTermsFilterPerSegment',
  'docValuesTermsFilterTopLevel',
] as const;
export type TermsMethod = (typeof TERMS_METHODS)[number];

export const MATCH_ALL_QUERY = '*:*';

export interface TermsQueryOptions extends CommonParamsOptions {
  field: string;
  terms: string[];
  /** Joins the terms, `,` when unset */
  separator?: string;
  /** docValues methods need docValues on the field */
  method?: TermsMethod;
  /** Main query, `*:*` when unset; the terms apply as a filter */
  query?: string;
}

/**
 * Match any of a list of terms in one field, e.g. a set of ids or tags.
 * https://solr.apache.org/guide/solr/latest/query-guide/other-parsers.html#terms-query-parser
 *
 * @example
 * new TermsQueryParser({ field: 'tags', terms: ['solr', 'lucene'] }).build();
 * // { q: '*:*', fq: ['{!terms f=tags}solr,lucene'] }
 */
export class TermsQueryParser extends QueryParser {
  @IsString()
  @IsNotEmpty()
  readonly field!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  readonly terms!: string[];

  @IsString()
  @IsNotEmpty()
  readonly separator!: string;

  @IsOptional()
  @IsIn(TERMS_METHODS)
  readonly method?: TermsMethod;

  @IsString()
  @IsNotEmpty()
  readonly query!: string;

  constructor(options: TermsQueryOptions) {
    const withDefaults: TermsQueryOptions = {
      ...options,
      separator: options.separator ?? ',',
      query: options.query ?? MATCH_ALL_QUERY,
    };
    super(withDefaults);
  }

  /**
   * `{!terms f=<field> method=<method>}<t1><sep><t2>...`
   */
  get termsFilter(): string {
    const entries: Array<[string, string]> = [['f', this.field]];
    if (this.method !== undefined) {
      entries.push(['method', this.method]);
    }
    if (this.separator !== ',') {
      entries.push(['separator', this.separator]);
    }
    return formatLocalParams('terms', entries, this.terms.join(this.separator));
  }

  protected flattenOwn(): WireParams {
    const filters = this.filters === undefined ? [] : [this.filters].flat();
    return { q: this.query, fq: [...filters, this.termsFilter] };
  }
}
