import { IsBoolean, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { IsStringOrStringArray, IsWeightMap } from '../../common/validation/decorators';
import { ParamField, WireParams, flattenFields } from '../wire-params';
import { ParamsConfig } from './params-config';

export const INTERESTING_TERMS_MODES = ['none', 'list', 'details'] as const;
export type InterestingTermsMode = (typeof INTERESTING_TERMS_MODES)[number];

export interface MoreLikeThisOptions {
  /** Fields analysed for similarity; term vectors make this faster */
  fields?: string | string[];
  minTermFreq?: number;
  minDocFreq?: number;
  /** Use this or `maxDocFreqPct`, not both */
  maxDocFreq?: number;
  maxDocFreqPct?: number;
  minWordLen?: number;
  maxWordLen?: number;
  maxQueryTerms?: number;
  maxNumTokensParsed?: number;
  boost?: boolean;
  /** Per-field boosts, e.g. `{ title: 2, content: 1 }` */
  queryFields?: Record<string, number>;
  interestingTerms?: InterestingTermsMode;
  matchInclude?: boolean;
  matchOffset?: number;
}

const MLT_FIELDS: ReadonlyArray<ParamField<MoreLikeThisParamsConfig>> = [
  { property: 'fields', wire: 'fl', encoding: 'comma' },
  { property: 'minTermFreq', wire: 'mintf' },
  { property: 'minDocFreq', wire: 'mindf' },
  { property: 'maxDocFreq', wire: 'maxdf' },
  { property: 'maxDocFreqPct', wire: 'maxdfpct' },
  { property: 'minWordLen', wire: 'minwl' },
  { property: 'maxWordLen', wire: 'maxwl' },
  { property: 'maxQueryTerms', wire: 'maxqt' },
  { property: 'maxNumTokensParsed', wire: 'maxntp' },
  { property: 'boost', wire: 'boost' },
  { property: 'queryFields', wire: 'qf', encoding: 'weighted' },
  { property: 'interestingTerms', wire: 'interestingTerms' },
  { property: 'matchInclude', wire: 'match.include' },
  { property: 'matchOffset', wire: 'match.offset' },
];

/**
 * MoreLikeThis: documents similar to each result.
 * https://solr.apache.org/guide/solr/latest/query-guide/morelikethis.html
 */
export class MoreLikeThisParamsConfig extends ParamsConfig {
  @IsOptional()
  @IsStringOrStringArray()
  readonly fields?: string | string[];

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly minTermFreq?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly minDocFreq?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxDocFreq?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  readonly maxDocFreqPct?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly minWordLen?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxWordLen?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxQueryTerms?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxNumTokensParsed?: number;

  @IsOptional()
  @IsBoolean()
  readonly boost?: boolean;

  @IsOptional()
  @IsWeightMap()
  readonly queryFields?: Record<string, number>;

  @IsOptional()
  @IsIn(INTERESTING_TERMS_MODES)
  readonly interestingTerms?: InterestingTermsMode;

  @IsOptional()
  @IsBoolean()
  readonly matchInclude?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly matchOffset?: number;

  constructor(options: MoreLikeThisOptions = {}) {
    super(options);
  }

  get enableKey(): string {
    return 'mlt';
  }

  get namespace(): string {
    return 'mlt.';
  }

  protected flattenOptions(): WireParams {
    return flattenFields<MoreLikeThisParamsConfig>(this, MLT_FIELDS, this.namespace);
  }
}
