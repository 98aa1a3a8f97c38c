import { IsBoolean, IsInt, IsOptional, Min } from 'class-validator';
import { IsStringOrStringArray, IsWeightMap } from '../../common/validation/decorators';
import { ParamField, WireParams, flattenFields } from '../../params/wire-params';
import { DisMaxQueryOptions, DisMaxQueryParser } from './dismax.parser';

export interface ExtendedDisMaxQueryOptions extends DisMaxQueryOptions {
  minMatchAutoRelax?: boolean;
  lowercaseOperators?: boolean;
  /** Word-pair phrase boosts (`pf2`) */
  phraseFieldsBigram?: Record<string, number>;
  phraseSlopBigram?: number;
  /** Word-triplet phrase boosts (`pf3`) */
  phraseFieldsTrigram?: Record<string, number>;
  phraseSlopTrigram?: number;
  stopwords?: boolean;
  /** Fields users may name explicitly, e.g. `['title', '-secret']` or `'*'` */
  userFields?: string | string[];
  /** Multiplicative boost functions */
  boost?: string | string[];
}

const EDISMAX_FIELDS: ReadonlyArray<ParamField<ExtendedDisMaxQueryParser>> = [
  { property: 'minMatchAutoRelax', wire: 'mm.autoRelax' },
  { property: 'lowercaseOperators', wire: 'lowercaseOperators' },
  { property: 'phraseFieldsBigram', wire: 'pf2', encoding: 'weighted' },
  { property: 'phraseSlopBigram', wire: 'ps2' },
  { property: 'phraseFieldsTrigram', wire: 'pf3', encoding: 'weighted' },
  { property: 'phraseSlopTrigram', wire: 'ps3' },
  { property: 'stopwords', wire: 'stopwords' },
  { property: 'userFields', wire: 'uf', encoding: 'space' },
  { property: 'boost', wire: 'boost', encoding: 'repeated' },
];

/**
 * Extended DisMax: DisMax plus full Lucene syntax, field aliasing and
 * shingled phrase boosts.
 * https://solr.apache.org/guide/solr/latest/query-guide/edismax-query-parser.html
 */
export class ExtendedDisMaxQueryParser extends DisMaxQueryParser {
  @IsOptional()
  @IsBoolean()
  readonly minMatchAutoRelax?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly lowercaseOperators?: boolean;

  @IsOptional()
  @IsWeightMap()
  readonly phraseFieldsBigram?: Record<string, number>;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly phraseSlopBigram?: number;

  @IsOptional()
  @IsWeightMap()
  readonly phraseFieldsTrigram?: Record<string, number>;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly phraseSlopTrigram?: number;

  @IsOptional()
  @IsBoolean()
  readonly stopwords?: boolean;

  @IsOptional()
  @IsStringOrStringArray()
  readonly userFields?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly boost?: string | string[];

  constructor(options: ExtendedDisMaxQueryOptions) {
    super(options);
  }

  get defType(): string {
    return 'edismax';
  }

  protected flattenFamily(): WireParams {
    return {
      ...super.flattenFamily(),
      ...flattenFields<ExtendedDisMaxQueryParser>(this, EDISMAX_FIELDS),
    };
  }
}
