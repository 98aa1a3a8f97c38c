import { IsInt, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import {
  IsStringOrNumber,
  IsStringOrStringArray,
  IsWeightMap,
} from '../../common/validation/decorators';
import { ParamField, WireParams, flattenFields } from '../../params/wire-params';
import { SparseQueryOptions, SparseQueryParser } from './sparse.parser';

export interface DisMaxQueryOptions extends SparseQueryOptions {
  /** Query used when `q` is blank (`q.alt`), in standard syntax */
  alternateQuery?: string;
  /** Searched fields with boosts, e.g. `{ title: 2, body: 1 }` */
  queryFields?: Record<string, number>;
  querySlop?: number;
  /** Minimum should match, e.g. `2`, `75%` or `2<-25% 9<-3` */
  minMatch?: string | number;
  phraseFields?: Record<string, number>;
  phraseSlop?: number;
  /** 0.0 is a pure disjunction max, 1.0 a pure sum */
  tieBreaker?: number;
  boostQueries?: string | string[];
  boostFunctions?: string | string[];
}

const DISMAX_FIELDS: ReadonlyArray<ParamField<DisMaxQueryParser>> = [
  { property: 'alternateQuery', wire: 'q.alt' },
  { property: 'queryFields', wire: 'qf', encoding: 'weighted' },
  { property: 'querySlop', wire: 'qs' },
  { property: 'minMatch', wire: 'mm' },
  { property: 'phraseFields', wire: 'pf', encoding: 'weighted' },
  { property: 'phraseSlop', wire: 'ps' },
  { property: 'tieBreaker', wire: 'tie' },
  { property: 'boostQueries', wire: 'bq', encoding: 'repeated' },
  { property: 'boostFunctions', wire: 'bf', encoding: 'repeated' },
];

/**
 * DisMax: simple user queries spread over several weighted fields.
 * https://solr.apache.org/guide/solr/latest/query-guide/dismax-query-parser.html
 */
export class DisMaxQueryParser extends SparseQueryParser {
  @IsOptional()
  @IsString()
  readonly alternateQuery?: string;

  @IsOptional()
  @IsWeightMap()
  readonly queryFields?: Record<string, number>;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly querySlop?: number;

  @IsOptional()
  @IsStringOrNumber()
  readonly minMatch?: string | number;

  @IsOptional()
  @IsWeightMap()
  readonly phraseFields?: Record<string, number>;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly phraseSlop?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  readonly tieBreaker?: number;

  @IsOptional()
  @IsStringOrStringArray()
  readonly boostQueries?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly boostFunctions?: string | string[];

  constructor(options: DisMaxQueryOptions) {
    super(options);
  }

  get defType(): string {
    return 'dismax';
  }

  protected flattenFamily(): WireParams {
    return flattenFields<DisMaxQueryParser>(this, DISMAX_FIELDS);
  }
}
