import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsIn,
  IsInstance,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import {
  IsInOrEachIn,
  IsStringOrNumber,
  IsStringOrStringArray,
} from '../../common/validation/decorators';
import { copyOptions, validateModel } from '../../common/validation/validate-model';
import { ParamField, WireParams, encodeParamValue, flattenFields } from '../wire-params';
import { ParamsConfig } from './params-config';

export const FACET_SORTS = ['count', 'index'] as const;
export type FacetSort = (typeof FACET_SORTS)[number];

/**
 * enum: few distinct values, fc: many terms, fcs: per segment (single-valued strings)
 */
export const FACET_METHODS = ['enum', 'fc', 'fcs'] as const;
export type FacetMethod = (typeof FACET_METHODS)[number];

export const FACET_RANGE_OTHERS = ['before', 'after', 'between', 'none', 'all'] as const;
export type FacetRangeOther = (typeof FACET_RANGE_OTHERS)[number];

export const FACET_RANGE_INCLUDES = ['lower', 'upper', 'edge', 'outer', 'all'] as const;
export type FacetRangeInclude = (typeof FACET_RANGE_INCLUDES)[number];

export const FACET_RANGE_METHODS = ['filter', 'dv'] as const;
export type FacetRangeMethod = (typeof FACET_RANGE_METHODS)[number];

export interface FacetRangeOptions {
  field: string;
  start: string | number;
  end: string | number;
  /** e.g. `100` or `+1DAY` */
  gap: string | number;
  hardend?: boolean;
  other?: FacetRangeOther | FacetRangeOther[];
  include?: FacetRangeInclude | FacetRangeInclude[];
}

/**
 * One range facet. Written with per-field keys (`f.<field>.facet.range.*`)
 * so several ranges can be requested side by side.
 */
export class FacetRange implements FacetRangeOptions {
  @IsString()
  @IsNotEmpty()
  readonly field!: string;

  @IsStringOrNumber()
  readonly start!: string | number;

  @IsStringOrNumber()
  readonly end!: string | number;

  @IsStringOrNumber()
  readonly gap!: string | number;

  @IsOptional()
  @IsBoolean()
  readonly hardend?: boolean;

  @IsOptional()
  @IsInOrEachIn(FACET_RANGE_OTHERS)
  readonly other?: FacetRangeOther | FacetRangeOther[];

  @IsOptional()
  @IsInOrEachIn(FACET_RANGE_INCLUDES)
  readonly include?: FacetRangeInclude | FacetRangeInclude[];

  constructor(options: FacetRangeOptions) {
    Object.assign(this, copyOptions(options));
    validateModel(this, FacetRange.name);
    Object.freeze(this);
  }

  flatten(): WireParams {
    const prefix = `f.${this.field}.facet.range.`;

    return flattenFields<FacetRange>(
      this,
      [
        { property: 'start', wire: 'start' },
        { property: 'end', wire: 'end' },
        { property: 'gap', wire: 'gap' },
        { property: 'hardend', wire: 'hardend' },
        { property: 'other', wire: 'other', encoding: 'repeated' },
        { property: 'include', wire: 'include', encoding: 'repeated' },
      ],
      prefix,
    );
  }
}

export interface FacetOptions {
  /** Arbitrary queries to count (`facet.query`) */
  queries?: string | string[];
  /** Fields to facet on (`facet.field`) */
  fields?: string | string[];
  prefix?: string;
  contains?: string;
  containsIgnoreCase?: boolean;
  /** Regular expression the facet terms must match */
  matches?: string;
  sort?: FacetSort;
  /** -1 returns every term */
  limit?: number;
  offset?: number;
  mincount?: number;
  missing?: boolean;
  method?: FacetMethod;
  enumCacheMinDf?: number;
  exists?: boolean;
  excludeTerms?: string | string[];
  overrequestCount?: number;
  overrequestRatio?: number;
  threads?: number;
  /** Each entry is one pivot, e.g. `cat,inStock` */
  pivotFields?: string | string[];
  pivotMincount?: number;
  rangeHardend?: boolean;
  rangeMethod?: FacetRangeMethod;
  ranges?: Array<FacetRange | FacetRangeOptions>;
}

const FACET_FIELDS: ReadonlyArray<ParamField<FacetParamsConfig>> = [
  { property: 'queries', wire: 'query', encoding: 'repeated' },
  { property: 'fields', wire: 'field', encoding: 'repeated' },
  { property: 'prefix', wire: 'prefix' },
  { property: 'contains', wire: 'contains' },
  { property: 'containsIgnoreCase', wire: 'contains.ignoreCase' },
  { property: 'matches', wire: 'matches' },
  { property: 'sort', wire: 'sort' },
  { property: 'limit', wire: 'limit' },
  { property: 'offset', wire: 'offset' },
  { property: 'mincount', wire: 'mincount' },
  { property: 'missing', wire: 'missing' },
  { property: 'method', wire: 'method' },
  { property: 'enumCacheMinDf', wire: 'enum.cache.minDf' },
  { property: 'exists', wire: 'exists' },
  { property: 'excludeTerms', wire: 'excludeTerms', encoding: 'comma' },
  { property: 'overrequestCount', wire: 'overrequest.count' },
  { property: 'overrequestRatio', wire: 'overrequest.ratio' },
  { property: 'threads', wire: 'threads' },
  { property: 'pivotFields', wire: 'pivot', encoding: 'repeated' },
  { property: 'pivotMincount', wire: 'pivot.mincount' },
  { property: 'rangeHardend', wire: 'range.hardend' },
  { property: 'rangeMethod', wire: 'range.method' },
];

/**
 * Faceting: counts over field values, queries, pivots and ranges.
 * https://solr.apache.org/guide/solr/latest/query-guide/faceting.html
 *
 * @example
 * new FacetParamsConfig({
 *   fields: ['category', 'brand'],
 *   mincount: 1,
 *   ranges: [{ field: 'price', start: 0, end: 1000, gap: 100 }],
 * });
 */
export class FacetParamsConfig extends ParamsConfig {
  @IsOptional()
  @IsStringOrStringArray()
  readonly queries?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly fields?: string | string[];

  @IsOptional()
  @IsString()
  readonly prefix?: string;

  @IsOptional()
  @IsString()
  readonly contains?: string;

  @IsOptional()
  @IsBoolean()
  readonly containsIgnoreCase?: boolean;

  @IsOptional()
  @IsString()
  readonly matches?: string;

  @IsOptional()
  @IsIn(FACET_SORTS)
  readonly sort?: FacetSort;

  @IsOptional()
  @IsInt()
  @Min(-1)
  readonly limit?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly offset?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly mincount?: number;

  @IsOptional()
  @IsBoolean()
  readonly missing?: boolean;

  @IsOptional()
  @IsIn(FACET_METHODS)
  readonly method?: FacetMethod;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly enumCacheMinDf?: number;

  @IsOptional()
  @IsBoolean()
  readonly exists?: boolean;

  @IsOptional()
  @IsStringOrStringArray()
  readonly excludeTerms?: string | string[];

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly overrequestCount?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  readonly overrequestRatio?: number;

  @IsOptional()
  @IsInt()
  readonly threads?: number;

  @IsOptional()
  @IsStringOrStringArray()
  readonly pivotFields?: string | string[];

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly pivotMincount?: number;

  @IsOptional()
  @IsBoolean()
  readonly rangeHardend?: boolean;

  @IsOptional()
  @IsIn(FACET_RANGE_METHODS)
  readonly rangeMethod?: FacetRangeMethod;

  @IsOptional()
  @IsArray()
  @IsInstance(FacetRange, { each: true })
  @ArrayUnique((range: FacetRange) => range.field, { message: 'ranges must not repeat a field' })
  readonly ranges?: FacetRange[];

  constructor(options: FacetOptions = {}) {
    super({
      ...options,
      ranges: options.ranges?.map(range =>
        range instanceof FacetRange ? range : new FacetRange(range),
      ),
    });
  }

  get enableKey(): string {
    return 'facet';
  }

  get namespace(): string {
    return 'facet.';
  }

  protected flattenOptions(): WireParams {
    const params = flattenFields<FacetParamsConfig>(this, FACET_FIELDS, this.namespace);

    if (this.ranges && this.ranges.length > 0) {
      params['facet.range'] = encodeParamValue(
        'facet.range',
        this.ranges.map(range => range.field),
        'repeated',
      );
      for (const range of this.ranges) {
        Object.assign(params, range.flatten());
      }
    }

    return params;
  }
}
