import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { CommonParamsOptions } from '../../params/common-params';
import { ParamField, WireParams, flattenFields } from '../../params/wire-params';
import { QueryParser } from '../query-parser';

export const SPATIAL_SCORES = [
  'none',
  'kilometers',
  'miles',
  'degrees',
  'distance',
  'recipDistance',
  'overlapRatio',
  'area',
  'area2D',
] as const;
export type SpatialScore = (typeof SPATIAL_SCORES)[number];

/**
 * `[lat, lon]` for geographic fields, `[x, y]` otherwise
 */
export type Point = [number, number];

export interface SpatialQueryOptions extends CommonParamsOptions {
  /** Spatially indexed field (`sfield`) */
  spatialField: string;
  centerPoint: Point;
  /** Radius, in kilometers for geographic fields */
  radialDistance: number;
  score?: SpatialScore;
  /** `false` scores without filtering */
  filter?: boolean;
  cache?: boolean;
}

const SPATIAL_FIELDS: ReadonlyArray<ParamField<SpatialQueryParser>> = [
  { property: 'spatialField', wire: 'sfield' },
  { property: 'centerPoint', wire: 'pt', encoding: 'point' },
  { property: 'radialDistance', wire: 'd' },
  { property: 'score', wire: 'score' },
  { property: 'filter', wire: 'filter' },
  { property: 'cache', wire: 'cache' },
];

/**
 * Distance queries around a point.
 * https://solr.apache.org/guide/solr/latest/query-guide/spatial-search.html
 */
export abstract class SpatialQueryParser extends QueryParser {
  @IsString()
  @IsNotEmpty()
  readonly spatialField!: string;

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  readonly centerPoint!: Point;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  readonly radialDistance!: number;

  @IsOptional()
  @IsIn(SPATIAL_SCORES)
  readonly score?: SpatialScore;

  @IsOptional()
  @IsBoolean()
  readonly filter?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly cache?: boolean;

  constructor(options: SpatialQueryOptions) {
    super(options);
  }

  abstract get defType(): string;

  protected flattenOwn(): WireParams {
    return {
      defType: this.defType,
      ...flattenFields<SpatialQueryParser>(this, SPATIAL_FIELDS),
    };
  }
}
