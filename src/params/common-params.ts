import { IsBoolean, IsIn, IsInt, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { IsInOrEachIn, IsStringOrStringArray } from '../common/validation/decorators';
import { copyOptions, validateModel } from '../common/validation/validate-model';
import { ParamField, WireParams, flattenFields } from './wire-params';

export const DEBUG_OPTIONS = ['query', 'timing', 'results', 'all', true] as const;
export type DebugOption = (typeof DEBUG_OPTIONS)[number];

export const ECHO_PARAMS_OPTIONS = ['explicit', 'all', 'none'] as const;
export type EchoParams = (typeof ECHO_PARAMS_OPTIONS)[number];

/**
 * Options shared by every query parser.
 * https://solr.apache.org/guide/solr/latest/query-guide/common-query-parameters.html
 */
export interface CommonParamsOptions {
  /** e.g. `score desc`, `price asc` */
  sort?: string;
  start?: number;
  rows?: number;
  /** Filter queries (`fq`) */
  filters?: string | string[];
  /** Returned fields (`fl`); Solr returns `*` when unset */
  fieldList?: string | string[];
  debug?: DebugOption | DebugOption[];
  explainOther?: string;
  /** Search time budget in milliseconds, enforced by Solr */
  timeAllowed?: number;
  cpuAllowed?: number;
  /** MiB */
  memAllowed?: number;
  maxHitsAllowed?: number;
  partialResults?: boolean;
  segmentTerminateEarly?: boolean;
  multiThreaded?: boolean;
  omitHeader?: boolean;
  /** Response writer (`wt`) */
  writerType?: string;
  echoParams?: EchoParams;
  logParamsList?: string | string[];
  minExactCount?: number;
  canCancel?: boolean;
  queryUuid?: string;
}

const COMMON_FIELDS: ReadonlyArray<ParamField<CommonParams>> = [
  { property: 'sort', wire: 'sort' },
  { property: 'start', wire: 'start' },
  { property: 'rows', wire: 'rows' },
  { property: 'filters', wire: 'fq', encoding: 'repeated' },
  { property: 'fieldList', wire: 'fl', encoding: 'comma' },
  { property: 'debug', wire: 'debug', encoding: 'repeated' },
  { property: 'explainOther', wire: 'explainOther' },
  { property: 'timeAllowed', wire: 'timeAllowed' },
  { property: 'cpuAllowed', wire: 'cpuAllowed' },
  { property: 'memAllowed', wire: 'memAllowed' },
  { property: 'maxHitsAllowed', wire: 'maxHitsAllowed' },
  { property: 'partialResults', wire: 'partialResults' },
  { property: 'segmentTerminateEarly', wire: 'segmentTerminateEarly' },
  { property: 'multiThreaded', wire: 'multiThreaded' },
  { property: 'omitHeader', wire: 'omitHeader' },
  { property: 'writerType', wire: 'wt' },
  { property: 'echoParams', wire: 'echoParams' },
  { property: 'logParamsList', wire: 'logParamsList', encoding: 'comma' },
  { property: 'minExactCount', wire: 'minExactCount' },
  { property: 'canCancel', wire: 'canCancel' },
  { property: 'queryUuid', wire: 'queryUUID' },
];

/**
 * Paging, sorting, filtering and limits common to all parsers.
 *
 * Instances are validated and frozen on construction; only the fields that
 * were explicitly given are written by {@link CommonParams.flatten}.
 */
export class CommonParams implements CommonParamsOptions {
  @IsOptional()
  @IsString()
  readonly sort?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly start?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly rows?: number;

  @IsOptional()
  @IsStringOrStringArray()
  readonly filters?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly fieldList?: string | string[];

  @IsOptional()
  @IsInOrEachIn(DEBUG_OPTIONS)
  readonly debug?: DebugOption | DebugOption[];

  @IsOptional()
  @IsString()
  readonly explainOther?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly timeAllowed?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly cpuAllowed?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  readonly memAllowed?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxHitsAllowed?: number;

  @IsOptional()
  @IsBoolean()
  readonly partialResults?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly segmentTerminateEarly?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly multiThreaded?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly omitHeader?: boolean;

  @IsOptional()
  @IsString()
  readonly writerType?: string;

  @IsOptional()
  @IsIn(ECHO_PARAMS_OPTIONS)
  readonly echoParams?: EchoParams;

  @IsOptional()
  @IsStringOrStringArray()
  readonly logParamsList?: string | string[];

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly minExactCount?: number;

  @IsOptional()
  @IsBoolean()
  readonly canCancel?: boolean;

  @IsOptional()
  @IsString()
  readonly queryUuid?: string;

  constructor(options: CommonParamsOptions = {}) {
    Object.assign(this, copyOptions(options));
    validateModel(this, this.constructor.name);
    Object.freeze(this);
  }

  /**
   * Common parameters under their wire keys (`fq`, `fl`, `timeAllowed`, ...)
   */
  flatten(): WireParams {
    return flattenFields<CommonParams>(this, COMMON_FIELDS);
  }
}
