import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { IsStringOrStringArray } from '../../common/validation/decorators';
import { ParamField, WireParams, flattenFields } from '../wire-params';
import { ParamsConfig } from './params-config';

export const GROUP_FORMATS = ['grouped', 'simple'] as const;
export type GroupFormat = (typeof GROUP_FORMATS)[number];

export interface GroupOptions {
  /** Field(s) to group by; must be single-valued and indexed */
  by?: string | string[];
  /** Group by a function query (not supported in SolrCloud) */
  func?: string;
  /** One group per query */
  query?: string | string[];
  /** Documents per group, -1 for all */
  limit?: number;
  offset?: number;
  /** Sort within each group */
  sort?: string;
  format?: GroupFormat;
  main?: boolean;
  ngroups?: boolean;
  truncate?: boolean;
  facet?: boolean;
  /** 0 disables the grouping cache */
  cachePercent?: number;
}

const GROUP_FIELDS: ReadonlyArray<ParamField<GroupParamsConfig>> = [
  { property: 'by', wire: 'field', encoding: 'repeated' },
  { property: 'func', wire: 'func' },
  { property: 'query', wire: 'query', encoding: 'repeated' },
  { property: 'limit', wire: 'limit' },
  { property: 'offset', wire: 'offset' },
  { property: 'sort', wire: 'sort' },
  { property: 'format', wire: 'format' },
  { property: 'main', wire: 'main' },
  { property: 'ngroups', wire: 'ngroups' },
  { property: 'truncate', wire: 'truncate' },
  { property: 'facet', wire: 'facet' },
  { property: 'cachePercent', wire: 'cache.percent' },
];

/**
 * Result grouping (field collapsing).
 * https://solr.apache.org/guide/solr/latest/query-guide/result-grouping.html
 */
export class GroupParamsConfig extends ParamsConfig {
  @IsOptional()
  @IsStringOrStringArray()
  readonly by?: string | string[];

  @IsOptional()
  @IsString()
  readonly func?: string;

  @IsOptional()
  @IsStringOrStringArray()
  readonly query?: string | string[];

  @IsOptional()
  @IsInt()
  @Min(-1)
  readonly limit?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly offset?: number;

  @IsOptional()
  @IsString()
  readonly sort?: string;

  @IsOptional()
  @IsIn(GROUP_FORMATS)
  readonly format?: GroupFormat;

  @IsOptional()
  @IsBoolean()
  readonly main?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly ngroups?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly truncate?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly facet?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  readonly cachePercent?: number;

  constructor(options: GroupOptions = {}) {
    super(options);
  }

  get enableKey(): string {
    return 'group';
  }

  get namespace(): string {
    return 'group.';
  }

  protected flattenOptions(): WireParams {
    return flattenFields<GroupParamsConfig>(this, GROUP_FIELDS, this.namespace);
  }
}
