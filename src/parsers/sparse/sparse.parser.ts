import { IsBoolean, IsIn, IsInstance, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { CommonParamsOptions } from '../../params/common-params';
import { FacetOptions, FacetParamsConfig } from '../../params/configs/facet.config';
import { GroupOptions, GroupParamsConfig } from '../../params/configs/group.config';
import { HighlightOptions, HighlightParamsConfig } from '../../params/configs/highlight.config';
import {
  MoreLikeThisOptions,
  MoreLikeThisParamsConfig,
} from '../../params/configs/more-like-this.config';
import { ParamsConfig } from '../../params/configs/params-config';
import { ParamField, WireParams, flattenFields } from '../../params/wire-params';
import { QueryParser } from '../query-parser';

export const QUERY_OPERATORS = ['AND', 'OR'] as const;
export type QueryOperator = (typeof QUERY_OPERATORS)[number];

export interface SparseQueryOptions extends CommonParamsOptions {
  /** Main query (`q`) */
  query: string;
  queryOperator?: QueryOperator;
  defaultField?: string;
  splitOnWhitespace?: boolean;
  facet?: FacetParamsConfig | FacetOptions;
  group?: GroupParamsConfig | GroupOptions;
  highlight?: HighlightParamsConfig | HighlightOptions;
  moreLikeThis?: MoreLikeThisParamsConfig | MoreLikeThisOptions;
}

const SPARSE_FIELDS: ReadonlyArray<ParamField<SparseQueryParser>> = [
  { property: 'query', wire: 'q' },
  { property: 'queryOperator', wire: 'q.op' },
  { property: 'defaultField', wire: 'df' },
  { property: 'splitOnWhitespace', wire: 'sow' },
];

/**
 * Replace plain feature options with constructed (validated) blocks
 */
export function normalizeFeatures<T extends SparseQueryOptions>(options: T): T {
  const { facet, group, highlight, moreLikeThis } = options;

  return {
    ...options,
    facet:
      facet === undefined || facet instanceof FacetParamsConfig
        ? facet
        : new FacetParamsConfig(facet),
    group:
      group === undefined || group instanceof GroupParamsConfig
        ? group
        : new GroupParamsConfig(group),
    highlight:
      highlight === undefined || highlight instanceof HighlightParamsConfig
        ? highlight
        : new HighlightParamsConfig(highlight),
    moreLikeThis:
      moreLikeThis === undefined || moreLikeThis instanceof MoreLikeThisParamsConfig
        ? moreLikeThis
        : new MoreLikeThisParamsConfig(moreLikeThis),
  };
}

/**
 * Text (inverted index) query parsers: lucene, dismax and edismax.
 *
 * Feature blocks attached here are written after the family fields, each
 * with its enable switch set.
 */
export abstract class SparseQueryParser extends QueryParser {
  @IsString()
  @IsNotEmpty()
  readonly query!: string;

  @IsOptional()
  @IsIn(QUERY_OPERATORS)
  readonly queryOperator?: QueryOperator;

  @IsOptional()
  @IsString()
  readonly defaultField?: string;

  @IsOptional()
  @IsBoolean()
  readonly splitOnWhitespace?: boolean;

  @IsOptional()
  @IsInstance(FacetParamsConfig)
  readonly facet?: FacetParamsConfig;

  @IsOptional()
  @IsInstance(GroupParamsConfig)
  readonly group?: GroupParamsConfig;

  @IsOptional()
  @IsInstance(HighlightParamsConfig)
  readonly highlight?: HighlightParamsConfig;

  @IsOptional()
  @IsInstance(MoreLikeThisParamsConfig)
  readonly moreLikeThis?: MoreLikeThisParamsConfig;

  constructor(options: SparseQueryOptions) {
    const normalized = normalizeFeatures(options);
    super(normalized);
  }

  /**
   * Value of `defType`
   */
  abstract get defType(): string;

  /**
   * Attached feature blocks, in output order
   */
  get features(): ParamsConfig[] {
    const blocks: Array<ParamsConfig | undefined> = [
      this.facet,
      this.group,
      this.highlight,
      this.moreLikeThis,
    ];
    return blocks.filter((block): block is ParamsConfig => block !== undefined);
  }

  protected flattenOwn(): WireParams {
    const params: WireParams = {
      defType: this.defType,
      ...flattenFields<SparseQueryParser>(this, SPARSE_FIELDS),
      ...this.flattenFamily(),
    };

    for (const block of this.features) {
      Object.assign(params, block.flatten());
    }

    return params;
  }

  /**
   * Fields of a concrete parser beyond the shared sparse ones
   */
  protected flattenFamily(): WireParams {
    return {};
  }
}
