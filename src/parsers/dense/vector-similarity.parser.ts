import { IsNumber, IsOptional } from 'class-validator';
import { DenseVectorQueryOptions, DenseVectorQueryParser } from './dense.parser';
import { LocalParamEntry } from './local-params';

export interface VectorSimilarityQueryOptions extends DenseVectorQueryOptions {
  /** Minimum similarity of a returned document */
  minReturn?: number;
  /** Minimum similarity for the graph walk to continue through a node */
  minTraverse?: number;
}

/**
 * Threshold based vector search: every document at least `minReturn`
 * similar to the query vector. Takes a vector source only.
 */
export class VectorSimilarityQueryParser extends DenseVectorQueryParser {
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  readonly minReturn?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  readonly minTraverse?: number;

  constructor(options: VectorSimilarityQueryOptions) {
    super(options);
  }

  get parserName(): string {
    return 'vectorSimilarity';
  }

  protected localParams(): LocalParamEntry[] {
    const entries: LocalParamEntry[] = [];
    if (this.minReturn !== undefined) entries.push(['minReturn', this.minReturn]);
    if (this.minTraverse !== undefined) entries.push(['minTraverse', this.minTraverse]);
    return entries;
  }
}
