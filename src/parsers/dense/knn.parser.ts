import { IsInt, Min } from 'class-validator';
import { DenseVectorQueryOptions, DenseVectorQueryParser, VectorSourceType } from './dense.parser';
import { LocalParamEntry } from './local-params';

export const DEFAULT_TOP_K = 10;

export interface KnnQueryOptions extends DenseVectorQueryOptions {
  /** Nearest neighbours to return, 10 when unset */
  topK?: number;
}

/**
 * K-nearest-neighbour search over an HNSW indexed DenseVectorField.
 *
 * A text source is encoded by Solr (`knn_text_to_vector`) before the search.
 *
 * @example
 * new KnnQueryParser({
 *   field: 'product_vector',
 *   source: { type: 'vector', vector: [1, 2, 4] },
 *   preFilter: 'inStock:true',
 * }).build();
 * // { q: '{!knn f=product_vector topK=10 preFilter=inStock:true}[1,2,4]' }
 */
export class KnnQueryParser extends DenseVectorQueryParser {
  @IsInt()
  @Min(1)
  readonly topK!: number;

  constructor(options: KnnQueryOptions) {
    const withDefaults: KnnQueryOptions = { ...options, topK: options.topK ?? DEFAULT_TOP_K };
    super(withDefaults);
  }

  get sourceTypes(): readonly VectorSourceType[] {
    return ['vector', 'text'];
  }

  get parserName(): string {
    return this.source.type === 'text' ? 'knn_text_to_vector' : 'knn';
  }

  protected localParams(): LocalParamEntry[] {
    const entries: LocalParamEntry[] = [];
    if (this.source.type === 'text') {
      entries.push(['model', this.source.model]);
    }
    entries.push(['topK', this.topK]);
    return entries;
  }
}
