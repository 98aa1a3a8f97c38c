import { KnnQueryOptions, KnnQueryParser } from './knn.parser';

export interface KnnTextToVectorQueryOptions extends Omit<KnnQueryOptions, 'source'> {
  /** Natural language query */
  text: string;
  /** Model name in the text-to-vector model store */
  model: string;
}

/**
 * KNN search from query text, encoded by a model configured in Solr.
 * https://solr.apache.org/guide/solr/latest/query-guide/text-to-vector.html
 */
export class KnnTextToVectorQueryParser extends KnnQueryParser {
  constructor(options: KnnTextToVectorQueryOptions) {
    const { text, model, ...rest } = options;
    super({ ...rest, source: { type: 'text', text, model } });
  }
}
