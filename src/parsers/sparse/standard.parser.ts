import { SparseQueryOptions, SparseQueryParser } from './sparse.parser';

export type StandardQueryOptions = SparseQueryOptions;

/**
 * Solr's default query parser (Lucene syntax).
 * https://solr.apache.org/guide/solr/latest/query-guide/standard-query-parser.html
 *
 * @example
 * new StandardQueryParser({
 *   query: 'title:mouse',
 *   rows: 5,
 *   facet: { fields: ['category'] },
 * }).build();
 * // { q: 'title:mouse', rows: 5, defType: 'lucene', facet: true, 'facet.field': ['category'] }
 */
export class StandardQueryParser extends SparseQueryParser {
  constructor(options: StandardQueryOptions) {
    super(options);
  }

  get defType(): string {
    return 'lucene';
  }
}
