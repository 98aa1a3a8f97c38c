export * from './interfaces';
export * from './solr-document';
export * from './facet-result.parser';
export * from './grouping.parser';
export * from './response-decoder';
