import 'reflect-metadata';

export * from './common/errors';
export * from './common/validation';
export * from './params';
export * from './parsers';
export * from './composition';
export * from './response';
export * from './client';
export { default as solrConfig, SolrConfig, toClientOptions } from './config/solr.config';
export * from './solr.module';
