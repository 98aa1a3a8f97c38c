export * from './facet-result.interface';
export * from './search-result.interface';
