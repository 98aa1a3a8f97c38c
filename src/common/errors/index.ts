export { ConfigurationError } from './configuration.error';
export { SerializationError } from './serialization.error';
export { SolrError, SolrDecodeError } from './solr.error';
