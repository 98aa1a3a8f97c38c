import { registerAs } from '@nestjs/config';
import { BasicAuth, BearerAuth, SolrAuth } from '../client/lib/auth';
import { SearchMethod, SolrClientOptions } from '../client/lib/client';

export interface SolrConfig {
  baseUrl: string;
  collection?: string;
  timeout: number;
  username?: string;
  password?: string;
  token?: string;
  searchMethod: SearchMethod;
}

const solrConfig = registerAs(
  'solr',
  (): SolrConfig => ({
    baseUrl: process.env.SOLR_URL || 'http://localhost:8983/solr',
    collection: process.env.SOLR_COLLECTION || undefined,
    timeout: parseInt(process.env.SOLR_TIMEOUT ?? '', 10) || 10000,
    // Basic auth when both are set
    username: process.env.SOLR_USERNAME || undefined,
    password: process.env.SOLR_PASSWORD || undefined,
    // Bearer token, preferred over basic auth
    token: process.env.SOLR_TOKEN || undefined,
    searchMethod: process.env.SOLR_SEARCH_METHOD?.toUpperCase() === 'POST' ? 'POST' : 'GET',
  }),
);

export default solrConfig;

function authFrom(config: SolrConfig): SolrAuth | undefined {
  if (config.token) {
    return new BearerAuth(config.token);
  }
  if (config.username && config.password) {
    return new BasicAuth(config.username, config.password);
  }
  return undefined;
}

/**
 * Client options for a loaded `solr` configuration
 */
export function toClientOptions(config: SolrConfig): SolrClientOptions {
  return {
    baseUrl: config.baseUrl,
    collection: config.collection,
    timeout: config.timeout,
    auth: authFrom(config),
    searchMethod: config.searchMethod,
  };
}
