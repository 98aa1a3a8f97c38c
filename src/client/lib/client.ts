import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors/configuration.error';
import { SolrError } from '../../common/errors/solr.error';
import { QueryInput, composeParams } from '../../composition/compose-params';
import { WireParams } from '../../params/wire-params';
import {
  SearchResult,
  SolrRawResponse,
  SolrRecord,
} from '../../response/interfaces/search-result.interface';
import { decodeEnvelope, decodeSearchResponse } from '../../response/response-decoder';
import { DocumentShape, SolrDocument, serializeDocument } from '../../response/solr-document';
import { JsonRecord, coerceInt, isRecord } from '../../response/utils/json-value';
import { SolrAuth } from './auth';
import { AxiosTransport, HttpMethod, SolrTransport, TransportRequest } from './transport';

export type SearchMethod = HttpMethod;

/**
 * Solr client configuration options
 */
export interface SolrClientOptions {
  /** e.g. `http://localhost:8983/solr` */
  baseUrl: string;
  collection?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  auth?: SolrAuth;
  /** POST sends the search parameters as a form body, for long queries */
  searchMethod?: SearchMethod;
  /** Replaces the axios transport */
  transport?: SolrTransport;
}

export interface CreateCollectionOptions {
  numShards?: number;
  replicationFactor?: number;
  /** Configset to create the collection from */
  configName?: string;
  /** Further Collections API parameters */
  params?: WireParams;
}

export interface CommitOptions {
  /** Commit right after the update, `true` when unset */
  commit?: boolean;
}

export type DeleteTarget =
  | { query: string; ids?: never }
  | { ids: Array<string | number>; query?: never };

export interface SearchOptions {
  /** Extra request parameters; they win over the built query's */
  params?: WireParams;
}

/**
 * Status and timing from the `responseHeader` of an admin or update call
 */
export interface SolrResponseHeader {
  status: number;
  queryTime: number;
}

/**
 * Client for a Solr (cloud) installation: collection admin, indexing and
 * typed search
 */
export class SolrClient {
  private readonly logger = new Logger(SolrClient.name);
  private readonly transport: SolrTransport;
  private readonly searchMethod: SearchMethod;
  private collectionName?: string;

  /**
   * Create a new Solr client
   * @param options Client configuration options
   */
  constructor(options: SolrClientOptions) {
    const { baseUrl, collection, timeout, auth, searchMethod = 'GET', transport } = options;

    this.transport = transport ?? new AxiosTransport({ baseUrl, timeout, auth });
    this.searchMethod = searchMethod;
    if (collection !== undefined) {
      this.setCollection(collection);
    }
  }

  /**
   * Collection used by indexing and search calls
   */
  get collection(): string | undefined {
    return this.collectionName;
  }

  setCollection(name: string): void {
    if (name.trim().length === 0) {
      throw new ConfigurationError('Collection name must not be empty');
    }
    this.collectionName = name;
  }

  /**
   * Whether Solr answers with a healthy status. A failed call is logged and
   * reported as `false`.
   */
  async ping(): Promise<boolean> {
    try {
      const header = await this.sendAdmin('admin/info/system', {});
      return header.status === 0;
    } catch (error) {
      if (error instanceof SolrError) {
        this.logger.warn(`Ping failed: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Create a collection through the Collections API
   */
  async createCollection(
    name: string,
    options: CreateCollectionOptions = {},
  ): Promise<SolrResponseHeader> {
    const { numShards = 1, replicationFactor = 1, configName, params = {} } = options;

    this.logger.log(`Creating collection ${name}`);
    return this.sendAdmin('admin/collections', {
      action: 'CREATE',
      name,
      numShards,
      replicationFactor,
      ...(configName === undefined ? {} : { 'collection.configName': configName }),
      ...params,
    });
  }

  async deleteCollection(name: string): Promise<SolrResponseHeader> {
    this.logger.log(`Deleting collection ${name}`);
    return this.sendAdmin('admin/collections', { action: 'DELETE', name });
  }

  /**
   * Index documents. Typed documents are written with their additional
   * fields merged back in.
   */
  async add(
    documents: Array<SolrDocument | SolrRecord>,
    options: CommitOptions = {},
  ): Promise<SolrResponseHeader> {
    const { commit = true } = options;
    const collection = this.requireCollection('add');

    this.logger.debug(`Adding ${documents.length} document(s) to ${collection}`);
    return this.sendUpdate({
      method: 'POST',
      path: `${encodeURIComponent(collection)}/update/json/docs`,
      params: { commit, wt: 'json' },
      body: documents.map(document => serializeDocument(document)),
    });
  }

  /**
   * Delete by query or by ids; exactly one of the two
   */
  async delete(target: DeleteTarget, options: CommitOptions = {}): Promise<SolrResponseHeader> {
    const { commit = true } = options;
    const collection = this.requireCollection('delete');
    const { query, ids } = target;

    if ((query === undefined) === (ids === undefined)) {
      throw new ConfigurationError('Invalid delete', ['give either query or ids, not both']);
    }
    if (ids !== undefined && ids.length === 0) {
      throw new ConfigurationError('Invalid delete', ['ids must not be empty']);
    }

    return this.sendUpdate({
      method: 'POST',
      path: `${encodeURIComponent(collection)}/update`,
      params: { commit, wt: 'json' },
      body: { delete: ids ?? { query } },
    });
  }

  async commit(): Promise<SolrResponseHeader> {
    const collection = this.requireCollection('commit');

    return this.sendUpdate({
      method: 'GET',
      path: `${encodeURIComponent(collection)}/update`,
      params: { commit: true, wt: 'json' },
    });
  }

  /**
   * Run a query against the current collection.
   *
   * @example
   * const result = await client.search(
   *   new ExtendedDisMaxQueryParser({ query: 'laptop', queryFields: { title: 2, body: 1 } }),
   *   { documentShape: Product },
   * );
   */
  search(query: QueryInput, options?: SearchOptions): Promise<SearchResult<SolrRecord>>;
  search<T extends SolrDocument>(
    query: QueryInput,
    options: SearchOptions & { documentShape: DocumentShape<T> },
  ): Promise<SearchResult<T>>;
  async search<T extends SolrDocument>(
    query: QueryInput,
    options: SearchOptions & { documentShape?: DocumentShape<T> } = {},
  ): Promise<SearchResult<T> | SearchResult<SolrRecord>> {
    const collection = this.requireCollection('search');
    const params = composeParams(query, options.params);
    if (!('wt' in params)) {
      params.wt = 'json';
    }

    const path = `${encodeURIComponent(collection)}/select`;
    const raw = await this.send(
      this.searchMethod === 'POST'
        ? { method: 'POST', path, form: params }
        : { method: 'GET', path, params },
    );

    const { documentShape } = options;
    return documentShape === undefined
      ? decodeSearchResponse(raw)
      : decodeSearchResponse(raw, documentShape);
  }

  private requireCollection(operation: string): string {
    if (this.collectionName === undefined) {
      throw new ConfigurationError(`No collection set for ${operation}; call setCollection first`);
    }
    return this.collectionName;
  }

  private async send(request: TransportRequest): Promise<SolrRawResponse> {
    this.logger.debug(`${request.method} ${request.path}`);

    try {
      return await this.transport.send(request);
    } catch (error) {
      if (error instanceof SolrError) {
        this.logger.error(error.message);
      }
      throw error;
    }
  }

  private async sendAdmin(path: string, params: WireParams): Promise<SolrResponseHeader> {
    return this.sendUpdate({ method: 'GET', path, params: { ...params, wt: 'json' } });
  }

  private async sendUpdate(request: TransportRequest): Promise<SolrResponseHeader> {
    const payload = decodeEnvelope(await this.send(request));
    return readHeader(payload);
  }
}

function readHeader(payload: JsonRecord): SolrResponseHeader {
  const header: JsonRecord = isRecord(payload.responseHeader) ? payload.responseHeader : {};
  return {
    status: coerceInt(header.status),
    queryTime: coerceInt(header.QTime),
  };
}
