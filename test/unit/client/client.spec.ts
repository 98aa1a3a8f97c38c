import { Logger } from '@nestjs/common';
import { IsString } from 'class-validator';
import { SolrClient } from '../../../src/client/lib/client';
import { SolrTransport, TransportRequest } from '../../../src/client/lib/transport';
import { ConfigurationError } from '../../../src/common/errors/configuration.error';
import { SolrError } from '../../../src/common/errors/solr.error';
import { StandardQueryParser } from '../../../src/parsers/sparse/standard.parser';
import { SolrRawResponse } from '../../../src/response/interfaces/search-result.interface';
import { SolrDocument, decodeDocument } from '../../../src/response/solr-document';

class Product extends SolrDocument {
  @IsString()
  name!: string;
}

const OK: SolrRawResponse = { status: 200, data: { responseHeader: { status: 0, QTime: 2 } } };

describe('SolrClient', () => {
  let send: jest.Mock<Promise<SolrRawResponse>, [TransportRequest]>;
  let client: SolrClient;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    send = jest.fn<Promise<SolrRawResponse>, [TransportRequest]>();
    const transport: SolrTransport = { send };
    client = new SolrClient({ baseUrl: 'http://solr.test/solr', collection: 'products', transport });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Collection', () => {
    it('should use the collection given in the options', () => {
      expect(client.collection).toBe('products');
    });

    it('should switch collections', () => {
      client.setCollection('orders');

      expect(client.collection).toBe('orders');
    });

    it('should reject an empty collection name', () => {
      expect(() => client.setCollection(' ')).toThrow(ConfigurationError);
    });

    it('should refuse to search without a collection', async () => {
      const bare = new SolrClient({ baseUrl: 'http://solr.test/solr', transport: { send } });

      await expect(bare.search('*:*')).rejects.toThrow(
        'No collection set for search; call setCollection first',
      );
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('ping', () => {
    it('should report a healthy server', async () => {
      send.mockResolvedValueOnce(OK);

      await expect(client.ping()).resolves.toBe(true);
      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'admin/info/system',
        params: { wt: 'json' },
      });
    });

    it('should report an error status as unhealthy', async () => {
      send.mockResolvedValueOnce({ status: 500, data: { error: { msg: 'down' } } });

      await expect(client.ping()).resolves.toBe(false);
      expect(Logger.prototype.warn).toHaveBeenCalledWith('Ping failed: down');
    });

    it('should report a missing response as unhealthy', async () => {
      send.mockRejectedValueOnce(new SolrError('No response from Solr for GET admin/info/system'));

      await expect(client.ping()).resolves.toBe(false);
    });
  });

  describe('Collections API', () => {
    it('should create a collection', async () => {
      send.mockResolvedValueOnce(OK);

      const header = await client.createCollection('catalog', {
        numShards: 2,
        configName: '_default',
      });

      expect(header).toEqual({ status: 0, queryTime: 2 });
      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'admin/collections',
        params: {
          action: 'CREATE',
          name: 'catalog',
          numShards: 2,
          replicationFactor: 1,
          'collection.configName': '_default',
          wt: 'json',
        },
      });
    });

    it('should delete a collection', async () => {
      send.mockResolvedValueOnce(OK);

      await client.deleteCollection('catalog');

      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'admin/collections',
        params: { action: 'DELETE', name: 'catalog', wt: 'json' },
      });
    });
  });

  describe('Indexing', () => {
    it('should post documents and commit by default', async () => {
      send.mockResolvedValueOnce(OK);
      const product = decodeDocument(Product, { id: '1', name: 'Mouse', color: 'red' });

      await client.add([product, { id: '2', name: 'Pad' }]);

      expect(send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'products/update/json/docs',
        params: { commit: true, wt: 'json' },
        body: [
          { id: '1', name: 'Mouse', color: 'red' },
          { id: '2', name: 'Pad' },
        ],
      });
    });

    it('should delete by ids without committing', async () => {
      send.mockResolvedValueOnce(OK);

      await client.delete({ ids: ['1', '2'] }, { commit: false });

      expect(send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'products/update',
        params: { commit: false, wt: 'json' },
        body: { delete: ['1', '2'] },
      });
    });

    it('should delete by query', async () => {
      send.mockResolvedValueOnce(OK);

      await client.delete({ query: 'category:obsolete' });

      expect(send).toHaveBeenCalledWith(
        expect.objectContaining({ body: { delete: { query: 'category:obsolete' } } }),
      );
    });

    it('should reject a delete with both a query and ids', async () => {
      const target = JSON.parse('{"query": "*:*", "ids": ["1"]}');

      await expect(client.delete(target)).rejects.toThrow(ConfigurationError);
      expect(send).not.toHaveBeenCalled();
    });

    it('should commit', async () => {
      send.mockResolvedValueOnce(OK);

      await client.commit();

      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'products/update',
        params: { commit: true, wt: 'json' },
      });
    });
  });

  describe('search', () => {
    it('should send the built query and decode the result', async () => {
      send.mockResolvedValueOnce({
        status: 200,
        data: {
          responseHeader: { status: 0, QTime: 3 },
          response: { numFound: 1, start: 0, docs: [{ id: '1' }] },
        },
      });

      const result = await client.search(new StandardQueryParser({ query: 'title:mouse', rows: 5 }));

      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'products/select',
        params: { rows: 5, defType: 'lucene', q: 'title:mouse', wt: 'json' },
      });
      expect(result.numFound).toBe(1);
      expect(result.queryTime).toBe(3);
      expect(result.docs).toEqual([{ id: '1' }]);
    });

    it('should keep a response writer given by the caller', async () => {
      send.mockResolvedValueOnce({ status: 200, data: { response: { numFound: 0, start: 0, docs: [] } } });

      await client.search('*:*', { params: { wt: 'javabin' } });

      expect(send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'products/select',
        params: { q: '*:*', wt: 'javabin' },
      });
    });

    it('should send a form body when configured for POST', async () => {
      const poster = new SolrClient({
        baseUrl: 'http://solr.test/solr',
        collection: 'products',
        searchMethod: 'POST',
        transport: { send },
      });
      send.mockResolvedValueOnce({ status: 200, data: { response: { numFound: 0, start: 0, docs: [] } } });

      await poster.search('*:*');

      expect(send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'products/select',
        form: { q: '*:*', wt: 'json' },
      });
    });

    it('should decode documents into the requested class', async () => {
      send.mockResolvedValueOnce({
        status: 200,
        data: { response: { numFound: 1, start: 0, docs: [{ id: '1', name: 'Mouse' }] } },
      });

      const result = await client.search('*:*', { documentShape: Product });

      expect(result.docs[0]).toBeInstanceOf(Product);
      expect(result.docs[0].name).toBe('Mouse');
    });

    it('should raise the Solr error of a failed search', async () => {
      send.mockResolvedValueOnce({ status: 400, data: { error: { msg: 'undefined field foo' } } });

      await expect(client.search('foo:bar')).rejects.toMatchObject({
        name: 'SolrError',
        message: 'undefined field foo',
        statusCode: 400,
      });
    });

    it('should log and rethrow a missing response', async () => {
      const failure = new SolrError('No response from Solr for GET products/select: timeout');
      send.mockRejectedValueOnce(failure);

      await expect(client.search('*:*')).rejects.toBe(failure);
      expect(Logger.prototype.error).toHaveBeenCalledWith(failure.message);
    });
  });
});
