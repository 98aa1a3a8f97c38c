import axios from 'axios';
import { BasicAuth, BearerAuth } from '../../../src/client/lib/auth';
import { AxiosTransport } from '../../../src/client/lib/transport';
import { SolrError } from '../../../src/common/errors/solr.error';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('AxiosTransport', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    (mockedAxios.create as jest.Mock).mockReturnValue(mockedAxios);
  });

  describe('Initialization', () => {
    it('should create an axios instance with defaults', () => {
      new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      expect(mockedAxios.create).toHaveBeenCalledWith({
        baseURL: 'http://solr.test/solr/',
        timeout: 10000,
        headers: { Accept: 'application/json' },
        validateStatus: expect.any(Function),
      });
    });

    it('should send a bearer token', () => {
      new AxiosTransport({
        baseUrl: 'http://solr.test/solr/',
        timeout: 5000,
        auth: new BearerAuth('test-token'),
      });

      expect(mockedAxios.create).toHaveBeenCalledWith({
        baseURL: 'http://solr.test/solr/',
        timeout: 5000,
        headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
        validateStatus: expect.any(Function),
      });
    });

    it('should send basic credentials', () => {
      expect(new BasicAuth('solr-user', 'test-secret').authorizationHeader()).toBe(
        'Basic c29sci11c2VyOnRlc3Qtc2VjcmV0',
      );
    });
  });

  describe('send', () => {
    it('should send query params and return the raw response', async () => {
      mockedAxios.request.mockResolvedValueOnce({ status: 200, data: { ok: true } });
      const transport = new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      const response = await transport.send({
        method: 'GET',
        path: 'products/select',
        params: { q: '*:*', fq: ['a:1', 'b:2'] },
      });

      expect(response).toEqual({ status: 200, data: { ok: true } });
      const [config] = mockedAxios.request.mock.calls[0];
      expect(config.method).toBe('GET');
      expect(config.url).toBe('products/select');
      expect(config.data).toBeUndefined();
      expect(String(config.params)).toBe('q=*%3A*&fq=a%3A1&fq=b%3A2');
    });

    it('should return an error status as a response', async () => {
      mockedAxios.request.mockResolvedValueOnce({ status: 404, data: 'Not Found' });
      const transport = new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      await expect(transport.send({ method: 'GET', path: 'missing/select' })).resolves.toEqual({
        status: 404,
        data: 'Not Found',
      });
    });

    it('should encode a form body', async () => {
      mockedAxios.request.mockResolvedValueOnce({ status: 200, data: {} });
      const transport = new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      await transport.send({ method: 'POST', path: 'products/select', form: { q: 'a b', rows: 5 } });

      const [config] = mockedAxios.request.mock.calls[0];
      expect(config.params).toBeUndefined();
      expect(String(config.data)).toBe('q=a+b&rows=5');
    });

    it('should send a JSON body as is', async () => {
      mockedAxios.request.mockResolvedValueOnce({ status: 200, data: {} });
      const transport = new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      await transport.send({ method: 'POST', path: 'products/update', body: { delete: ['1'] } });

      const [config] = mockedAxios.request.mock.calls[0];
      expect(config.data).toEqual({ delete: ['1'] });
    });

    it('should wrap a missing response in a SolrError', async () => {
      mockedAxios.request.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
      const transport = new AxiosTransport({ baseUrl: 'http://solr.test/solr' });

      const failure = transport.send({ method: 'GET', path: 'products/select' });

      await expect(failure).rejects.toThrow(SolrError);
      await expect(failure).rejects.toThrow(
        'No response from Solr for GET products/select: connect ECONNREFUSED',
      );
    });
  });
});
