import axios, { AxiosInstance } from 'axios';
import { SolrError } from '../../common/errors/solr.error';
import { WireParams, encodeWireParams } from '../../params/wire-params';
import { SolrRawResponse } from '../../response/interfaces/search-result.interface';
import { SolrAuth } from './auth';

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  /** Relative to the Solr base URL, e.g. `products/select` */
  path: string;
  /** Query string */
  params?: WireParams;
  /** JSON body */
  body?: unknown;
  /** Form encoded body; takes the place of `body` */
  form?: WireParams;
}

/**
 * Sends one request and returns the status and body as received. A non-2xx
 * status is a normal result; only a missing response is an error.
 */
export interface SolrTransport {
  send(request: TransportRequest): Promise<SolrRawResponse>;
}

export interface AxiosTransportOptions {
  baseUrl: string;
  /** Milliseconds, 10000 when unset */
  timeout?: number;
  auth?: SolrAuth;
}

/**
 * {@link SolrTransport} over axios
 */
export class AxiosTransport implements SolrTransport {
  private readonly client: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    const { baseUrl, timeout = 10000, auth } = options;

    this.client = axios.create({
      baseURL: baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`,
      timeout,
      headers: {
        Accept: 'application/json',
        ...(auth && { Authorization: auth.authorizationHeader() }),
      },
      validateStatus: () => true,
    });
  }

  async send(request: TransportRequest): Promise<SolrRawResponse> {
    const { method, path, params, body, form } = request;

    try {
      const response = await this.client.request({
        method,
        url: path,
        params: params && encodeWireParams(params),
        data: form ? encodeWireParams(form) : body,
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SolrError(`No response from Solr for ${method} ${path}: ${reason}`);
    }
  }
}
