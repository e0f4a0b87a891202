import * as https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { TransportError, describeError } from '../errors';
import { logger } from '../utils/logger';
import { HeaderPair, HttpClient, HttpRequest, HttpResponse } from './types';

export interface AxiosHttpClientOptions {
  /** Skip TLS certificate verification. */
  insecure?: boolean;
  timeout?: number;
  /** Replaces the network layer, e.g. in tests. */
  adapter?: AxiosAdapter;
}

const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * `http://` is assumed for targets written without a scheme.
 */
export function normalizeTarget(target: string): string {
  if (SCHEME.test(target)) {
    return target;
  }
  if (target.startsWith('//')) {
    return `http:${target}`;
  }
  return `http://${target}`;
}

export class AxiosHttpClient implements HttpClient {
  private axiosInstance: AxiosInstance;

  constructor(options: AxiosHttpClientOptions = {}) {
    this.axiosInstance = axios.create({
      timeout: options.timeout ?? 30000,
      // every status is a response the handler script may want to test
      validateStatus: () => true,
      maxRedirects: 0,
      responseType: 'text',
      transformRequest: [data => data],
      transformResponse: [data => data],
      httpsAgent: new https.Agent({ rejectUnauthorized: !options.insecure }),
      adapter: options.adapter,
    });
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    const url = normalizeTarget(request.target);
    const config = this.prepareRequestConfig(request, url);

    logger.debug(`🌐 ${request.method} ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.request(config);
    } catch (error) {
      const code = axios.isAxiosError(error) && error.code ? ` (${error.code})` : '';
      throw new TransportError(`${request.method} ${url} failed${code}: ${describeError(error)}`, { cause: error });
    }

    logger.debug(`📥 ${response.status} ${response.statusText} from ${url}`);
    return this.createResponse(response);
  }

  private prepareRequestConfig(request: HttpRequest, url: string): AxiosRequestConfig {
    const headers: Record<string, string> = {};
    for (const [name, value] of request.headers) {
      const existing = Object.keys(headers).find(key => key.toLowerCase() === name.toLowerCase());
      if (existing === undefined) {
        headers[name] = value;
      } else {
        headers[existing] = `${headers[existing]}, ${value}`;
      }
    }

    const body = request.body?.trim();
    return {
      method: request.method,
      url,
      headers,
      data: body === undefined || body.length === 0 ? undefined : body,
    };
  }

  private createResponse(response: AxiosResponse<unknown>): HttpResponse {
    const headers: HeaderPair[] = [];
    for (const [name, raw] of Object.entries(response.headers)) {
      const value: unknown = raw;
      if (Array.isArray(value)) {
        value.forEach(item => headers.push([name, String(item)]));
      } else if (value !== undefined && value !== null) {
        headers.push([name, String(value)]);
      }
    }

    const body = typeof response.data === 'string' ? response.data : undefined;
    return {
      version: 'HTTP/1.1',
      statusCode: response.status,
      statusText: response.statusText,
      headers,
      body: body === undefined || body.length === 0 ? undefined : body,
    };
  }
}
