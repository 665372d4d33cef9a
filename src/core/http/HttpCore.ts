// src/core/http/HttpCore.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type {
  FormPostRequest,
  HttpConfig,
  HttpResponse,
  ResourceRequest,
  TokenTransport,
  TransportResponse,
} from './types';
import type { MetricsRecorder } from '../../observability/MetricsCollector';
import type { LogWriter } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_USER_AGENT = 'oauth2-request-client/1.0';
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

/**
 * axios-backed transport. Token endpoint calls go through `postForm`, which
 * returns every status as data; resource calls go through `request`.
 */
export class HttpCore implements TokenTransport {
  private axiosInstance: AxiosInstance;
  private userAgent: string;

  constructor(
    config: HttpConfig,
    private metrics: MetricsRecorder,
    private logger: LogWriter
  ) {
    const keepAlive = config.keepAlive ?? true;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
    });
  }

  async postForm(uri: string, request: FormPostRequest): Promise<TransportResponse> {
    const requestId = generateCorrelationId();

    this.logger.debug('Token endpoint request', {
      requestId,
      url: uri,
      headerKeys: Object.keys(request.headers),
    });

    return withHttpSpan('POST', uri, async () => {
      try {
        const response = await this.axiosInstance.request<string>({
          url: uri,
          method: 'POST',
          headers: {
            'X-Request-ID': requestId,
            'User-Agent': this.userAgent,
            ...request.headers,
            'Content-Type': request.contentType,
          },
          data: request.body,
          responseType: 'text',
          // axios has no separate connect timeout: readMs bounds the response,
          // the signal bounds the whole exchange
          timeout: request.timeouts.readMs,
          signal: AbortSignal.timeout(request.timeouts.connectMs + request.timeouts.readMs),
          validateStatus: () => true,
        });

        this.logger.debug('Token endpoint response', { requestId, status: response.status });

        return {
          status: response.status,
          headers: this.toHeaderRecord(response.headers),
          body: typeof response.data === 'string' ? response.data : '',
        };
      } catch (error) {
        throw this.transformError(error, uri);
      }
    });
  }

  async request<T = unknown>(request: ResourceRequest): Promise<HttpResponse<T>> {
    const requestId = generateCorrelationId();
    const method = request.method;

    this.logger.debug('HTTP request', {
      requestId,
      url: request.url,
      method,
      queryKeys: Object.keys(request.query ?? {}),
      headerKeys: Object.keys(request.headers ?? {}),
    });

    return withHttpSpan(method, request.url, async () => {
      const startTime = Date.now();

      try {
        const response = await this.axiosInstance.request<T>({
          url: request.url,
          method,
          headers: {
            'X-Request-ID': requestId,
            'User-Agent': this.userAgent,
            ...request.headers,
          },
          params: request.query,
          data: request.body,
          validateStatus:
            request.throwExceptions === true ? (status) => status < 400 : () => true,
        });

        const status = response.status.toString();
        this.metrics.incrementCounter('resource_requests_total', { method, status });
        this.metrics.recordLatency('resource_request_duration', Date.now() - startTime, {
          method,
          status,
        });

        return {
          data: response.data,
          status: response.status,
          headers: this.toHeaderRecord(response.headers),
        };
      } catch (error) {
        const status =
          isAxiosError(error) && error.response ? error.response.status.toString() : 'error';
        this.metrics.incrementCounter('resource_requests_total', { method, status });
        throw this.transformError(error, request.url);
      }
    });
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        record[key.toLowerCase()] = value.join(', ');
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!isAxiosError(error)) {
      return new NetworkError('Network error', {
        url,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
      });

      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { url });
      }
      return new ApiClientError(`Client error: ${status}`, status, {
        url,
        response: error.response.data,
      });
    }

    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError('Network error', { url, cause: error.message });
  }
}
