// src/core/http/types.ts

import type { OAuth2Context } from '../token/types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD';

export interface HttpConfig {
  timeout?: number; // Resource requests, milliseconds
  keepAlive?: boolean;
  userAgent?: string;
}

export interface TransportTimeouts {
  connectMs: number;
  readMs: number;
}

export interface FormPostRequest {
  headers: Record<string, string>;
  body: string; // Already form-url-encoded
  contentType: string;
  timeouts: TransportTimeouts;
}

// Raw token endpoint response; header names are lower-cased
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport used for token endpoint calls. Must hand back non-2xx responses
 * instead of raising, so the status can be inspected.
 */
export interface TokenTransport {
  postForm(uri: string, request: FormPostRequest): Promise<TransportResponse>;
}

export interface ResourceRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
  throwExceptions?: boolean; // Raise on missing tokens and on HTTP errors
}

export interface OAuth2Request extends ResourceRequest {
  oauth2?: OAuth2Context;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export type RequestExecutor<R> = (request: ResourceRequest) => Promise<R>;
