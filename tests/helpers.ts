// tests/helpers.ts

import { vi } from 'vitest';
import type { EndpointConfig } from '../src/core/auth/types';
import type { FormPostRequest, TransportResponse } from '../src/core/http/types';

export const endpoint: EndpointConfig = {
  clientId: 'foo',
  clientSecret: 'bar',
  accessQueryParam: 'access_token',
  scope: ['foo', 'bar'],
};

export const endpointAuthCode: EndpointConfig = {
  ...endpoint,
  redirectUri: 'http://my.host/cb',
  grantType: 'authorization_code',
  authorizationUri: 'http://localhost:18080/auth',
  accessTokenUri: 'http://localhost:18080/token-auth-code',
};

export const endpointResourceOwner: EndpointConfig = {
  ...endpoint,
  grantType: 'password',
  accessTokenUri: 'http://localhost:18080/token-password',
};

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function jsonResponse(status: number, body: unknown): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/json; charset=UTF-8' },
    body: JSON.stringify(body),
  };
}

export function formResponse(status: number, body: Record<string, string>): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/x-www-form-urlencoded; charset=UTF-8' },
    body: new URLSearchParams(body).toString(),
  };
}

export function createFakeTransport(response: TransportResponse) {
  return {
    postForm: vi.fn(async (_uri: string, _request: FormPostRequest) => response),
  };
}

export function formFields(body: string): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body));
}

/**
 * Await a promise expected to reject with `type`, and hand back the error.
 */
export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected rejection with ${type.name}`);
}
