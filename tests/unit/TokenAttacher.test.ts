// tests/unit/TokenAttacher.test.ts

import { describe, it, expect } from 'vitest';
import { TokenAttacher, withAccessToken } from '../../src/core/token/TokenAttacher';
import type { ResourceRequest } from '../../src/core/http/types';
import { ConfigurationError, UnknownTokenTypeError } from '../../src/utils/errors';

const resource: ResourceRequest = { method: 'GET', url: 'http://localhost:18080/some-resource' };

describe('TokenAttacher', () => {
  const attacher = new TokenAttacher();

  it('should send a bearer token in the Authorization header', () => {
    const { request, attached } = attacher.attach(resource, {
      accessToken: 'sesame',
      tokenType: 'bearer',
    });

    expect(attached).toBe(true);
    expect(request.headers).toEqual({ Authorization: 'Bearer sesame' });
    expect(request.query).toBeUndefined();
  });

  it('should match token types case-insensitively', () => {
    const { request } = attacher.attach(resource, { accessToken: 'sesame', tokenType: 'Bearer' });
    expect(request.headers).toEqual({ Authorization: 'Bearer sesame' });
  });

  it('should send the token as a query parameter when one is configured', () => {
    const { request } = attacher.attach(
      { ...resource, query: { fields: 'name' } },
      { accessToken: 'sesame', tokenType: 'bearer', queryParam: 'access_token' }
    );

    expect(request.query).toEqual({ fields: 'name', access_token: 'sesame' });
    expect(request.headers).toBeUndefined();
  });

  it('should use the OAuth scheme for draft-10 tokens', () => {
    const { request } = attacher.attach(resource, { accessToken: 'sesame', tokenType: 'draft-10' });
    expect(request.headers).toEqual({ Authorization: 'OAuth sesame' });
  });

  it('should keep existing headers', () => {
    const { request } = attacher.attach(
      { ...resource, headers: { Accept: 'application/json' } },
      { accessToken: 'sesame', tokenType: 'bearer' }
    );
    expect(request.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer sesame' });
  });

  it('should report nothing attached without an access token', () => {
    const result = attacher.attach(resource, { tokenType: 'bearer' });
    expect(result).toEqual({ request: resource, attached: false });
  });

  it('should pass unknown token types through untouched', () => {
    const result = attacher.attach(resource, { accessToken: 'sesame', tokenType: 'mac' });
    expect(result).toEqual({ request: resource, attached: false });
  });

  it('should reject unknown token types when throwExceptions is set', () => {
    expect(() =>
      attacher.attach(
        { ...resource, throwExceptions: true },
        { accessToken: 'sesame', tokenType: 'mac' }
      )
    ).toThrow(UnknownTokenTypeError);
    expect(() => attacher.attach({ ...resource, throwExceptions: true })).toThrow(
      'Unknown token type: none'
    );
  });

  it('should dispatch to registered token types', () => {
    const custom = new TokenAttacher().register('MAC', (request, oauth2) => ({
      request: { ...request, headers: { ...request.headers, Authorization: `MAC id="${oauth2.accessToken}"` } },
      attached: true,
    }));

    const { request } = custom.attach(resource, { accessToken: 'sesame', tokenType: 'mac' });
    expect(request.headers).toEqual({ Authorization: 'MAC id="sesame"' });
  });
});

describe('withAccessToken', () => {
  it('should add the token to the URI query', () => {
    expect(
      withAccessToken('http://localhost:18080/some-resource?x=1', {
        accessToken: 'sesame',
        queryParam: 'access_token',
      })
    ).toBe('http://localhost:18080/some-resource?x=1&access_token=sesame');
  });

  it('should require a query parameter', () => {
    expect(() =>
      withAccessToken('http://localhost:18080/some-resource', { accessToken: 'sesame' })
    ).toThrow(ConfigurationError);
  });
});
