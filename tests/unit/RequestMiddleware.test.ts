// tests/unit/RequestMiddleware.test.ts

import { describe, it, expect, vi } from 'vitest';
import { wrapOAuth2 } from '../../src/core/http/RequestMiddleware';
import type { ResourceRequest } from '../../src/core/http/types';
import { ProtocolError } from '../../src/utils/errors';
import { expectRejection } from '../helpers';

const url = 'http://localhost:18080/some-resource';

describe('wrapOAuth2', () => {
  it('should attach the token and strip the oauth2 field', async () => {
    const execute = vi.fn(async (request: ResourceRequest) => request);
    const request = wrapOAuth2(execute);

    await request({
      method: 'GET',
      url,
      oauth2: { accessToken: 'sesame', tokenType: 'bearer' },
    });

    expect(execute).toHaveBeenCalledWith({
      method: 'GET',
      url,
      headers: { Authorization: 'Bearer sesame' },
    });
  });

  it('should forward requests without a token untouched', async () => {
    const execute = vi.fn(async (request: ResourceRequest) => request);
    const request = wrapOAuth2(execute);

    await request({ method: 'GET', url });

    expect(execute).toHaveBeenCalledWith({ method: 'GET', url });
  });

  it('should reject a request with no token when throwExceptions is set', async () => {
    const execute = vi.fn(async (request: ResourceRequest) => request);
    const request = wrapOAuth2(execute);

    const error = await expectRejection(
      request({ method: 'GET', url, throwExceptions: true, oauth2: { tokenType: 'bearer' } }),
      ProtocolError
    );

    expect(error.message).toBe('Missing oauth2 params');
    expect(error.code).toBe('missing_oauth2_params');
    expect(execute).not.toHaveBeenCalled();
  });

  it('should return what the inner executor returns', async () => {
    const request = wrapOAuth2(async () => 'done');
    await expect(
      request({ method: 'POST', url, oauth2: { accessToken: 'sesame', tokenType: 'bearer' } })
    ).resolves.toBe('done');
  });
});
