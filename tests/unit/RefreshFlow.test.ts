// tests/unit/RefreshFlow.test.ts

import { describe, it, expect, vi } from 'vitest';
import { RefreshFlow } from '../../src/core/token/RefreshFlow';
import { ConfigurationError, NetworkError, ProtocolError } from '../../src/utils/errors';
import {
  createFakeTransport,
  createMockLogger,
  endpointAuthCode,
  expectRejection,
  jsonResponse,
} from '../helpers';

describe('RefreshFlow', () => {
  it('should post the refresh grant with body credentials', async () => {
    const transport = createFakeTransport(
      jsonResponse(200, { access_token: 'sesame-2', token_type: 'bearer', refresh_token: 'new-foo' })
    );
    const flow = new RefreshFlow(transport, createMockLogger());

    const token = await flow.refresh('old-foo', { ...endpointAuthCode, authorizationHeader: true });

    const [uri, request] = transport.postForm.mock.calls[0];
    expect(uri).toBe('http://localhost:18080/token-auth-code');
    expect(request.body).toBe(
      'client_id=foo&client_secret=bar&refresh_token=old-foo&grant_type=refresh_token'
    );
    expect(request.headers).toEqual({});
    expect(token?.accessToken).toBe('sesame-2');
    expect(token?.refreshToken).toBe('new-foo');
  });

  it('should omit client_secret when none is configured', async () => {
    const transport = createFakeTransport(jsonResponse(200, { access_token: 'sesame-2' }));
    const flow = new RefreshFlow(transport, createMockLogger());

    await flow.refresh('old-foo', { ...endpointAuthCode, clientSecret: undefined });

    expect(transport.postForm.mock.calls[0][1].body).toBe(
      'client_id=foo&refresh_token=old-foo&grant_type=refresh_token'
    );
  });

  it('should keep the presented refresh token when none is rotated in', async () => {
    const flow = new RefreshFlow(
      createFakeTransport(jsonResponse(200, { access_token: 'sesame-2', token_type: 'bearer' })),
      createMockLogger()
    );

    const token = await flow.refresh('old-foo', endpointAuthCode);

    expect(token?.refreshToken).toBe('old-foo');
  });

  it('should resolve to undefined when the endpoint refuses', async () => {
    const logger = createMockLogger();
    const metrics = { incrementCounter: vi.fn(), recordLatency: vi.fn() };
    const flow = new RefreshFlow(
      createFakeTransport(jsonResponse(400, { error: 'invalid_grant' })),
      logger,
      metrics
    );

    const token = await flow.refresh('old-foo', endpointAuthCode);

    expect(token).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Token refresh failed, no token returned', {
      status: 400,
      code: 'invalid_grant',
    });
    expect(metrics.incrementCounter).toHaveBeenCalledWith('token_refresh_total', {
      status: 'failure',
    });
  });

  it('should raise the refusal when throwOnError is set', async () => {
    const flow = new RefreshFlow(
      createFakeTransport(jsonResponse(400, { error: 'invalid_grant' })),
      createMockLogger()
    );

    const error = await expectRejection(
      flow.refresh('old-foo', endpointAuthCode, { throwOnError: true }),
      ProtocolError
    );
    expect(error.code).toBe('invalid_grant');
  });

  it('should propagate transport failures', async () => {
    const transport = {
      postForm: vi.fn(async () => {
        throw new NetworkError('Network error', { url: 'http://localhost:18080/token-auth-code' });
      }),
    };
    const flow = new RefreshFlow(transport, createMockLogger());

    await expectRejection(flow.refresh('old-foo', endpointAuthCode), NetworkError);
  });

  it('should require a token endpoint', async () => {
    const transport = createFakeTransport(jsonResponse(200, { access_token: 'sesame-2' }));
    const flow = new RefreshFlow(transport, createMockLogger());

    await expectRejection(
      flow.refresh('old-foo', { ...endpointAuthCode, accessTokenUri: undefined }),
      ConfigurationError
    );
    expect(transport.postForm).not.toHaveBeenCalled();
  });
});
