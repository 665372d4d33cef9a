// src/core/token/TokenRequestExecutor.ts

import type { EndpointConfig, ExchangeParams, TokenRequest } from '../auth/types';
import type { FormPostRequest, TokenTransport, TransportResponse, TransportTimeouts } from '../http/types';
import type { AccessToken, TokenResponseBody } from './types';
import type { LogWriter } from '../../observability/Logger';
import type { MetricsRecorder } from '../../observability/MetricsCollector';
import { DRAFT10_TOKEN_TYPE } from './types';
import { GrantStrategyRegistry } from '../auth/GrantStrategy';
import { authenticateClient } from '../auth/ClientAuthenticator';
import { resolveProviderError, selectDecoder, toProtocolError } from './ResponseDecoder';
import { requireEndpointFields } from '../../config/ConfigValidator';
import { ProtocolError } from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

// Fixed for every token endpoint call; callers cannot override them
export const TOKEN_ENDPOINT_TIMEOUTS: Readonly<TransportTimeouts> = Object.freeze({
  connectMs: 10000,
  readMs: 10000,
});

export function toFormPostRequest(request: TokenRequest): FormPostRequest {
  return {
    headers: request.headers,
    body: new URLSearchParams(request.body).toString(),
    contentType: FORM_CONTENT_TYPE,
    timeouts: { ...TOKEN_ENDPOINT_TIMEOUTS },
  };
}

/**
 * Shape a successful token endpoint body into an AccessToken. Everything but
 * `access_token` and `token_type` stays available under `params`.
 *
 * @throws {ProtocolError} If the body carries no access_token
 */
export function toAccessToken(body: TokenResponseBody, endpoint: EndpointConfig): AccessToken {
  const { access_token: accessToken, token_type: tokenType, ...params } = body;

  if (typeof accessToken !== 'string') {
    throw new ProtocolError('Token endpoint response lacks access_token', 'invalid_response');
  }

  const refreshToken = body.refresh_token;
  return {
    accessToken,
    tokenType: typeof tokenType === 'string' ? tokenType : DRAFT10_TOKEN_TYPE,
    queryParam: endpoint.accessQueryParam,
    refreshToken: typeof refreshToken === 'string' ? refreshToken : undefined,
    params,
  };
}

/**
 * Decode a token endpoint response and classify it.
 *
 * @throws {ProtocolError} When the body carries `error` or the status is not 200
 */
export function interpretTokenResponse(
  response: TransportResponse,
  endpoint: EndpointConfig
): AccessToken {
  const decoder = selectDecoder(response.headers['content-type']);

  let body: TokenResponseBody;
  try {
    body = decoder.decode(response.body);
  } catch (error) {
    // An undecodable error page is still just a failed request
    if (response.status !== 200) {
      throw toProtocolError(undefined, response.status);
    }
    throw error;
  }

  const providerError = resolveProviderError(body);
  if (providerError || response.status !== 200) {
    throw toProtocolError(providerError, response.status);
  }

  return toAccessToken(body, endpoint);
}

export class TokenRequestExecutor {
  constructor(
    private transport: TokenTransport,
    private grants: GrantStrategyRegistry,
    private logger: LogWriter,
    private metrics?: MetricsRecorder
  ) {}

  /**
   * Build the form POST for the token endpoint: grant fields first, then
   * client authentication.
   *
   * @throws {ConfigurationError} Before any network call, when the endpoint
   *   or the grant lacks a required field
   */
  buildRequest(endpoint: EndpointConfig, params: ExchangeParams): FormPostRequest {
    requireEndpointFields(endpoint, ['accessTokenUri', 'grantType'], 'token request');

    let request: TokenRequest = {
      headers: {},
      body: { grant_type: endpoint.grantType },
    };
    request = this.grants.prepare(request, endpoint, params);
    request = authenticateClient(request, endpoint);

    return toFormPostRequest(request);
  }

  /**
   * Exchange the grant for an access token
   *
   * @throws {ConfigurationError} If the endpoint is incomplete (no request is sent)
   * @throws {ProtocolError} If the token endpoint reports a failure
   */
  async execute(endpoint: EndpointConfig, params: ExchangeParams): Promise<AccessToken> {
    requireEndpointFields(endpoint, ['accessTokenUri', 'grantType'], 'token request');
    const request = this.buildRequest(endpoint, params);
    const { accessTokenUri, grantType } = endpoint;

    return withOAuthSpan('exchange', grantType, async () => {
      const startTime = Date.now();
      const response = await this.transport.postForm(accessTokenUri, request);

      try {
        const token = interpretTokenResponse(response, endpoint);

        this.record(grantType, 'success', startTime);
        this.logger.debug('Token exchange successful', {
          grantType,
          tokenType: token.tokenType,
          hasRefreshToken: token.refreshToken !== undefined,
          paramKeys: Object.keys(token.params),
        });

        return token;
      } catch (error) {
        this.record(grantType, 'failure', startTime);
        this.logger.warn('Token exchange failed', {
          grantType,
          status: response.status,
          code: error instanceof ProtocolError ? error.code : undefined,
        });
        throw error;
      }
    });
  }

  private record(grantType: string, status: string, startTime: number): void {
    this.metrics?.incrementCounter('token_requests_total', { grant_type: grantType, status });
    this.metrics?.recordLatency('token_request_duration', Date.now() - startTime, {
      grant_type: grantType,
      status,
    });
  }
}
