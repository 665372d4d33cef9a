// src/core/token/RefreshFlow.ts

import type { EndpointConfig } from '../auth/types';
import type { TokenTransport } from '../http/types';
import type { AccessToken, RefreshOptions } from './types';
import type { LogWriter } from '../../observability/Logger';
import type { MetricsRecorder } from '../../observability/MetricsCollector';
import { interpretTokenResponse, toFormPostRequest } from './TokenRequestExecutor';
import { requireEndpointFields } from '../../config/ConfigValidator';
import { ProtocolError } from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';

export const REFRESH_TOKEN_GRANT = 'refresh_token';

export class RefreshFlow {
  constructor(
    private transport: TokenTransport,
    private logger: LogWriter,
    private metrics?: MetricsRecorder
  ) {}

  /**
   * Exchange a refresh token for a new access token.
   *
   * Client credentials always travel in the body here, whatever
   * `authorizationHeader` says. A failed refresh resolves to `undefined`
   * unless `throwOnError` is set, in which case the classified ProtocolError
   * is raised.
   *
   * @throws {ConfigurationError} If accessTokenUri or clientId is missing
   */
  async refresh(
    refreshToken: string,
    endpoint: EndpointConfig,
    options: RefreshOptions = {}
  ): Promise<AccessToken | undefined> {
    requireEndpointFields(endpoint, ['accessTokenUri', 'clientId'], 'token refresh');
    const { accessTokenUri, clientId, clientSecret } = endpoint;

    const body: Record<string, string> = { client_id: clientId };
    if (clientSecret !== undefined) body.client_secret = clientSecret;
    body.refresh_token = refreshToken;
    body.grant_type = REFRESH_TOKEN_GRANT;

    return withOAuthSpan('refresh', REFRESH_TOKEN_GRANT, async () => {
      const response = await this.transport.postForm(
        accessTokenUri,
        toFormPostRequest({ headers: {}, body })
      );

      let token: AccessToken;
      try {
        token = interpretTokenResponse(response, endpoint);
      } catch (error) {
        this.metrics?.incrementCounter('token_refresh_total', { status: 'failure' });

        if (options.throwOnError || !(error instanceof ProtocolError)) {
          throw error;
        }

        this.logger.warn('Token refresh failed, no token returned', {
          status: response.status,
          code: error.code,
        });
        return undefined;
      }

      this.metrics?.incrementCounter('token_refresh_total', { status: 'success' });
      this.logger.debug('Token refreshed', {
        tokenType: token.tokenType,
        rotated: token.refreshToken !== undefined,
      });

      // Providers that do not rotate refresh tokens keep the presented one valid
      return { ...token, refreshToken: token.refreshToken ?? refreshToken };
    });
  }
}
