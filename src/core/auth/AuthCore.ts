// src/core/auth/AuthCore.ts

import type {
  AuthRequest,
  EndpointConfig,
  ExchangeParams,
  ExpectedCallback,
  GrantStrategy,
} from './types';
import type { AccessToken, RefreshOptions } from '../token/types';
import type { TokenTransport } from '../http/types';
import type { LogWriter } from '../../observability/Logger';
import type { MetricsRecorder } from '../../observability/MetricsCollector';
import { buildAuthorizationRequest } from './AuthorizationRequestBuilder';
import { GrantStrategyRegistry, createDefaultGrantStrategies } from './GrantStrategy';
import { TokenRequestExecutor } from '../token/TokenRequestExecutor';
import { RefreshFlow } from '../token/RefreshFlow';
import { ProtocolError, StateMismatchError } from '../../utils/errors';

export interface AuthCoreDeps {
  transport: TokenTransport;
  logger: LogWriter;
  metrics?: MetricsRecorder;
  grants?: GrantStrategyRegistry;
}

/**
 * Token acquisition for one endpoint: the authorization redirect, the
 * callback exchange, and refresh.
 */
export class AuthCore {
  private grants: GrantStrategyRegistry;
  private executor: TokenRequestExecutor;
  private refreshFlow: RefreshFlow;
  private logger: LogWriter;

  constructor(
    private endpoint: EndpointConfig,
    deps: AuthCoreDeps
  ) {
    this.logger = deps.logger;
    this.grants = deps.grants ?? createDefaultGrantStrategies();
    this.executor = new TokenRequestExecutor(deps.transport, this.grants, deps.logger, deps.metrics);
    this.refreshFlow = new RefreshFlow(deps.transport, deps.logger, deps.metrics);
  }

  /**
   * Create the authorization request the user agent is redirected to
   */
  createAuthRequest(state?: string): AuthRequest {
    const authRequest = buildAuthorizationRequest(this.endpoint, state);
    this.logger.debug('Created authorization request', {
      state,
      scope: authRequest.scope,
    });
    return authRequest;
  }

  /**
   * Exchange callback parameters (or resource-owner credentials) for an
   * access token.
   *
   * A denial echoed back by the authorization server and a state that does
   * not match `expected.state` both fail without contacting the token
   * endpoint.
   *
   * @param params - Callback query parameters or credentials
   * @param expected - The state sent with the authorization request
   * @throws {ProtocolError} If the callback carries `error`, or the token endpoint fails
   * @throws {StateMismatchError} If the callback state differs from the expected one
   * @throws {ConfigurationError} If the endpoint lacks fields the grant needs
   */
  async getAccessToken(
    params: ExchangeParams = {},
    expected?: ExpectedCallback
  ): Promise<AccessToken> {
    if (params.error !== undefined) {
      this.logger.warn('Authorization denied by provider', { code: params.error });
      throw new ProtocolError(params.error_description ?? params.error, params.error, {
        stage: 'authorization',
      });
    }

    if (expected?.state !== undefined && params.state !== expected.state) {
      this.logger.warn('Callback state mismatch', { grantType: this.endpoint.grantType });
      throw new StateMismatchError(expected.state, params.state);
    }

    return this.executor.execute(this.endpoint, params);
  }

  /**
   * Refresh an access token
   *
   * @returns The new token, or undefined when the endpoint refuses and
   *   `options.throwOnError` is not set
   */
  async refreshAccessToken(
    refreshToken: string,
    options?: RefreshOptions
  ): Promise<AccessToken | undefined> {
    return this.refreshFlow.refresh(refreshToken, this.endpoint, options);
  }

  registerGrant(grantType: string, strategy: GrantStrategy): void {
    this.grants.register(grantType, strategy);
    this.logger.info('Grant type registered', { grantType });
  }

  getEndpointConfig(): EndpointConfig {
    return this.endpoint;
  }
}
