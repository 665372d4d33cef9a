// src/client.ts

import type { AuthRequest, EndpointConfig, ExchangeParams, ExpectedCallback, GrantStrategy } from './core/auth/types';
import type { AccessToken, OAuth2Context, RefreshOptions } from './core/token/types';
import type { HttpConfig, HttpMethod, HttpResponse, OAuth2Request, TokenTransport } from './core/http/types';
import type { TokenTypeVariant } from './core/token/TokenAttacher';
import { AuthCore } from './core/auth/AuthCore';
import { GrantStrategyRegistry } from './core/auth/GrantStrategy';
import { HttpCore } from './core/http/HttpCore';
import { wrapOAuth2 } from './core/http/RequestMiddleware';
import { TokenAttacher, withAccessToken } from './core/token/TokenAttacher';
import { Logger, LoggerConfig, LogWriter } from './observability/Logger';
import { MetricsCollector, MetricsConfig } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';

export interface ClientConfig {
  endpoint: EndpointConfig;
  http?: HttpConfig;
  logging?: LoggerConfig;
  metrics?: MetricsConfig;
}

// Collaborators a caller may substitute (tests, custom transports)
export interface ClientOverrides {
  transport?: TokenTransport;
  logger?: LogWriter;
  grants?: GrantStrategyRegistry;
  tokenTypes?: TokenAttacher;
}

export type RequestOptions = Omit<OAuth2Request, 'method' | 'url'>;

export class OAuth2Client {
  private auth: AuthCore;
  private http: HttpCore;
  private tokenTypes: TokenAttacher;
  private metrics: MetricsCollector;
  private logger: LogWriter;

  private constructor(config: ClientConfig, overrides: ClientOverrides) {
    // Build ALL dependencies FIRST
    this.logger = overrides.logger ?? new Logger(config.logging);
    this.metrics = new MetricsCollector(config.metrics);
    this.http = new HttpCore(config.http ?? {}, this.metrics, this.logger);
    this.tokenTypes = overrides.tokenTypes ?? new TokenAttacher();
    this.auth = new AuthCore(config.endpoint, {
      transport: overrides.transport ?? this.http,
      logger: this.logger,
      metrics: this.metrics,
      grants: overrides.grants,
    });
  }

  /**
   * Create a client for one OAuth2 endpoint
   *
   * @param config - Endpoint, HTTP, logging and metrics configuration
   * @param overrides - Optional replacement collaborators
   * @throws {ConfigurationError} If the configuration does not validate
   *
   * @example
   * ```typescript
   * const client = OAuth2Client.create({
   *   endpoint: {
   *     clientId: process.env.OAUTH2_CLIENT_ID,
   *     clientSecret: process.env.OAUTH2_CLIENT_SECRET,
   *     grantType: 'authorization_code',
   *     authorizationUri: 'https://auth.example.com/authorize',
   *     accessTokenUri: 'https://auth.example.com/token',
   *     redirectUri: 'http://localhost:3000/callback',
   *     scope: ['profile', 'email'],
   *   },
   *   logging: { level: 'debug' },
   * });
   * ```
   */
  static create(config: ClientConfig, overrides: ClientOverrides = {}): OAuth2Client {
    // Fail fast before anything is wired
    const validated = validateConfig(config);

    const client = new OAuth2Client(validated, overrides);
    client.logger.info('OAuth2 client created', {
      grantType: validated.endpoint.grantType,
      authorizationHeader: validated.endpoint.authorizationHeader === true,
    });
    return client;
  }

  /**
   * Build the authorization redirect
   *
   * @param state - Anti-CSRF value to check on the callback
   *
   * @example
   * ```typescript
   * const authRequest = client.authorizationRequest(crypto.randomUUID());
   * req.session.authRequest = authRequest;
   * res.redirect(authRequest.uri);
   * ```
   */
  authorizationRequest(state?: string): AuthRequest {
    return this.auth.createAuthRequest(state);
  }

  /**
   * Exchange callback parameters or credentials for an access token
   *
   * @param params - `{ code, state }` from the callback, or `{ username, password }`
   * @param expected - Usually the AuthRequest returned by authorizationRequest()
   * @throws {ProtocolError} If the provider denied access or the exchange failed
   * @throws {StateMismatchError} If the callback state is not the expected one
   */
  async getAccessToken(params?: ExchangeParams, expected?: ExpectedCallback): Promise<AccessToken> {
    return this.auth.getAccessToken(params, expected);
  }

  /**
   * Handle the authorization server's redirect back
   *
   * @example
   * ```typescript
   * app.get('/callback', async (req, res) => {
   *   const params = new URLSearchParams(req.url.split('?')[1]);
   *   const token = await client.handleCallback(params, req.session.authRequest);
   * });
   * ```
   */
  async handleCallback(params: URLSearchParams, expected?: ExpectedCallback): Promise<AccessToken> {
    return this.auth.getAccessToken(Object.fromEntries(params), expected);
  }

  /**
   * Exchange a refresh token for a new access token
   *
   * @returns The new token, or undefined if the endpoint refused (unless
   *   `throwOnError` is set)
   */
  async refreshAccessToken(
    refreshToken: string,
    options?: RefreshOptions
  ): Promise<AccessToken | undefined> {
    return this.auth.refreshAccessToken(refreshToken, options);
  }

  /**
   * Issue a request carrying the token embedded under `oauth2`
   *
   * @throws {UnknownTokenTypeError} Unknown token type with throwExceptions set
   * @throws {ProtocolError} No token attached with throwExceptions set
   * @throws {ApiError} HTTP error status with throwExceptions set
   */
  async request<T = unknown>(request: OAuth2Request): Promise<HttpResponse<T>> {
    const execute = wrapOAuth2((outbound) => this.http.request<T>(outbound), this.tokenTypes);
    return execute(request);
  }

  async get<T = unknown>(url: string, options?: RequestOptions): Promise<HttpResponse<T>> {
    return this.send<T>('GET', url, options);
  }

  async post<T = unknown>(url: string, options?: RequestOptions): Promise<HttpResponse<T>> {
    return this.send<T>('POST', url, options);
  }

  async put<T = unknown>(url: string, options?: RequestOptions): Promise<HttpResponse<T>> {
    return this.send<T>('PUT', url, options);
  }

  async delete<T = unknown>(url: string, options?: RequestOptions): Promise<HttpResponse<T>> {
    return this.send<T>('DELETE', url, options);
  }

  async head(url: string, options?: RequestOptions): Promise<HttpResponse<string>> {
    return this.send<string>('HEAD', url, options);
  }

  /**
   * Return `uri` carrying the token as its configured query parameter
   */
  withAccessToken(uri: string, token: OAuth2Context): string {
    return withAccessToken(uri, token);
  }

  registerGrant(grantType: string, strategy: GrantStrategy): void {
    this.auth.registerGrant(grantType, strategy);
  }

  registerTokenType(tokenType: string, variant: TokenTypeVariant): void {
    this.tokenTypes.register(tokenType, variant);
    this.logger.info('Token type registered', { tokenType });
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  private async send<T>(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...options, method, url });
  }
}
