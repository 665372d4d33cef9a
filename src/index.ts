// src/index.ts

export { OAuth2Client } from './client';
export type { ClientConfig, ClientOverrides, RequestOptions } from './client';

export { AuthCore } from './core/auth/AuthCore';
export type { AuthCoreDeps } from './core/auth/AuthCore';
export { buildAuthorizationRequest } from './core/auth/AuthorizationRequestBuilder';
export {
  GrantStrategyRegistry,
  createDefaultGrantStrategies,
  authorizationCodeGrant,
  passwordGrant,
  AUTHORIZATION_CODE_GRANT,
  PASSWORD_GRANT,
} from './core/auth/GrantStrategy';
export { authenticateClient, basicAuthorization } from './core/auth/ClientAuthenticator';
export type {
  EndpointConfig,
  AuthRequest,
  ExchangeParams,
  ExpectedCallback,
  TokenRequest,
  GrantStrategy,
} from './core/auth/types';

export {
  TokenRequestExecutor,
  interpretTokenResponse,
  toAccessToken,
  FORM_CONTENT_TYPE,
  TOKEN_ENDPOINT_TIMEOUTS,
} from './core/token/TokenRequestExecutor';
export {
  jsonDecoder,
  formDecoder,
  selectDecoder,
  resolveProviderError,
  toProtocolError,
} from './core/token/ResponseDecoder';
export type { ResponseDecoder } from './core/token/ResponseDecoder';
export { RefreshFlow, REFRESH_TOKEN_GRANT } from './core/token/RefreshFlow';
export {
  TokenAttacher,
  headerOrQueryVariant,
  bearerVariant,
  draft10Variant,
  unknownTokenTypeVariant,
  withAccessToken,
} from './core/token/TokenAttacher';
export type { AttachResult, TokenTypeVariant } from './core/token/TokenAttacher';
export { DRAFT10_TOKEN_TYPE, BEARER_TOKEN_TYPE } from './core/token/types';
export type {
  AccessToken,
  OAuth2Context,
  ProviderError,
  RefreshOptions,
  TokenResponseBody,
} from './core/token/types';

export { HttpCore } from './core/http/HttpCore';
export { wrapOAuth2, MISSING_OAUTH2_CODE } from './core/http/RequestMiddleware';
export type {
  HttpConfig,
  HttpMethod,
  HttpResponse,
  OAuth2Request,
  ResourceRequest,
  RequestExecutor,
  TokenTransport,
  TransportResponse,
  FormPostRequest,
  TransportTimeouts,
} from './core/http/types';

export {
  validateConfig,
  validateConfigSafe,
  requireEndpointFields,
  endpointConfigFromEnv,
} from './config/ConfigValidator';
export { Logger } from './observability/Logger';
export type { LoggerConfig, LogWriter } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig, MetricsRecorder } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  OAuth2ClientError,
  ConfigurationError,
  ProtocolError,
  StateMismatchError,
  UnknownTokenTypeError,
  ApiError,
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
} from './utils/errors';
