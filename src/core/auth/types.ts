// src/core/auth/types.ts

export interface EndpointConfig {
  clientId: string;
  clientSecret?: string;
  grantType?: string;
  authorizationUri?: string;
  accessTokenUri?: string;
  redirectUri?: string;
  scope?: string[];
  accessQueryParam?: string; // Carry the token as this query param instead of a header
  authorizationHeader?: boolean; // Send client credentials as HTTP Basic
  accessType?: string;
  prompt?: string[];
  includeGrantedScopes?: boolean;
  loginHint?: string;
}

export interface AuthRequest {
  uri: string;
  scope?: string[];
  state?: string;
}

/**
 * Parameters handed to the token exchange: the query of the redirect back
 * from the authorization server, or resource-owner credentials.
 */
export interface ExchangeParams {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
  username?: string;
  password?: string;
  [field: string]: string | undefined;
}

// What the caller expects the callback to echo back (usually its AuthRequest)
export interface ExpectedCallback {
  state?: string;
  scope?: string[];
}

// Token request under construction
export interface TokenRequest {
  headers: Record<string, string>;
  body: Record<string, string>;
}

export type GrantStrategy = (
  request: TokenRequest,
  endpoint: EndpointConfig,
  params: ExchangeParams
) => TokenRequest;
