// src/core/token/types.ts

/**
 * Token type assumed when the provider omits `token_type`.
 *
 * Some legacy providers (Force.com among them) answer without a token type and
 * expect the pre-RFC `OAuth` header scheme, so this is a compatibility shim
 * rather than anything the OAuth2 RFC defines.
 */
export const DRAFT10_TOKEN_TYPE = 'draft-10';

export const BEARER_TOKEN_TYPE = 'bearer';

export interface AccessToken {
  accessToken: string;
  tokenType: string;
  queryParam?: string;
  refreshToken?: string;
  params: Record<string, unknown>; // Every other field the provider returned
}

// Token-carrying view of an AccessToken, as embedded in outbound requests
export interface OAuth2Context {
  accessToken?: string;
  tokenType?: string;
  queryParam?: string;
}

// Decoded token endpoint body
export type TokenResponseBody = Record<string, unknown>;

/**
 * Provider error, resolved once at decode time. Most providers send a string
 * `error` with `error_description`; Facebook-style providers nest an object
 * carrying `type` and `message`.
 */
export type ProviderError =
  | { kind: 'standard'; code: string; description?: string }
  | { kind: 'nested'; type?: string; message?: string };

export interface RefreshOptions {
  throwOnError?: boolean; // Raise ProtocolError instead of resolving to undefined
}
