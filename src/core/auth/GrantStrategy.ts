// src/core/auth/GrantStrategy.ts

import type { EndpointConfig, ExchangeParams, GrantStrategy, TokenRequest } from './types';
import { ConfigurationError } from '../../utils/errors';

export const AUTHORIZATION_CODE_GRANT = 'authorization_code';
export const PASSWORD_GRANT = 'password';

function withBodyFields(request: TokenRequest, fields: Record<string, string | undefined>): TokenRequest {
  const body = { ...request.body };
  for (const [key, value] of Object.entries(fields)) {
    // Absent values are left for the token endpoint to reject
    if (value !== undefined) body[key] = value;
  }
  return { ...request, body };
}

export const authorizationCodeGrant: GrantStrategy = (request, endpoint, params) => {
  const missing = [
    ...(params.code === undefined ? ['code'] : []),
    ...(endpoint.redirectUri === undefined ? ['redirectUri'] : []),
  ];
  if (missing.length > 0) {
    throw new ConfigurationError(
      `authorization_code grant requires ${missing.join(' and ')}`,
      { grantType: AUTHORIZATION_CODE_GRANT, missing }
    );
  }

  return withBodyFields(request, {
    code: params.code,
    redirect_uri: endpoint.redirectUri,
  });
};

export const passwordGrant: GrantStrategy = (request, _endpoint, params) =>
  withBodyFields(request, {
    username: params.username,
    password: params.password,
  });

/**
 * Grant-type dispatch. New grants are registered by name without touching
 * the existing strategies.
 *
 * @example
 * ```typescript
 * grants.register('client_credentials', (request) => request);
 * ```
 */
export class GrantStrategyRegistry {
  private strategies: Map<string, GrantStrategy> = new Map();

  constructor(initial: Record<string, GrantStrategy> = {}) {
    for (const [grantType, strategy] of Object.entries(initial)) {
      this.register(grantType, strategy);
    }
  }

  register(grantType: string, strategy: GrantStrategy): this {
    this.strategies.set(grantType, strategy);
    return this;
  }

  has(grantType: string): boolean {
    return this.strategies.has(grantType);
  }

  /**
   * Add the grant-specific body fields to a token request
   *
   * @throws {ConfigurationError} If the grant type is not registered, or the
   *   strategy's own preconditions fail
   */
  prepare(request: TokenRequest, endpoint: EndpointConfig, params: ExchangeParams): TokenRequest {
    const grantType = endpoint.grantType ?? '';
    const strategy = this.strategies.get(grantType);
    if (!strategy) {
      throw new ConfigurationError(`Unsupported grant type: ${grantType}`, { grantType });
    }
    return strategy(request, endpoint, params);
  }
}

export function createDefaultGrantStrategies(): GrantStrategyRegistry {
  return new GrantStrategyRegistry({
    [AUTHORIZATION_CODE_GRANT]: authorizationCodeGrant,
    [PASSWORD_GRANT]: passwordGrant,
  });
}
