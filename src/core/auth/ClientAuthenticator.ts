// src/core/auth/ClientAuthenticator.ts

import type { EndpointConfig, TokenRequest } from './types';
import { requireEndpointFields } from '../../config/ConfigValidator';

export function basicAuthorization(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;
}

/**
 * Attach the client credentials to a token request: HTTP Basic when
 * `authorizationHeader` is set, `client_id`/`client_secret` body fields
 * otherwise. Never both.
 *
 * @throws {ConfigurationError} If clientId or clientSecret is missing
 */
export function authenticateClient(request: TokenRequest, endpoint: EndpointConfig): TokenRequest {
  requireEndpointFields(endpoint, ['clientId', 'clientSecret'], 'client authentication');
  const { clientId, clientSecret } = endpoint;

  if (endpoint.authorizationHeader === true) {
    return {
      ...request,
      headers: {
        ...request.headers,
        Authorization: basicAuthorization(clientId, clientSecret),
      },
    };
  }

  return {
    ...request,
    body: {
      ...request.body,
      client_id: clientId,
      client_secret: clientSecret,
    },
  };
}
