// src/core/auth/AuthorizationRequestBuilder.ts

import type { AuthRequest, EndpointConfig } from './types';
import { requireEndpointFields } from '../../config/ConfigValidator';
import { ConfigurationError } from '../../utils/errors';

/**
 * Build the URI the user agent is redirected to for approval.
 *
 * The authorization parameters are merged onto whatever query
 * `authorizationUri` already carries. `scope` and `prompt` are joined with
 * single spaces.
 *
 * @param endpoint - Endpoint configuration (needs authorizationUri and clientId)
 * @param state - Opaque anti-CSRF value the server echoes back on the callback
 * @throws {ConfigurationError} If authorizationUri or clientId is missing
 *
 * @example
 * ```typescript
 * const { uri } = buildAuthorizationRequest(endpoint, 'bazqux');
 * res.redirect(uri);
 * ```
 */
export function buildAuthorizationRequest(endpoint: EndpointConfig, state?: string): AuthRequest {
  requireEndpointFields(endpoint, ['authorizationUri', 'clientId'], 'authorization request');

  let url: URL;
  try {
    url = new URL(endpoint.authorizationUri);
  } catch {
    throw new ConfigurationError(`authorizationUri is not a valid URI: ${endpoint.authorizationUri}`, {
      authorizationUri: endpoint.authorizationUri,
    });
  }
  const query = url.searchParams;

  query.set('client_id', endpoint.clientId);
  if (endpoint.redirectUri !== undefined) {
    query.set('redirect_uri', endpoint.redirectUri);
  }
  query.set('response_type', 'code');

  if (state !== undefined) query.set('state', state);
  if (endpoint.accessType !== undefined) query.set('access_type', endpoint.accessType);
  if (endpoint.scope !== undefined) query.set('scope', endpoint.scope.join(' '));
  if (endpoint.prompt !== undefined) query.set('prompt', endpoint.prompt.join(' '));
  if (endpoint.includeGrantedScopes !== undefined) {
    query.set('include_granted_scopes', String(endpoint.includeGrantedScopes));
  }
  if (endpoint.loginHint !== undefined) query.set('login_hint', endpoint.loginHint);

  return {
    uri: url.toString(),
    scope: endpoint.scope,
    state,
  };
}
