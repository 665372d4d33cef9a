// src/core/token/TokenAttacher.ts

import type { OAuth2Context } from './types';
import type { ResourceRequest } from '../http/types';
import { BEARER_TOKEN_TYPE, DRAFT10_TOKEN_TYPE } from './types';
import { ConfigurationError, UnknownTokenTypeError } from '../../utils/errors';

export interface AttachResult<R extends ResourceRequest> {
  request: R;
  attached: boolean;
}

export type TokenTypeVariant = <R extends ResourceRequest>(
  request: R,
  oauth2: OAuth2Context
) => AttachResult<R>;

/**
 * Variant for token types that travel either as a query parameter (when the
 * token names one) or in the Authorization header under `scheme`.
 */
export function headerOrQueryVariant(scheme: string): TokenTypeVariant {
  return (request, oauth2) => {
    const { accessToken, queryParam } = oauth2;
    if (accessToken === undefined) {
      return { request, attached: false };
    }

    if (queryParam !== undefined) {
      return {
        request: { ...request, query: { ...request.query, [queryParam]: accessToken } },
        attached: true,
      };
    }

    return {
      request: {
        ...request,
        headers: { ...request.headers, Authorization: `${scheme} ${accessToken}` },
      },
      attached: true,
    };
  };
}

export const bearerVariant = headerOrQueryVariant('Bearer');

// Legacy pre-RFC convention (Force.com): same placement, `OAuth` scheme
export const draft10Variant = headerOrQueryVariant('OAuth');

export const unknownTokenTypeVariant: TokenTypeVariant = (request, oauth2) => {
  if (request.throwExceptions === true) {
    throw new UnknownTokenTypeError(oauth2.tokenType);
  }
  return { request, attached: false };
};

/**
 * Token-type dispatch, keyed by lower-cased token type. The fallback variant
 * handles unknown and absent token types.
 */
export class TokenAttacher {
  private variants: Map<string, TokenTypeVariant> = new Map();

  constructor(private fallback: TokenTypeVariant = unknownTokenTypeVariant) {
    this.register(BEARER_TOKEN_TYPE, bearerVariant);
    this.register(DRAFT10_TOKEN_TYPE, draft10Variant);
  }

  register(tokenType: string, variant: TokenTypeVariant): this {
    this.variants.set(tokenType.toLowerCase(), variant);
    return this;
  }

  /**
   * Decorate a request with the token in `oauth2`
   *
   * @returns The decorated request, and whether a token was attached
   * @throws {UnknownTokenTypeError} For an unknown token type when the
   *   request sets throwExceptions
   */
  attach<R extends ResourceRequest>(request: R, oauth2: OAuth2Context = {}): AttachResult<R> {
    const key = oauth2.tokenType?.toLowerCase();
    const variant = (key !== undefined ? this.variants.get(key) : undefined) ?? this.fallback;
    return variant(request, oauth2);
  }
}

/**
 * Return `uri` with the access token set as the token's query parameter.
 *
 * @throws {ConfigurationError} If the token has no query parameter or no access token
 */
export function withAccessToken(uri: string, oauth2: OAuth2Context): string {
  const { accessToken, queryParam } = oauth2;
  if (queryParam === undefined || accessToken === undefined) {
    throw new ConfigurationError('withAccessToken needs a token with accessToken and queryParam', {
      hasAccessToken: accessToken !== undefined,
      queryParam,
    });
  }

  const url = new URL(uri);
  url.searchParams.set(queryParam, accessToken);
  return url.toString();
}
