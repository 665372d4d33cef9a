// src/core/http/RequestMiddleware.ts

import type { OAuth2Request, RequestExecutor, ResourceRequest } from './types';
import { TokenAttacher } from '../token/TokenAttacher';
import { ProtocolError } from '../../utils/errors';

export const MISSING_OAUTH2_CODE = 'missing_oauth2_params';

const defaultAttacher = new TokenAttacher();

/**
 * Wrap a request executor so every call carries the token embedded under
 * `oauth2`. The `oauth2` field itself never reaches the inner executor.
 *
 * @example
 * ```typescript
 * const request = wrapOAuth2((req) => http.request(req));
 * await request({ method: 'GET', url, oauth2: token });
 * ```
 */
export function wrapOAuth2<R>(
  execute: RequestExecutor<R>,
  attacher: TokenAttacher = defaultAttacher
): (request: OAuth2Request) => Promise<R> {
  return async (request) => {
    const { oauth2, ...rest } = request;
    const outbound: ResourceRequest = rest;
    const { request: decorated, attached } = attacher.attach(outbound, oauth2);

    if (!attached && outbound.throwExceptions === true) {
      throw new ProtocolError('Missing oauth2 params', MISSING_OAUTH2_CODE, {
        url: outbound.url,
      });
    }

    return execute(decorated);
  };
}
