// src/core/token/ResponseDecoder.ts

import { z } from 'zod';
import type { ProviderError, TokenResponseBody } from './types';
import { ProtocolError } from '../../utils/errors';

export interface ResponseDecoder {
  readonly format: 'json' | 'form';
  decode(body: string): TokenResponseBody;
}

export const jsonDecoder: ResponseDecoder = {
  format: 'json',
  decode(body: string): TokenResponseBody {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new ProtocolError('Token endpoint returned malformed JSON', 'invalid_response', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const result = z.record(z.unknown()).safeParse(parsed);
    if (!result.success) {
      throw new ProtocolError('Token endpoint response is not a JSON object', 'invalid_response');
    }
    return result.data;
  },
};

// Facebook-style providers answer with a form-urlencoded body
export const formDecoder: ResponseDecoder = {
  format: 'form',
  decode(body: string): TokenResponseBody {
    return Object.fromEntries(new URLSearchParams(body));
  },
};

/**
 * Content negotiation: JSON for `application/json` and `text/javascript`
 * (the latter another Facebook-ism), form-urlencoded for everything else,
 * including a missing content type.
 */
export function selectDecoder(contentType: string | undefined): ResponseDecoder {
  if (
    contentType !== undefined &&
    (contentType.startsWith('application/json') || contentType.startsWith('text/javascript'))
  ) {
    return jsonDecoder;
  }
  return formDecoder;
}

const NestedErrorSchema = z.object({
  type: z.string().optional(),
  message: z.string().optional(),
});

/**
 * Resolve the `error` field of a decoded body, if any.
 */
export function resolveProviderError(body: TokenResponseBody): ProviderError | undefined {
  const error = body.error;
  if (error === undefined || error === null) {
    return undefined;
  }

  if (typeof error === 'string') {
    const description = body.error_description;
    return {
      kind: 'standard',
      code: error,
      description: typeof description === 'string' ? description : undefined,
    };
  }

  const nested = NestedErrorSchema.safeParse(error);
  return nested.success ? { kind: 'nested', ...nested.data } : { kind: 'nested' };
}

export const GENERIC_TOKEN_ERROR_MESSAGE = 'error requesting access token';
export const UNKNOWN_ERROR_CODE = 'unknown';

/**
 * Turn a provider error (or a bare non-200 status) into a ProtocolError.
 */
export function toProtocolError(
  providerError: ProviderError | undefined,
  status: number
): ProtocolError {
  const details = { status };

  if (!providerError) {
    return new ProtocolError(GENERIC_TOKEN_ERROR_MESSAGE, UNKNOWN_ERROR_CODE, details);
  }

  switch (providerError.kind) {
    case 'standard':
      return new ProtocolError(
        providerError.description ?? providerError.code,
        providerError.code,
        details
      );
    case 'nested':
      return new ProtocolError(
        providerError.message ?? GENERIC_TOKEN_ERROR_MESSAGE,
        providerError.type ?? UNKNOWN_ERROR_CODE,
        details
      );
  }
}
