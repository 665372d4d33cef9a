// tests/unit/ResponseDecoder.test.ts

import { describe, it, expect } from 'vitest';
import {
  jsonDecoder,
  formDecoder,
  selectDecoder,
  resolveProviderError,
  toProtocolError,
} from '../../src/core/token/ResponseDecoder';
import { ProtocolError } from '../../src/utils/errors';

describe('ResponseDecoder', () => {
  describe('selectDecoder', () => {
    it('should pick JSON for application/json and text/javascript', () => {
      expect(selectDecoder('application/json; charset=UTF-8').format).toBe('json');
      expect(selectDecoder('text/javascript').format).toBe('json');
    });

    it('should fall back to form decoding', () => {
      expect(selectDecoder('application/x-www-form-urlencoded').format).toBe('form');
      expect(selectDecoder('text/plain').format).toBe('form');
      expect(selectDecoder(undefined).format).toBe('form');
    });
  });

  describe('jsonDecoder', () => {
    it('should decode a JSON object', () => {
      expect(jsonDecoder.decode('{"access_token":"sesame","expires_in":120}')).toEqual({
        access_token: 'sesame',
        expires_in: 120,
      });
    });

    it('should reject malformed JSON', () => {
      expect(() => jsonDecoder.decode('{nope')).toThrow('Token endpoint returned malformed JSON');
    });

    it('should reject JSON that is not an object', () => {
      expect(() => jsonDecoder.decode('[1,2]')).toThrow(
        'Token endpoint response is not a JSON object'
      );
    });
  });

  describe('formDecoder', () => {
    it('should decode form fields as strings', () => {
      expect(formDecoder.decode('access_token=sesame&expires=120')).toEqual({
        access_token: 'sesame',
        expires: '120',
      });
    });
  });

  describe('resolveProviderError', () => {
    it('should return undefined without an error field', () => {
      expect(resolveProviderError({ access_token: 'sesame' })).toBeUndefined();
      expect(resolveProviderError({ error: null })).toBeUndefined();
    });

    it('should read the standard error form', () => {
      expect(
        resolveProviderError({ error: 'invalid_grant', error_description: 'code expired' })
      ).toEqual({ kind: 'standard', code: 'invalid_grant', description: 'code expired' });
    });

    it('should read the nested error form', () => {
      expect(
        resolveProviderError({ error: { type: 'OAuthException', message: 'Code was invalid' } })
      ).toEqual({ kind: 'nested', type: 'OAuthException', message: 'Code was invalid' });
    });

    it('should tolerate a nested error of unexpected shape', () => {
      expect(resolveProviderError({ error: 42 })).toEqual({ kind: 'nested' });
    });
  });

  describe('toProtocolError', () => {
    it('should use the description as the message', () => {
      const error = toProtocolError(
        { kind: 'standard', code: 'invalid_grant', description: 'code expired' },
        400
      );

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error.message).toBe('code expired');
      expect(error.code).toBe('invalid_grant');
      expect(error.details).toEqual({ status: 400 });
    });

    it('should fall back to the code as the message', () => {
      const error = toProtocolError({ kind: 'standard', code: 'invalid_client' }, 401);
      expect(error.message).toBe('invalid_client');
    });

    it('should map the nested form', () => {
      const error = toProtocolError({ kind: 'nested', type: 'OAuthException' }, 400);
      expect(error.message).toBe('error requesting access token');
      expect(error.code).toBe('OAuthException');
    });

    it('should produce a generic error without a provider error', () => {
      const error = toProtocolError(undefined, 500);
      expect(error.message).toBe('error requesting access token');
      expect(error.code).toBe('unknown');
      expect(error.details).toEqual({ status: 500 });
    });
  });
});
