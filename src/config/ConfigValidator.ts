// src/config/ConfigValidator.ts

import { z } from 'zod';
import type { EndpointConfig } from '../core/auth/types';
import { ConfigurationError } from '../utils/errors';

// Endpoint Configuration Schema. Presence of the operation-specific fields is
// checked per call by requireEndpointFields.
export const EndpointConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId must not be empty'),
  clientSecret: z.string().optional(),
  grantType: z.string().min(1).optional(),
  authorizationUri: z.string().url().optional(),
  accessTokenUri: z.string().url().optional(),
  redirectUri: z.string().url().optional(),
  scope: z.array(z.string().min(1)).optional(),
  accessQueryParam: z
    .string()
    .regex(/^[A-Za-z0-9_.~-]+$/, 'accessQueryParam must be a plain query parameter name')
    .optional(),
  authorizationHeader: z.boolean().optional(),
  accessType: z.string().optional(),
  prompt: z.array(z.string().min(1)).optional(),
  includeGrantedScopes: z.boolean().optional(),
  loginHint: z.string().optional(),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    prefix: z
      .string()
      .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'Metric prefix must be a valid Prometheus name')
      .optional(),
  })
  .optional();

// HTTP Configuration Schema (resource requests; the token endpoint timeouts are fixed)
const HttpConfigSchema = z
  .object({
    timeout: z.number().positive().optional(),
    keepAlive: z.boolean().optional(),
    userAgent: z.string().min(1).optional(),
  })
  .optional();

// Complete Client Configuration Schema
export const ClientConfigSchema = z.object({
  endpoint: EndpointConfigSchema,
  http: HttpConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type ValidatedClientConfig = z.infer<typeof ClientConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate client configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {ConfigurationError} Listing every schema violation
 */
export function validateConfig(config: unknown): ValidatedClientConfig {
  const result = ClientConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigurationError(`Invalid client configuration: ${errors.join('; ')}`, {
      errors,
    });
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(config: unknown):
  | { success: true; data: ValidatedClientConfig }
  | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Fail before any network call when an operation needs endpoint fields that
 * are not configured.
 *
 * @param operation - Operation name, used in the error message
 * @throws {ConfigurationError} Naming every missing field
 */
export function requireEndpointFields<K extends keyof EndpointConfig>(
  endpoint: EndpointConfig,
  fields: readonly K[],
  operation: string
): asserts endpoint is EndpointConfig & Required<Pick<EndpointConfig, K>> {
  const missing = fields.filter((field) => endpoint[field] === undefined || endpoint[field] === null);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing endpoint configuration for ${operation}: ${missing.join(', ')}`,
      { operation, missing }
    );
  }
}

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function readList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(/\s+/).filter((entry) => entry.length > 0);
}

/**
 * Build an endpoint configuration from environment variables
 * (`OAUTH2_CLIENT_ID`, `OAUTH2_ACCESS_TOKEN_URI`, ...). Unset variables are
 * left out; the result is validated like any other endpoint.
 *
 * @example
 * ```typescript
 * const endpoint = endpointConfigFromEnv(process.env);
 * const client = OAuth2Client.create({ endpoint });
 * ```
 */
export function endpointConfigFromEnv(
  env: NodeJS.ProcessEnv,
  prefix: string = 'OAUTH2_'
): EndpointConfig {
  const read = (name: string): string | undefined => {
    const value = env[`${prefix}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const candidate = {
    clientId: read('CLIENT_ID'),
    clientSecret: read('CLIENT_SECRET'),
    grantType: read('GRANT_TYPE'),
    authorizationUri: read('AUTHORIZATION_URI'),
    accessTokenUri: read('ACCESS_TOKEN_URI'),
    redirectUri: read('REDIRECT_URI'),
    scope: readList(read('SCOPE')),
    accessQueryParam: read('ACCESS_QUERY_PARAM'),
    authorizationHeader: readFlag(read('AUTHORIZATION_HEADER')),
  };

  const result = EndpointConfigSchema.safeParse(candidate);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigurationError(`Invalid ${prefix}* environment: ${errors.join('; ')}`, {
      errors,
    });
  }

  return result.data;
}
