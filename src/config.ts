/**
 * Client configuration.
 *
 * Credentials are passed explicitly to `createClient`; `loadConfig` is the
 * one place that reads them from the environment.
 */

import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_BASE_URL = 'https://survey.qualtrics.com';
export const DEFAULT_API_VERSION = '2.5';

export const configSchema = z.object({
  user: z.string().min(1),
  token: z.string().min(1),
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  apiVersion: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
  debug: z.boolean(),
});

export type QualtricsConfig = Readonly<z.infer<typeof configSchema>>;

export type ConfigInput = {
  user: string;
  token: string;
  baseUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
  debug?: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validates explicit settings and fills in defaults.
 * The returned object is frozen.
 */
export function defineConfig(input: ConfigInput): QualtricsConfig {
  const parsed = configSchema.safeParse({
    ...input,
    baseUrl: input.baseUrl ?? DEFAULT_BASE_URL,
    apiVersion: input.apiVersion ?? DEFAULT_API_VERSION,
    debug: input.debug ?? false,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`);
  }
  return Object.freeze(parsed.data);
}

type Env = Record<string, string | undefined>;

function readTimeout(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`QUALTRICS_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Reads QUALTRICS_* variables; explicit overrides win.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<ConfigInput> = {}): QualtricsConfig {
  const user = overrides.user ?? env.QUALTRICS_USER;
  if (!user) {
    throw new ConfigError('user should be passed explicitly or environment variable QUALTRICS_USER should be set');
  }
  const token = overrides.token ?? env.QUALTRICS_TOKEN;
  if (!token) {
    throw new ConfigError('token should be passed explicitly or environment variable QUALTRICS_TOKEN should be set');
  }

  return defineConfig({
    user,
    token,
    baseUrl: overrides.baseUrl ?? (env.QUALTRICS_BASE_URL || undefined),
    apiVersion: overrides.apiVersion ?? (env.QUALTRICS_API_VERSION || undefined),
    timeoutMs: overrides.timeoutMs ?? readTimeout(env.QUALTRICS_TIMEOUT_MS),
    debug: overrides.debug ?? ['1', 'true', 'yes'].includes((env.QUALTRICS_DEBUG ?? '').toLowerCase()),
  });
}
