import { z } from 'zod';
import { ConfigurationError } from '../talker-errors';

export const MANGABAKA_SOURCE = 'MangaBaka';
export const DEFAULT_API_URL = 'https://api.mangabaka.dev/v1/';

const EnvSchema = z.object({
  MANGABAKA_API_URL: z.string().url('MANGABAKA_API_URL must be a valid URL').optional(),
  MANGABAKA_API_KEY: z.string().min(1).optional(),
  MANGABAKA_TIMEOUT_MS: z.coerce.number().int().positive('MANGABAKA_TIMEOUT_MS must be positive').optional(),
  MANGABAKA_REQUESTS_PER_MINUTE: z.coerce
    .number()
    .int()
    .positive('MANGABAKA_REQUESTS_PER_MINUTE must be positive')
    .optional(),
});

export type EnvOverrides = z.infer<typeof EnvSchema>;

/**
 * Reads the optional MANGABAKA_* overrides. Blank variables count as unset.
 *
 * @throws {ConfigurationError} listing every invalid variable
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const errorMessage = [
      'Environment validation failed:',
      ...result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`),
    ].join('\n');
    throw new ConfigurationError(MANGABAKA_SOURCE, errorMessage);
  }

  return result.data;
}

/** Trims the URL and guarantees a trailing slash so relative paths append. */
export function fixUrl(url: string | undefined | null): string {
  const trimmed = url?.trim() ?? '';
  if (!trimmed) return '';
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

/**
 * Picks the API URL: host setting, then environment, then the public default.
 *
 * @throws {ConfigurationError} when the chosen URL is not an absolute http(s) URL
 */
export function resolveApiUrl(settingUrl: string | undefined, env: EnvOverrides): string {
  const url = fixUrl(settingUrl) || fixUrl(env.MANGABAKA_API_URL) || DEFAULT_API_URL;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error: unknown) {
    throw new ConfigurationError(
      MANGABAKA_SOURCE,
      `Invalid API URL "${url}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(MANGABAKA_SOURCE, `API URL must use http or https, got "${parsed.protocol}"`);
  }

  return url;
}
