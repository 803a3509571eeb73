import { InitializationError } from './errors.js';

/**
 * Environment-based runtime configuration.
 *
 * Environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: Region of the transcoder control plane (required)
 * - TRANSCODER_ENDPOINT: Custom endpoint URL (optional)
 * - TRANSCODER_MAX_ATTEMPTS: SDK transport attempts (optional, SDK default otherwise)
 * - LOG_LEVEL: pino log level (default: info)
 * - LOG_PRETTY: "true" to pretty-print logs through pino-pretty
 */
export interface RuntimeConfig {
  region: string;
  endpoint?: string;
  maxAttempts?: number;
  logLevel: string;
  logPretty: boolean;
}

/** Values given on the command line; they win over the environment */
export interface RuntimeConfigOverrides {
  region?: string;
  endpoint?: string;
  logLevel?: string;
}

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getOptionalEnvNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? undefined : parsed;
}

/**
 * Resolve the region from overrides, then AWS_REGION, then AWS_DEFAULT_REGION.
 * Returns undefined when none is set.
 */
export function resolveRegion(override?: string): string | undefined {
  return override || getOptionalEnv('AWS_REGION') || getOptionalEnv('AWS_DEFAULT_REGION');
}

/**
 * Build the runtime configuration.
 *
 * @throws InitializationError with code REGION_REQUIRED when no region is set
 */
export function buildRuntimeConfig(overrides: RuntimeConfigOverrides = {}): RuntimeConfig {
  const region = resolveRegion(overrides.region);
  if (!region) {
    throw new InitializationError(
      'REGION_REQUIRED',
      'region must be specified (use --region, AWS_REGION or AWS_DEFAULT_REGION)',
    );
  }

  return {
    region,
    endpoint: overrides.endpoint || getOptionalEnv('TRANSCODER_ENDPOINT'),
    maxAttempts: getOptionalEnvNumber('TRANSCODER_MAX_ATTEMPTS'),
    logLevel: overrides.logLevel || getEnv('LOG_LEVEL', 'info'),
    logPretty: getEnv('LOG_PRETTY', '') === 'true',
  };
}
