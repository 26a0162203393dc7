/**
 * Configuration layer - all external configuration comes through here
 * Supports environment variables and defaults
 */

import dotenv from 'dotenv';

dotenv.config();

export type Environment = 'development' | 'staging' | 'production' | 'test';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  environment: Environment;
  logLevel: LogLevelName;
  addressVerification: AddressVerificationConfig;
  ingestion: IngestionConfig;
  http: HttpConfig;
}

/**
 * Provider credentials are optional: an absent credential means the provider is not configured
 */
export interface AddressVerificationConfig {
  uspsUserId?: string;
  uspsApiUrl: string;
  googleApiKey?: string;
  googleApiUrl: string;
  timeoutMs: number;
  retryAttempts: number;
  cacheTtlSecs: number;
}

export interface IngestionConfig {
  delimiter: string;
  validateHeaders: boolean;
}

export interface HttpConfig {
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];
const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function intOrDefault(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    environment: oneOf(env.NODE_ENV, ENVIRONMENTS, 'development'),
    logLevel: oneOf(env.LOG_LEVEL?.toLowerCase(), LOG_LEVELS, 'info'),
    addressVerification: {
      uspsUserId: optionalString(env.USPS_USER_ID),
      uspsApiUrl: env.USPS_API_URL || 'https://secure.shippingapis.com/ShippingAPI.dll',
      googleApiKey: optionalString(env.GOOGLE_API_KEY),
      googleApiUrl:
        env.GOOGLE_ADDRESS_VALIDATION_URL || 'https://addressvalidation.googleapis.com/v1:validateAddress',
      timeoutMs: intOrDefault(env.ADDRESS_VERIFICATION_TIMEOUT_MS, 10000),
      retryAttempts: intOrDefault(env.ADDRESS_VERIFICATION_RETRY_ATTEMPTS, 1),
      cacheTtlSecs: intOrDefault(env.ADDRESS_VERIFICATION_CACHE_TTL_SECS, 0),
    },
    ingestion: {
      delimiter: env.CSV_DELIMITER || ',',
      validateHeaders: env.CSV_VALIDATE_HEADERS === 'true',
    },
    http: {
      timeoutMs: intOrDefault(env.HTTP_TIMEOUT_MS, 30000),
      retryAttempts: intOrDefault(env.HTTP_RETRY_ATTEMPTS, 3),
      retryDelayMs: intOrDefault(env.HTTP_RETRY_DELAY_MS, 1000),
    },
  };
}

// Export singleton instance
export const config = getConfig();
