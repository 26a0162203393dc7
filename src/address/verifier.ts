/**
 * Address verification with provider fallback
 * Primary provider first, secondary on any failure or negative answer.
 * Verification is best effort: callers always get an outcome, never an exception.
 */

import NodeCache from 'node-cache';
import { AddressProvider } from './types';
import { UspsAddressProvider } from './usps';
import { GoogleAddressProvider } from './google';
import { PostalAddress, VerificationOutcome, VerificationSource } from '../types/domain';
import { AddressVerificationConfig, config } from '../config';
import { logger } from '../config/logger';
import { errorMessage } from '../errors';

const log = logger.child('address-verifier');

export const MANUAL_VERIFICATION_MESSAGE = 'manual verification required';

export interface AddressVerifierOptions {
  primary?: AddressProvider;
  secondary?: AddressProvider;
  /**
   * Lifetime of cached affirmative outcomes; 0 or absent disables caching
   */
  cacheTtlSecs?: number;
}

export interface VerifyOptions {
  /**
   * Skip the cache lookup; a fresh affirmative outcome still replaces the cached one
   */
  fresh?: boolean;
}

export interface AddressVerificationService {
  verify(address: PostalAddress, options?: VerifyOptions): Promise<VerificationOutcome>;
}

export class AddressVerifier implements AddressVerificationService {
  private cache?: NodeCache;

  constructor(private readonly options: AddressVerifierOptions = {}) {
    if (options.cacheTtlSecs && options.cacheTtlSecs > 0) {
      // Expired entries are dropped on read; no background timer
      this.cache = new NodeCache({ stdTTL: options.cacheTtlSecs, checkperiod: 0 });
    }
  }

  get configuredProviders(): string[] {
    return [this.options.primary, this.options.secondary]
      .filter((provider): provider is AddressProvider => provider !== undefined)
      .map((provider) => provider.name);
  }

  async verify(address: PostalAddress, options: VerifyOptions = {}): Promise<VerificationOutcome> {
    const key = cacheKey(address);
    const cached = options.fresh ? undefined : this.cache?.get<VerificationOutcome>(key);
    if (cached) {
      log.debug('Returning cached verification outcome', { source: cached.source });
      return cached;
    }

    const attempts: Array<[VerificationSource, AddressProvider | undefined]> = [
      [VerificationSource.PRIMARY, this.options.primary],
      [VerificationSource.SECONDARY, this.options.secondary],
    ];

    let attempted = false;

    for (const [source, provider] of attempts) {
      if (!provider) {
        continue;
      }
      attempted = true;

      try {
        const result = await provider.verify(address);

        if (result.affirmative) {
          log.info(`Address verified via ${provider.name}`, { city: address.city, state: address.state });
          const outcome: VerificationOutcome = {
            verified: true,
            source,
            message: result.rawMessage,
            ...(result.normalizedAddress && { normalizedAddress: result.normalizedAddress }),
          };
          this.cache?.set(key, outcome);
          return outcome;
        }

        log.warn(`${provider.name} verification failed: ${result.rawMessage}`);
      } catch (error) {
        log.warn(`${provider.name} verification error: ${errorMessage(error)}`);
      }
    }

    if (attempted) {
      log.error('All address verification providers failed');
    } else {
      log.debug('No address verification provider configured');
    }

    return {
      verified: false,
      source: VerificationSource.NONE,
      message: MANUAL_VERIFICATION_MESSAGE,
    };
  }

  clearCache(): void {
    this.cache?.flushAll();
  }
}

function cacheKey(address: PostalAddress): string {
  return [address.street, address.street2 ?? '', address.city, address.state, address.zip]
    .map((part) => part.trim().toLowerCase())
    .join('|');
}

/**
 * Build a verifier from credentials; a missing credential leaves that provider out
 */
export function createAddressVerifier(
  verificationConfig: AddressVerificationConfig = config.addressVerification
): AddressVerifier {
  const { uspsUserId, googleApiKey, timeoutMs, retryAttempts, cacheTtlSecs } = verificationConfig;

  return new AddressVerifier({
    primary: uspsUserId
      ? new UspsAddressProvider({
          userId: uspsUserId,
          apiUrl: verificationConfig.uspsApiUrl,
          timeoutMs,
          retryAttempts,
        })
      : undefined,
    secondary: googleApiKey
      ? new GoogleAddressProvider({
          apiKey: googleApiKey,
          apiUrl: verificationConfig.googleApiUrl,
          timeoutMs,
          retryAttempts,
        })
      : undefined,
    cacheTtlSecs,
  });
}
