/**
 * Address verification provider contract
 * Every provider adapter (USPS, Google, test doubles) implements this interface,
 * so the verifier's fallback logic never depends on a provider's wire format
 */

import { PostalAddress } from '../types/domain';

/**
 * What a provider reports when the call itself succeeded
 */
export interface ProviderVerification {
  affirmative: boolean;
  normalizedAddress?: PostalAddress;
  rawMessage: string;
}

export interface AddressProvider {
  /**
   * Provider identifier (e.g., 'usps', 'google')
   */
  readonly name: string;

  /**
   * Verify an address. Transport failures reject with a ShippingError;
   * a negative answer resolves with `affirmative: false`.
   */
  verify(address: PostalAddress): Promise<ProviderVerification>;
}

/**
 * Base class for provider adapters
 */
export abstract class BaseAddressProvider implements AddressProvider {
  abstract readonly name: string;

  protected addressLines(address: PostalAddress): string[] {
    return [address.street, address.street2 ?? ''].filter((line) => line.trim().length > 0);
  }

  protected negative(rawMessage: string): ProviderVerification {
    return { affirmative: false, rawMessage };
  }

  abstract verify(address: PostalAddress): Promise<ProviderVerification>;
}
