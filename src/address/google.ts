/**
 * Google Address Validation API integration
 * Based on: https://developers.google.com/maps/documentation/address-validation
 */

import { z } from 'zod';
import { BaseAddressProvider, ProviderVerification } from './types';
import { PostalAddress } from '../types/domain';
import { HttpClient } from '../http/client';
import { logger } from '../config/logger';
import { ShippingError, ErrorCode } from '../errors';

const log = logger.child('google');

/**
 * Google API request format
 */
interface GoogleValidateRequest {
  address: {
    addressLines: string[];
    locality: string;
    administrativeArea: string;
    postalCode: string;
    regionCode: string;
  };
}

const GoogleValidateResponseSchema = z.object({
  result: z
    .object({
      verdict: z
        .object({
          addressComplete: z.boolean().optional(),
        })
        .optional(),
      address: z
        .object({
          postalAddress: z
            .object({
              addressLines: z.array(z.string()).optional(),
              locality: z.string().optional(),
              administrativeArea: z.string().optional(),
              postalCode: z.string().optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
});

export interface GoogleProviderOptions {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
  retryAttempts?: number;
}

export class GoogleAddressProvider extends BaseAddressProvider {
  readonly name = 'google';

  private httpClient: HttpClient;

  constructor(private readonly options: GoogleProviderOptions) {
    super();
    this.httpClient = new HttpClient({
      provider: this.name,
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      retryAttempts: options.retryAttempts,
    });
  }

  async verify(address: PostalAddress): Promise<ProviderVerification> {
    const request: GoogleValidateRequest = {
      address: {
        addressLines: this.addressLines(address),
        locality: address.city,
        administrativeArea: address.state,
        postalCode: address.zip,
        regionCode: 'US',
      },
    };

    log.debug('Requesting Google address validation', { city: address.city, state: address.state });
    const response = await this.httpClient.post<unknown>('', request, {
      params: { key: this.options.apiKey },
    });

    const parsed = GoogleValidateResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ShippingError(ErrorCode.INVALID_RESPONSE, 'Unexpected Google response structure', {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }

    const result = parsed.data.result;
    if (result?.verdict?.addressComplete !== true) {
      return this.negative('Address could not be validated');
    }

    const postal = result.address?.postalAddress;
    const lines = postal?.addressLines ?? [];
    const normalizedAddress: PostalAddress = {
      street: lines[0] ?? '',
      ...(lines.length > 1 && { street2: lines.slice(1).join(' ') }),
      city: postal?.locality ?? '',
      state: postal?.administrativeArea ?? '',
      zip: postal?.postalCode ?? '',
    };

    return {
      affirmative: true,
      normalizedAddress,
      rawMessage: 'Address validated',
    };
  }
}
