/**
 * USPS Address Validation (Verify) API integration
 * Requests and responses are XML, carried in the query string of a GET
 * Based on: https://www.usps.com/business/web-tools-apis/address-information-api.htm
 */

import { Builder, parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { BaseAddressProvider, ProviderVerification } from './types';
import { PostalAddress } from '../types/domain';
import { HttpClient } from '../http/client';
import { logger } from '../config/logger';
import { ShippingError, ErrorCode } from '../errors';

const log = logger.child('usps');

/**
 * USPS response format after xml2js parsing (explicitArray: false)
 * This is internal to the adapter - the verifier never sees this shape
 */
const UspsErrorSchema = z.object({
  Number: z.string().optional(),
  Description: z.string().optional(),
});

const UspsAddressSchema = z.object({
  Error: UspsErrorSchema.optional(),
  Address1: z.string().optional(),
  Address2: z.string().optional(),
  City: z.string().optional(),
  State: z.string().optional(),
  Zip5: z.string().optional(),
  Zip4: z.string().optional(),
});

const UspsResponseSchema = z.union([
  z.object({ Error: UspsErrorSchema }),
  z.object({
    AddressValidateResponse: z.object({
      Address: UspsAddressSchema,
    }),
  }),
]);

export interface UspsProviderOptions {
  userId: string;
  apiUrl: string;
  timeoutMs: number;
  retryAttempts?: number;
}

export class UspsAddressProvider extends BaseAddressProvider {
  readonly name = 'usps';

  private httpClient: HttpClient;
  private builder = new Builder({ headless: true, renderOpts: { pretty: false } });

  constructor(private readonly options: UspsProviderOptions) {
    super();
    this.httpClient = new HttpClient({
      provider: this.name,
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      retryAttempts: options.retryAttempts,
    });
  }

  async verify(address: PostalAddress): Promise<ProviderVerification> {
    const xml = this.buildRequestXml(address);

    log.debug('Requesting USPS address verification', { city: address.city, state: address.state });
    const body = await this.httpClient.get<string>('', {
      params: { API: 'Verify', XML: xml },
      responseType: 'text',
    });

    return this.parseResponse(body);
  }

  /**
   * USPS puts the secondary line (suite, apartment) in Address1 and the street in Address2
   */
  buildRequestXml(address: PostalAddress): string {
    return this.builder.buildObject({
      AddressValidateRequest: {
        $: { USERID: this.options.userId },
        Revision: '1',
        Address: {
          $: { ID: '0' },
          Address1: address.street2 ?? '',
          Address2: address.street,
          City: address.city,
          State: address.state,
          Zip5: address.zip.slice(0, 5),
          Zip4: '',
        },
      },
    });
  }

  private async parseResponse(body: string): Promise<ProviderVerification> {
    let parsed: unknown;
    try {
      parsed = await parseStringPromise(body, { explicitArray: false, trim: true });
    } catch (error) {
      throw new ShippingError(ErrorCode.INVALID_RESPONSE, 'USPS response is not valid XML', {
        originalError: error instanceof Error ? error : undefined,
      });
    }

    const result = UspsResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new ShippingError(ErrorCode.INVALID_RESPONSE, 'Unexpected USPS response structure', {
        details: { issues: result.error.issues.map((issue) => issue.message) },
      });
    }

    if ('Error' in result.data) {
      return this.negative(result.data.Error.Description || 'USPS validation error');
    }

    const validated = result.data.AddressValidateResponse.Address;
    if (validated.Error) {
      return this.negative(validated.Error.Description || 'USPS validation error');
    }

    const zip5 = validated.Zip5 ?? '';
    const normalizedAddress: PostalAddress = {
      street: validated.Address2 ?? '',
      ...(validated.Address1 && { street2: validated.Address1 }),
      city: validated.City ?? '',
      state: validated.State ?? '',
      zip: validated.Zip4 ? `${zip5}-${validated.Zip4}` : zip5,
    };

    return {
      affirmative: true,
      normalizedAddress,
      rawMessage: 'Address validated',
    };
  }
}
