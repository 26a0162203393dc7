/**
 * Shared builders for upload rows, records and verification doubles
 */

import { COLUMN_LABELS } from '../ingest/parser';
import { AddressVerificationService } from '../address/verifier';
import { AddressProvider, ProviderVerification } from '../address/types';
import {
  ContactAddress,
  FieldRecord,
  PostalAddress,
  VerificationOutcome,
  VerificationSource,
} from '../types/domain';

const COLUMNS = [
  'shipFromFirstName',
  'shipFromLastName',
  'shipFromAddress',
  'shipFromAddress2',
  'shipFromCity',
  'shipFromZip',
  'shipFromState',
  'shipToFirstName',
  'shipToLastName',
  'shipToAddress',
  'shipToAddress2',
  'shipToCity',
  'shipToZip',
  'shipToState',
  'weightLbs',
  'weightOz',
  'length',
  'width',
  'height',
  'shipToPhone',
  'shipFromPhone',
  'orderNo',
  'itemSku',
] as const;

export type Column = (typeof COLUMNS)[number];

export const GROUP_HEADER = 'Ship From,,,,,,,Ship To,,,,,,,Package,,,,,Contact,,Reference,';

function quote(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function csvRow(values: Partial<Record<Column, string>>): string {
  return COLUMNS.map((column) => quote(values[column] ?? '')).join(',');
}

export function csvFile(rows: string[]): string {
  return [GROUP_HEADER, COLUMN_LABELS.join(','), ...rows].join('\n');
}

export const RECIPIENT: Partial<Record<Column, string>> = {
  shipToFirstName: 'Dana',
  shipToLastName: 'Whitfield',
  shipToAddress: '42 Test Ave',
  shipToCity: 'Pomona',
  shipToZip: '91766',
  shipToState: 'CA',
};

export const SENDER: Partial<Record<Column, string>> = {
  shipFromFirstName: 'Shop',
  shipFromLastName: 'Floor',
  shipFromAddress: '9 Dock Rd',
  shipFromCity: 'Fontana',
  shipFromZip: '92335',
  shipFromState: 'CA',
};

export const PACKAGE: Partial<Record<Column, string>> = {
  weightLbs: '2',
  weightOz: '0',
  length: '10',
  width: '8',
  height: '4',
};

export const DEFAULT_ADDRESS: ContactAddress = {
  firstName: 'Print',
  lastName: 'TTS',
  address: '502 W Arrow Hwy, STE P',
  address2: '',
  city: 'San Dimas',
  state: 'CA',
  zipCode: '91773',
  phone: '555-0100',
};

export function fieldRecord(overrides: Partial<FieldRecord> = {}): FieldRecord {
  return {
    shipFromFirstName: '',
    shipFromLastName: '',
    shipFromAddress: '',
    shipFromAddress2: '',
    shipFromCity: '',
    shipFromZip: '',
    shipFromState: '',
    shipFromPhone: '',
    shipToFirstName: 'Dana',
    shipToLastName: 'Whitfield',
    shipToAddress: '42 Test Ave',
    shipToAddress2: '',
    shipToCity: 'Pomona',
    shipToZip: '91766',
    shipToState: 'CA',
    shipToPhone: '',
    orderNo: 'A-1',
    itemSku: 'SKU-1',
    rowNumber: 1,
    ...overrides,
  };
}

export const TEST_ADDRESS: PostalAddress = {
  street: '42 Test Ave',
  city: 'Pomona',
  state: 'CA',
  zip: '91766',
};

/**
 * Provider double: answers from a queue, or rejects when the entry is an Error
 */
export class StubProvider implements AddressProvider {
  readonly calls: PostalAddress[] = [];

  constructor(
    readonly name: string,
    private readonly answers: Array<ProviderVerification | Error>
  ) {}

  async verify(address: PostalAddress): Promise<ProviderVerification> {
    this.calls.push(address);
    const answer = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
    if (answer === undefined) {
      throw new Error(`${this.name} has no answer queued`);
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}

/**
 * Verifier double that affirms every address
 */
export class StaticVerifier implements AddressVerificationService {
  readonly calls: PostalAddress[] = [];

  constructor(private readonly outcome: VerificationOutcome = {
    verified: true,
    source: VerificationSource.PRIMARY,
    message: 'Address validated',
  }) {}

  async verify(address: PostalAddress): Promise<VerificationOutcome> {
    this.calls.push(address);
    return this.outcome;
  }
}
