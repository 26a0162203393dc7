/**
 * Sample saved addresses and packages for a fresh install
 */

import { NewSavedAddress, NewSavedPackage, SavedAddressRepository, SavedPackageRepository } from './storage/types';
import { logger } from './config/logger';

const log = logger.child('seed');

const SAMPLE_ADDRESSES: readonly NewSavedAddress[] = [
  {
    name: 'Print TTS',
    firstName: 'Print',
    lastName: 'TTS',
    address: '502 W Arrow Hwy, STE P',
    address2: '',
    city: 'San Dimas',
    state: 'CA',
    zipCode: '91773',
    phone: '',
    isDefault: true,
  },
  {
    name: 'Print TTS',
    firstName: 'Print',
    lastName: 'TTS',
    address: '500 W Foothill Blvd, STE P',
    address2: '',
    city: 'Claremont',
    state: 'CA',
    zipCode: '91711',
    phone: '',
    isDefault: false,
  },
  {
    name: 'Print TTS',
    firstName: 'Print',
    lastName: 'TTS',
    address: '1170 Grove Ave',
    address2: '',
    city: 'Ontario',
    state: 'CA',
    zipCode: '91764',
    phone: '',
    isDefault: false,
  },
];

const SAMPLE_PACKAGES: readonly NewSavedPackage[] = [
  { name: 'Light Package', length: 6, width: 6, height: 6, weightLbs: 1, weightOz: 0 },
  { name: '8 Oz Item', length: 4, width: 4, height: 4, weightLbs: 0, weightOz: 8 },
  { name: 'Standard Box', length: 12, width: 12, height: 12, weightLbs: 2, weightOz: 0 },
];

export interface SeedResult {
  addresses: number;
  packages: number;
}

/**
 * Creates any sample record not already present; addresses match on name, street and city
 */
export async function seedSampleData(
  addresses: SavedAddressRepository,
  packages: SavedPackageRepository
): Promise<SeedResult> {
  const result: SeedResult = { addresses: 0, packages: 0 };

  const existingAddresses = await addresses.list();
  const hasDefault = existingAddresses.some((address) => address.isDefault);
  for (const sample of SAMPLE_ADDRESSES) {
    const exists = existingAddresses.some(
      (address) => address.name === sample.name && address.address === sample.address && address.city === sample.city
    );
    if (exists) {
      log.debug(`Address already exists: ${sample.name} - ${sample.city}`);
      continue;
    }
    await addresses.create({ ...sample, isDefault: sample.isDefault && !hasDefault });
    result.addresses++;
  }

  const existingPackages = await packages.list();
  for (const sample of SAMPLE_PACKAGES) {
    if (existingPackages.some((pkg) => pkg.name === sample.name)) {
      log.debug(`Package already exists: ${sample.name}`);
      continue;
    }
    await packages.create(sample);
    result.packages++;
  }

  log.info(`Seeded ${result.addresses} addresses and ${result.packages} packages`);
  return result;
}
