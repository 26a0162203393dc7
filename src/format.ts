/**
 * Display strings for shipments
 */

import { PackageDetails, ShipmentFields } from './types/domain';

interface AddressParts {
  firstName: string;
  lastName: string;
  address: string;
  address2: string;
  city: string;
  state: string;
  zip: string;
}

function formatAddress(parts: AddressParts): string[] {
  const lines: string[] = [];
  const name = `${parts.firstName} ${parts.lastName}`.trim();
  if (name) {
    lines.push(name);
  }
  if (parts.address) {
    lines.push(parts.address);
  }
  if (parts.address2) {
    lines.push(parts.address2);
  }
  if (parts.city && parts.state) {
    lines.push(`${parts.city}, ${parts.state} ${parts.zip}`.trim());
  }
  return lines;
}

export function formatShipFrom(fields: ShipmentFields): string {
  const lines = formatAddress({
    firstName: fields.shipFromFirstName,
    lastName: fields.shipFromLastName,
    address: fields.shipFromAddress,
    address2: fields.shipFromAddress2,
    city: fields.shipFromCity,
    state: fields.shipFromState,
    zip: fields.shipFromZip,
  });
  return lines.length > 0 ? lines.join(', ') : 'Not set';
}

export function formatShipTo(fields: ShipmentFields): string {
  return formatAddress({
    firstName: fields.shipToFirstName,
    lastName: fields.shipToLastName,
    address: fields.shipToAddress,
    address2: fields.shipToAddress2,
    city: fields.shipToCity,
    state: fields.shipToState,
    zip: fields.shipToZip,
  }).join(', ');
}

export function formatPackageDetails(pkg: PackageDetails): string {
  const parts: string[] = [];
  if (pkg.length && pkg.width && pkg.height) {
    parts.push(`${pkg.length}×${pkg.width}×${pkg.height} in`);
  }
  const weight = [pkg.weightLbs ? `${pkg.weightLbs} lb` : '', pkg.weightOz ? `${pkg.weightOz} oz` : '']
    .filter(Boolean)
    .join(' ');
  if (weight) {
    parts.push(weight);
  }
  return parts.length > 0 ? parts.join(' | ') : 'Not set';
}
