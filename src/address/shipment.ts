/**
 * Verification of the two addresses on a shipment
 */

import { AddressVerificationService } from './verifier';
import {
  PostalAddress,
  ShipmentChanges,
  ShipmentFields,
  VerificationOutcome,
} from '../types/domain';

export interface ShipmentVerification {
  shipTo?: VerificationOutcome;
  shipFrom?: VerificationOutcome;
}

export function recipientAddress(fields: ShipmentFields): PostalAddress | undefined {
  if (!fields.shipToAddress.trim()) {
    return undefined;
  }
  return {
    street: fields.shipToAddress,
    ...(fields.shipToAddress2 ? { street2: fields.shipToAddress2 } : {}),
    city: fields.shipToCity,
    state: fields.shipToState,
    zip: fields.shipToZip,
  };
}

export function senderAddress(fields: ShipmentFields): PostalAddress | undefined {
  if (!fields.shipFromAddress.trim()) {
    return undefined;
  }
  return {
    street: fields.shipFromAddress,
    ...(fields.shipFromAddress2 ? { street2: fields.shipFromAddress2 } : {}),
    city: fields.shipFromCity,
    state: fields.shipFromState,
    zip: fields.shipFromZip,
  };
}

/**
 * Verify whichever addresses have a street line
 */
export async function verifyShipmentAddresses(
  verifier: AddressVerificationService,
  fields: ShipmentFields
): Promise<ShipmentVerification> {
  const shipTo = recipientAddress(fields);
  const shipFrom = senderAddress(fields);

  return {
    shipTo: shipTo ? await verifier.verify(shipTo) : undefined,
    shipFrom: shipFrom ? await verifier.verify(shipFrom) : undefined,
  };
}

/**
 * The recipient outcome is what gets stored on the shipment
 */
export function verificationChanges(outcome: VerificationOutcome): ShipmentChanges {
  return {
    addressValidationStatus: outcome.verified ? 'valid' : 'pending',
    addressValidationSource: outcome.source,
    addressValidationMessage: outcome.message,
  };
}
