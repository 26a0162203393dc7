/**
 * Per-record validation and status derivation
 */

import { ContactAddress, FieldRecord, ShipmentStatus, ValidationOutcome } from '../types/domain';

export const ISSUES = {
  MISSING_SHIP_TO_NAME: 'Missing Ship To name',
  MISSING_SHIP_TO_ADDRESS: 'Missing Ship To address',
  MISSING_SHIP_TO_CITY: 'Missing Ship To city',
  MISSING_SHIP_TO_STATE: 'Missing Ship To state',
  MISSING_SHIP_TO_ZIP: 'Missing Ship To ZIP code',
  MISSING_SHIP_FROM: 'Missing Ship From address',
  MISSING_WEIGHT_AND_DIMENSIONS: 'Missing package weight and dimensions',
  MISSING_WEIGHT: 'Missing package weight',
  MISSING_DIMENSIONS: 'Missing package dimensions',
} as const;

function isBlank(value: string | undefined): boolean {
  return !value || !value.trim();
}

/**
 * Classify one record. Every check runs so the issues list is complete;
 * an `error` is never downgraded, and `warning`/`default_applied` only replace `valid`.
 *
 * Returns a new outcome; when the sender is missing and a default is given,
 * the outcome carries the default's sender fields.
 */
export function validateShipmentRecord(
  record: FieldRecord,
  defaultAddress?: ContactAddress
): ValidationOutcome {
  const outcome: ValidationOutcome = {
    ...record,
    status: ShipmentStatus.VALID,
    issues: [],
    defaultApplied: record.defaultApplied === true,
  };

  const raise = (status: ShipmentStatus.WARNING | ShipmentStatus.DEFAULT_APPLIED): void => {
    if (outcome.status === ShipmentStatus.VALID) {
      outcome.status = status;
    }
  };

  const fail = (issue: string): void => {
    outcome.status = ShipmentStatus.ERROR;
    outcome.issues.push(issue);
  };

  // Ship To (required)
  if (isBlank(record.shipToFirstName) && isBlank(record.shipToLastName)) {
    fail(ISSUES.MISSING_SHIP_TO_NAME);
  }
  if (isBlank(record.shipToAddress)) {
    fail(ISSUES.MISSING_SHIP_TO_ADDRESS);
  }
  if (isBlank(record.shipToCity)) {
    fail(ISSUES.MISSING_SHIP_TO_CITY);
  }
  if (isBlank(record.shipToState)) {
    fail(ISSUES.MISSING_SHIP_TO_STATE);
  }
  if (isBlank(record.shipToZip)) {
    fail(ISSUES.MISSING_SHIP_TO_ZIP);
  }

  // Ship From: missing means no street and no city
  const shipFromMissing = isBlank(record.shipFromAddress) && isBlank(record.shipFromCity);

  if (shipFromMissing && defaultAddress) {
    applySenderDefaults(outcome, defaultAddress);
    outcome.defaultApplied = true;
    raise(ShipmentStatus.DEFAULT_APPLIED);
  } else if (shipFromMissing) {
    outcome.defaultApplied = false;
    raise(ShipmentStatus.WARNING);
    outcome.issues.push(ISSUES.MISSING_SHIP_FROM);
  } else if (outcome.defaultApplied) {
    raise(ShipmentStatus.DEFAULT_APPLIED);
  }

  // Package: warnings only
  const hasWeight = Boolean(record.weightLbs) || Boolean(record.weightOz);
  const hasDimensions =
    record.length !== undefined && record.width !== undefined && record.height !== undefined;

  if (!hasWeight && !hasDimensions) {
    raise(ShipmentStatus.WARNING);
    outcome.issues.push(ISSUES.MISSING_WEIGHT_AND_DIMENSIONS);
  } else if (!hasWeight) {
    raise(ShipmentStatus.WARNING);
    outcome.issues.push(ISSUES.MISSING_WEIGHT);
  } else if (!hasDimensions) {
    raise(ShipmentStatus.WARNING);
    outcome.issues.push(ISSUES.MISSING_DIMENSIONS);
  }

  return outcome;
}

function applySenderDefaults(target: FieldRecord, source: ContactAddress): void {
  target.shipFromFirstName = source.firstName;
  target.shipFromLastName = source.lastName;
  target.shipFromAddress = source.address;
  target.shipFromAddress2 = source.address2;
  target.shipFromCity = source.city;
  target.shipFromState = source.state;
  target.shipFromZip = source.zipCode;
  target.shipFromPhone = source.phone;
}
