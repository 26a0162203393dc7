/**
 * Core domain models for the bulk shipment platform.
 * These are the shapes every module exchanges; storage and providers map to and from them.
 */

/**
 * Validation status of a shipment record.
 * The string values are stored and shared with other systems.
 */
export enum ShipmentStatus {
  VALID = 'valid',
  DEFAULT_APPLIED = 'default_applied',
  WARNING = 'warning',
  ERROR = 'error',
}

/**
 * Which verification provider answered
 */
export enum VerificationSource {
  PRIMARY = 'primary',
  SECONDARY = 'secondary',
  NONE = 'none',
}

export type AddressValidationStatus = 'valid' | 'pending';

export type LabelSize = 'letter_a4' | '4x6';

/**
 * Street-level address sent to verification providers
 */
export interface PostalAddress {
  street: string;
  street2?: string;
  city: string;
  state: string; // 2-letter US state code
  zip: string;
}

/**
 * Sender fields copied onto shipments from a saved address
 */
export interface ContactAddress {
  firstName: string;
  lastName: string;
  address: string;
  address2: string;
  city: string;
  state: string;
  zipCode: string;
  phone: string;
}

/**
 * Package weight and dimensions. Absent values stay undefined, never zero.
 */
export interface PackageDetails {
  weightLbs?: number;
  weightOz?: number;
  length?: number; // inches
  width?: number; // inches
  height?: number; // inches
}

export interface Dimensions {
  length?: number;
  width?: number;
  height?: number;
}

/**
 * The 23 positional columns of an upload row, typed
 */
export interface ShipmentFields extends PackageDetails {
  shipFromFirstName: string;
  shipFromLastName: string;
  shipFromAddress: string;
  shipFromAddress2: string;
  shipFromCity: string;
  shipFromZip: string;
  shipFromState: string;

  shipToFirstName: string;
  shipToLastName: string;
  shipToAddress: string;
  shipToAddress2: string;
  shipToCity: string;
  shipToZip: string;
  shipToState: string;

  shipToPhone: string;
  shipFromPhone: string;

  orderNo: string;
  itemSku: string;
}

/**
 * One parsed upload row
 */
export interface FieldRecord extends ShipmentFields {
  rowNumber: number;
  /** Set once the sender fields were filled from a default address */
  defaultApplied?: boolean;
}

export interface ValidationOutcome extends FieldRecord {
  status: ShipmentStatus;
  issues: string[];
  defaultApplied: boolean;
}

export interface VerificationOutcome {
  verified: boolean;
  source: VerificationSource;
  message: string;
  normalizedAddress?: PostalAddress;
}

/**
 * A named shipping speed/price configuration
 */
export interface ServiceTier {
  id: string;
  name: string;
  basePrice: number;
  perOunceRate: number;
  minPrice: number;
  maxPrice: number;
}

export interface PriceQuote {
  id: string;
  name: string;
  basePrice: number;
  perOunceRate: number;
  price: number;
}

/**
 * Persisted shipment
 */
export interface Shipment extends ShipmentFields {
  id: string;
  status: ShipmentStatus;
  validationIssues: string[];
  addressValidationStatus?: AddressValidationStatus;
  addressValidationSource?: VerificationSource;
  addressValidationMessage?: string;
  shippingService?: string;
  calculatedPrice?: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewShipment = Omit<Shipment, 'id' | 'createdAt' | 'updatedAt'>;

export type ShipmentChanges = Partial<NewShipment>;

export interface SavedAddress extends ContactAddress {
  id: string;
  name: string;
  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SavedPackage {
  id: string;
  name: string;
  length: number;
  width: number;
  height: number;
  weightLbs: number;
  weightOz: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Structured error carried as data in results
 */
export interface ErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Result type for operations that may fail
 */
export type Result<T, E = ErrorInfo> = { success: true; data: T } | { success: false; error: E };

export interface RowError {
  row: number;
  message: string;
}

export interface IngestResult {
  created: string[];
  errors: RowError[];
}
