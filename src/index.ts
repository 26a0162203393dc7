/**
 * Main entry point for the bulk shipment platform
 */

export { ShippingPlatformService, createInMemoryPlatform } from './service';
export type { ShippingPlatformDeps, UploadResult, ShipmentDetails, BulkUpdateResult, PurchaseResult } from './service';
export { ShipmentBatchIngestor } from './ingest/batch';
export { parseShipmentFile, COLUMN_LABELS } from './ingest/parser';
export type { ParseOptions } from './ingest/parser';
export { validateShipmentRecord, ISSUES } from './ingest/validator';
export { AddressVerifier, createAddressVerifier, MANUAL_VERIFICATION_MESSAGE } from './address/verifier';
export type { AddressVerificationService, AddressVerifierOptions, VerifyOptions } from './address/verifier';
export { UspsAddressProvider } from './address/usps';
export { GoogleAddressProvider } from './address/google';
export { BaseAddressProvider } from './address/types';
export type { AddressProvider, ProviderVerification } from './address/types';
export { PriceQuoter, roundCurrency } from './pricing/quoter';
export { SERVICE_TIERS, DEFAULT_SERVICE_ID } from './config/tiers';
export {
  InMemoryShipmentRepository,
  InMemorySavedAddressRepository,
  InMemorySavedPackageRepository,
} from './storage/memory';
export type { ShipmentRepository, SavedAddressRepository, SavedPackageRepository } from './storage/types';
export { seedSampleData } from './seed';
export type {
  Shipment,
  SavedAddress,
  SavedPackage,
  PostalAddress,
  PriceQuote,
  ServiceTier,
  VerificationOutcome,
} from './types/domain';
export { ShipmentStatus, VerificationSource } from './types/domain';
export { ShippingError, ErrorCode } from './errors';
export { config } from './config';
export { logger } from './config/logger';
