/**
 * Shipping platform service
 * The operations request handlers call: upload, review, bulk edits, pricing and checkout
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { ShipmentBatchIngestor } from './ingest/batch';
import { ParseOptions } from './ingest/parser';
import { recipientAddress, verificationChanges } from './address/shipment';
import { AddressVerificationService, createAddressVerifier } from './address/verifier';
import { PriceQuoter, roundCurrency } from './pricing/quoter';
import { formatPackageDetails, formatShipFrom, formatShipTo } from './format';
import {
  InMemorySavedAddressRepository,
  InMemorySavedPackageRepository,
  InMemoryShipmentRepository,
} from './storage/memory';
import {
  NewSavedAddress,
  SavedAddressRepository,
  SavedPackageRepository,
  ShipmentFilter,
  ShipmentRepository,
  ShipmentUpdate,
} from './storage/types';
import {
  ContactAddress,
  ErrorInfo,
  LabelSize,
  PriceQuote,
  SavedAddress,
  SavedPackage,
  Shipment,
  ShipmentChanges,
} from './types/domain';
import {
  BulkDeleteRequestSchema,
  BulkServiceRequestSchema,
  BulkUpdateRequestSchema,
  CHEAPEST_SERVICE,
  PurchaseRequestSchema,
  SavedAddressInputSchema,
  SavedPackageInputSchema,
  ServiceQuerySchema,
  VerifyAddressesRequestSchema,
} from './types/validation';
import { ShippingError, ErrorCode, errorMessage, isNotFoundError } from './errors';
import { config } from './config';
import { logger } from './config/logger';

const log = logger.child('service');

export interface ShippingPlatformDeps {
  shipments: ShipmentRepository;
  addresses: SavedAddressRepository;
  packages: SavedPackageRepository;
  verifier?: AddressVerificationService;
  quoter?: PriceQuoter;
  parseOptions?: ParseOptions;
}

export interface UploadResult {
  createdCount: number;
  errorCount: number;
  errorDetails: Array<{ row: number; error: string }>;
  createdIds: string[];
}

export interface ShipmentDetails extends Shipment {
  shipFromFormatted: string;
  shipToFormatted: string;
  packageDetailsFormatted: string;
  availableServices: PriceQuote[];
}

export interface BulkUpdateResult {
  updated: number;
  failures: ErrorInfo[];
}

export interface PurchaseResult {
  orderId: string;
  labelSize: LabelSize;
  shipmentCount: number;
  grandTotal: number;
  message: string;
}

function parseRequest<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ShippingError(ErrorCode.INVALID_REQUEST, 'Invalid request format', {
      details: {
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`),
      },
    });
  }
  return result.data;
}

function senderChanges(address: ContactAddress): ShipmentChanges {
  return {
    shipFromFirstName: address.firstName,
    shipFromLastName: address.lastName,
    shipFromAddress: address.address,
    shipFromAddress2: address.address2,
    shipFromCity: address.city,
    shipFromState: address.state,
    shipFromZip: address.zipCode,
    shipFromPhone: address.phone,
  };
}

/**
 * Main service for the bulk shipment workflow
 */
export class ShippingPlatformService {
  private readonly shipments: ShipmentRepository;
  private readonly addresses: SavedAddressRepository;
  private readonly packages: SavedPackageRepository;
  private readonly verifier: AddressVerificationService;
  private readonly quoter: PriceQuoter;
  private readonly ingestor: ShipmentBatchIngestor;

  constructor(deps: ShippingPlatformDeps) {
    this.shipments = deps.shipments;
    this.addresses = deps.addresses;
    this.packages = deps.packages;
    this.verifier = deps.verifier ?? createAddressVerifier();
    this.quoter = deps.quoter ?? new PriceQuoter();
    this.ingestor = new ShipmentBatchIngestor({
      shipments: this.shipments,
      verifier: this.verifier,
      quoter: this.quoter,
      parseOptions: deps.parseOptions,
    });

    log.debug('Shipping platform service initialized', {
      environment: config.environment,
      services: this.quoter.serviceIds,
    });
  }

  /**
   * Ingest an uploaded file. Sender gaps are filled from the default saved address.
   */
  async uploadShipments(bytes: Uint8Array | string): Promise<UploadResult> {
    log.info('CSV upload request received', { size: bytes.length });

    const defaultAddress = await this.addresses.findDefault();
    const { created, errors } = await this.ingestor.ingest(bytes, defaultAddress);

    return {
      createdCount: created.length,
      errorCount: errors.length,
      errorDetails: errors.map(({ row, message }) => ({ row, error: message })),
      createdIds: created,
    };
  }

  async listShipments(filter: ShipmentFilter = {}): Promise<Shipment[]> {
    return this.shipments.list(filter);
  }

  async getShipment(id: string): Promise<Shipment> {
    const shipment = await this.shipments.findById(id);
    if (!shipment) {
      throw new ShippingError(ErrorCode.SHIPMENT_NOT_FOUND, 'Shipment not found', { details: { id } });
    }
    return shipment;
  }

  async getShipmentDetails(id: string): Promise<ShipmentDetails> {
    const shipment = await this.getShipment(id);
    const { weightLbs, weightOz, length, width, height } = shipment;

    return {
      ...shipment,
      shipFromFormatted: formatShipFrom(shipment),
      shipToFormatted: formatShipTo(shipment),
      packageDetailsFormatted: formatPackageDetails(shipment),
      availableServices: this.quoter.quoteAll(weightLbs, weightOz, { length, width, height }),
    };
  }

  async updateShipment(id: string, changes: ShipmentChanges): Promise<Shipment> {
    return this.shipments.update(id, changes);
  }

  async deleteShipment(id: string): Promise<void> {
    const deleted = await this.shipments.delete(id);
    if (!deleted) {
      throw new ShippingError(ErrorCode.SHIPMENT_NOT_FOUND, 'Shipment not found', { details: { id } });
    }
  }

  /**
   * Copy a saved address and/or package onto many shipments.
   * Each group is written atomically; an unknown shipment, address or package id
   * skips only its own group.
   */
  async bulkUpdate(payload: unknown): Promise<BulkUpdateResult> {
    const request = parseRequest(BulkUpdateRequestSchema, payload);
    log.info(`Bulk update request: ${request.shipmentIds.length} shipments`);

    const failures: ErrorInfo[] = [];
    let updated = 0;

    const runGroup = async (group: () => Promise<number>): Promise<void> => {
      try {
        updated += await group();
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
        log.warn(`Bulk update group skipped: ${error.message}`);
        failures.push(error.toErrorInfo());
      }
    };

    const { addressId, packageId } = request;
    if (addressId) {
      await runGroup(async () => {
        const targets = await this.requireShipments(request.shipmentIds);
        return this.applySavedAddress(targets, addressId);
      });
    }
    if (packageId) {
      await runGroup(async () => {
        const targets = await this.requireShipments(request.shipmentIds);
        return this.applySavedPackage(targets, packageId);
      });
    }

    return { updated, failures };
  }

  /**
   * Every requested shipment, or SHIPMENT_NOT_FOUND naming the missing ids
   */
  private async requireShipments(ids: readonly string[]): Promise<Shipment[]> {
    const found = await this.shipments.findMany(ids);
    const foundIds = new Set(found.map((shipment) => shipment.id));
    const missing = [...new Set(ids)].filter((id) => !foundIds.has(id));

    if (missing.length > 0) {
      throw new ShippingError(ErrorCode.SHIPMENT_NOT_FOUND, 'Shipment not found', {
        details: { shipmentIds: missing },
      });
    }
    return found;
  }

  private async applySavedAddress(targets: Shipment[], addressId: string): Promise<number> {
    const address = await this.addresses.findById(addressId);
    if (!address) {
      throw new ShippingError(ErrorCode.ADDRESS_NOT_FOUND, 'Address not found', { details: { addressId } });
    }

    const count = await this.shipments.updateMany(
      targets.map((shipment) => ({ id: shipment.id, changes: senderChanges(address) }))
    );
    log.info(`Updated ${count} shipments with address ${addressId}`);
    return count;
  }

  /**
   * Package fields change the price of shipments that already have a service
   */
  private async applySavedPackage(targets: Shipment[], packageId: string): Promise<number> {
    const pkg = await this.packages.findById(packageId);
    if (!pkg) {
      throw new ShippingError(ErrorCode.PACKAGE_NOT_FOUND, 'Package not found', { details: { packageId } });
    }

    const { weightLbs, weightOz, length, width, height } = pkg;
    const updates: ShipmentUpdate[] = targets.map((shipment) => ({
      id: shipment.id,
      changes: {
        weightLbs,
        weightOz,
        length,
        width,
        height,
        ...(shipment.shippingService
          ? {
              calculatedPrice: this.quoter.quote(shipment.shippingService, weightLbs, weightOz, {
                length,
                width,
                height,
              }),
            }
          : {}),
      },
    }));

    const count = await this.shipments.updateMany(updates);
    log.info(`Updated ${count} shipments with package ${packageId}`);
    return count;
  }

  async bulkDelete(payload: unknown): Promise<{ deleted: number }> {
    const request = parseRequest(BulkDeleteRequestSchema, payload);
    log.info(`Bulk delete request: ${request.shipmentIds.length} shipments`);

    return { deleted: await this.shipments.deleteMany(request.shipmentIds) };
  }

  /**
   * Re-run address verification; no ids means every shipment
   */
  async verifyAddresses(payload: unknown = {}): Promise<{ verified: number }> {
    const request = parseRequest(VerifyAddressesRequestSchema, payload);
    const targets =
      request.shipmentIds && request.shipmentIds.length > 0
        ? await this.shipments.findMany(request.shipmentIds)
        : await this.shipments.list();

    log.info(`Address verification request: ${targets.length} shipments`);

    let verified = 0;
    for (const shipment of targets) {
      const address = recipientAddress(shipment);
      if (!address) {
        continue;
      }
      try {
        const outcome = await this.verifier.verify(address, { fresh: true });
        await this.shipments.update(shipment.id, verificationChanges(outcome));
        verified++;
      } catch (error) {
        log.warn(`Address verification failed for shipment ${shipment.id}: ${errorMessage(error)}`);
      }
    }

    return { verified };
  }

  /**
   * Available services with prices for the given package, cheapest first
   */
  listServices(query: unknown = {}): PriceQuote[] {
    const { weight_lbs, weight_oz, length, width, height } = parseRequest(ServiceQuerySchema, query);
    return this.quoter.quoteAll(weight_lbs, weight_oz, { length, width, height });
  }

  async bulkSelectService(payload: unknown): Promise<{ updated: number }> {
    const request = parseRequest(BulkServiceRequestSchema, payload);
    if (request.service !== CHEAPEST_SERVICE && !this.quoter.hasService(request.service)) {
      throw new ShippingError(ErrorCode.INVALID_REQUEST, `Unknown shipping service: ${request.service}`, {
        details: { service: request.service, allowed: [...this.quoter.serviceIds, CHEAPEST_SERVICE] },
      });
    }

    log.info(`Bulk service update: ${request.shipmentIds.length} shipments to ${request.service}`);

    const targets = await this.requireShipments(request.shipmentIds);
    const updates: ShipmentUpdate[] = targets.map((shipment) => {
      const { weightLbs, weightOz, length, width, height } = shipment;
      const dimensions = { length, width, height };
      const shippingService =
        request.service === CHEAPEST_SERVICE
          ? this.quoter.cheapest(weightLbs, weightOz, dimensions)
          : request.service;

      return {
        id: shipment.id,
        changes: {
          shippingService,
          calculatedPrice: this.quoter.quote(shippingService, weightLbs, weightOz, dimensions),
        },
      };
    });

    return { updated: await this.shipments.updateMany(updates) };
  }

  /**
   * Checkout stub: totals the selected shipments and issues an order id
   */
  async purchase(payload: unknown): Promise<PurchaseResult> {
    const request = parseRequest(PurchaseRequestSchema, payload);
    if (!request.termsAccepted) {
      throw new ShippingError(ErrorCode.PRECONDITION_FAILED, 'Terms must be accepted');
    }

    log.info(`Purchase request: ${request.shipmentIds.length} shipments, label size: ${request.labelSize}`);

    const shipments = await this.requireShipments(request.shipmentIds);
    const grandTotal = roundCurrency(
      shipments.reduce((total, shipment) => total + (shipment.calculatedPrice ?? 0), 0)
    );

    log.info(`Purchase completed: $${grandTotal.toFixed(2)} total`);

    return {
      orderId: uuidv4(),
      labelSize: request.labelSize,
      shipmentCount: shipments.length,
      grandTotal,
      message: 'Labels created successfully',
    };
  }

  // Saved addresses

  async createAddress(payload: unknown): Promise<SavedAddress> {
    const input: NewSavedAddress = parseRequest(SavedAddressInputSchema, payload);
    if (input.isDefault) {
      await this.clearDefaultAddress();
    }
    return this.addresses.create(input);
  }

  async listAddresses(): Promise<SavedAddress[]> {
    return this.addresses.list();
  }

  async getAddress(id: string): Promise<SavedAddress> {
    const address = await this.addresses.findById(id);
    if (!address) {
      throw new ShippingError(ErrorCode.ADDRESS_NOT_FOUND, 'Address not found', { details: { id } });
    }
    return address;
  }

  async updateAddress(id: string, payload: unknown): Promise<SavedAddress> {
    const changes = parseRequest(SavedAddressInputSchema.partial(), payload);
    if (changes.isDefault) {
      await this.clearDefaultAddress(id);
    }
    return this.addresses.update(id, changes);
  }

  async deleteAddress(id: string): Promise<void> {
    if (!(await this.addresses.delete(id))) {
      throw new ShippingError(ErrorCode.ADDRESS_NOT_FOUND, 'Address not found', { details: { id } });
    }
  }

  private async clearDefaultAddress(exceptId?: string): Promise<void> {
    const current = await this.addresses.list();
    for (const address of current) {
      if (address.isDefault && address.id !== exceptId) {
        await this.addresses.update(address.id, { isDefault: false });
      }
    }
  }

  // Saved packages

  async createPackage(payload: unknown): Promise<SavedPackage> {
    return this.packages.create(parseRequest(SavedPackageInputSchema, payload));
  }

  async listPackages(): Promise<SavedPackage[]> {
    return this.packages.list();
  }

  async getPackage(id: string): Promise<SavedPackage> {
    const pkg = await this.packages.findById(id);
    if (!pkg) {
      throw new ShippingError(ErrorCode.PACKAGE_NOT_FOUND, 'Package not found', { details: { id } });
    }
    return pkg;
  }

  async updatePackage(id: string, payload: unknown): Promise<SavedPackage> {
    return this.packages.update(id, parseRequest(SavedPackageInputSchema.partial(), payload));
  }

  async deletePackage(id: string): Promise<void> {
    if (!(await this.packages.delete(id))) {
      throw new ShippingError(ErrorCode.PACKAGE_NOT_FOUND, 'Package not found', { details: { id } });
    }
  }
}

/**
 * Service wired to in-process stores
 */
export function createInMemoryPlatform(
  overrides: Partial<ShippingPlatformDeps> = {}
): ShippingPlatformService {
  return new ShippingPlatformService({
    shipments: new InMemoryShipmentRepository(),
    addresses: new InMemorySavedAddressRepository(),
    packages: new InMemorySavedPackageRepository(),
    ...overrides,
  });
}
