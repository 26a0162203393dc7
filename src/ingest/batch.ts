/**
 * Batch ingestion: parse -> validate -> persist -> verify -> price, one row at a time.
 * A failing row is reported with its row number and never stops the batch;
 * a malformed file rejects the whole batch before anything is written.
 */

import { parseShipmentFile, ParseOptions } from './parser';
import { validateShipmentRecord } from './validator';
import { verificationChanges, verifyShipmentAddresses } from '../address/shipment';
import { AddressVerificationService } from '../address/verifier';
import { PriceQuoter } from '../pricing/quoter';
import { ShipmentRepository } from '../storage/types';
import {
  ContactAddress,
  FieldRecord,
  IngestResult,
  NewShipment,
  PackageDetails,
  Result,
  RowError,
  Shipment,
  ShipmentChanges,
  ValidationOutcome,
} from '../types/domain';
import { logger } from '../config/logger';
import { errorMessage } from '../errors';

const log = logger.child('ingest');

export interface BatchIngestorDeps {
  shipments: ShipmentRepository;
  verifier: AddressVerificationService;
  quoter: PriceQuoter;
  parseOptions?: ParseOptions;
}

export function toNewShipment(outcome: ValidationOutcome): NewShipment {
  const { rowNumber: _rowNumber, defaultApplied: _defaultApplied, issues, status, ...fields } = outcome;
  return { ...fields, status, validationIssues: issues };
}

export function hasPackageData(pkg: PackageDetails): boolean {
  return [pkg.weightLbs, pkg.weightOz, pkg.length, pkg.width, pkg.height].some((value) => Boolean(value));
}

export class ShipmentBatchIngestor {
  constructor(private readonly deps: BatchIngestorDeps) {}

  async ingest(bytes: Uint8Array | string, defaultAddress?: ContactAddress): Promise<IngestResult> {
    const records = await parseShipmentFile(bytes, this.deps.parseOptions);
    log.info(`Parsed ${records.length} records from CSV`, { defaultAddress: Boolean(defaultAddress) });

    const results: Array<Result<string, RowError>> = [];
    for (const record of records) {
      results.push(await this.ingestRecord(record, defaultAddress));
    }

    const created = results.flatMap((result) => (result.success ? [result.data] : []));
    const errors = results.flatMap((result) => (result.success ? [] : [result.error]));

    log.info(`Created ${created.length} shipments, ${errors.length} errors`);

    return { created, errors };
  }

  /**
   * The row's writes succeed or are undone together
   */
  async ingestRecord(
    record: FieldRecord,
    defaultAddress?: ContactAddress
  ): Promise<Result<string, RowError>> {
    const outcome = validateShipmentRecord(record, defaultAddress);
    let shipment: Shipment | undefined;

    try {
      shipment = await this.deps.shipments.create(toNewShipment(outcome));

      const verification = await verifyShipmentAddresses(this.deps.verifier, shipment);
      if (verification.shipFrom && !verification.shipFrom.verified) {
        log.warn(`Ship From address unverified for row ${record.rowNumber}`, {
          message: verification.shipFrom.message,
        });
      }

      const changes: ShipmentChanges = {
        ...(verification.shipTo && verificationChanges(verification.shipTo)),
        ...this.initialPricing(shipment),
      };

      if (Object.keys(changes).length > 0) {
        await this.deps.shipments.update(shipment.id, changes);
      }

      return { success: true, data: shipment.id };
    } catch (error) {
      log.error(`Error creating shipment from row ${record.rowNumber}: ${errorMessage(error)}`);
      if (shipment) {
        await this.discard(shipment.id);
      }
      return { success: false, error: { row: record.rowNumber, message: errorMessage(error) } };
    }
  }

  private initialPricing(shipment: Shipment): ShipmentChanges {
    if (!hasPackageData(shipment)) {
      return {};
    }

    const { weightLbs, weightOz, length, width, height } = shipment;
    const dimensions = { length, width, height };
    const shippingService = this.deps.quoter.cheapest(weightLbs, weightOz, dimensions);

    return {
      shippingService,
      calculatedPrice: this.deps.quoter.quote(shippingService, weightLbs, weightOz, dimensions),
    };
  }

  private async discard(id: string): Promise<void> {
    try {
      await this.deps.shipments.delete(id);
    } catch (error) {
      log.error(`Failed to remove partially created shipment ${id}: ${errorMessage(error)}`);
    }
  }
}
