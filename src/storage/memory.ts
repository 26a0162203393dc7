/**
 * In-process stores backed by Maps
 * Used by the example script and tests; records are cloned on the way in and out
 */

import { v4 as uuidv4 } from 'uuid';
import {
  NewSavedAddress,
  NewSavedPackage,
  SavedAddressRepository,
  SavedPackageRepository,
  ShipmentFilter,
  ShipmentRepository,
  ShipmentUpdate,
} from './types';
import { NewShipment, SavedAddress, SavedPackage, Shipment, ShipmentChanges } from '../types/domain';
import { ShippingError, ErrorCode } from '../errors';

interface StoredRecord {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

abstract class InMemoryStore<T extends StoredRecord, TInput> {
  protected records = new Map<string, T>();

  protected abstract readonly notFoundCode: ErrorCode;
  protected abstract readonly entityName: string;

  protected abstract build(input: TInput, id: string, now: Date): T;
  protected abstract merge(existing: T, changes: Partial<TInput>, now: Date): T;

  async create(input: TInput): Promise<T> {
    const record = this.build(structuredClone(input), uuidv4(), new Date());
    this.records.set(record.id, record);
    return structuredClone(record);
  }

  async findById(id: string): Promise<T | undefined> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async update(id: string, changes: Partial<TInput>): Promise<T> {
    const existing = this.records.get(id);
    if (!existing) {
      throw this.notFound(id);
    }
    const updated = this.merge(existing, structuredClone(changes), new Date());
    this.records.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  /**
   * Newest first; records created in the same millisecond keep reverse insertion order
   */
  protected newestFirst(): T[] {
    return Array.from(this.records.values())
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((record) => structuredClone(record));
  }

  protected notFound(id: string): ShippingError {
    return new ShippingError(this.notFoundCode, `${this.entityName} not found`, { details: { id } });
  }
}

export class InMemoryShipmentRepository
  extends InMemoryStore<Shipment, NewShipment>
  implements ShipmentRepository
{
  protected readonly notFoundCode = ErrorCode.SHIPMENT_NOT_FOUND;
  protected readonly entityName = 'Shipment';

  protected build(input: NewShipment, id: string, now: Date): Shipment {
    return { ...input, id, createdAt: now, updatedAt: now };
  }

  protected merge(existing: Shipment, changes: ShipmentChanges, now: Date): Shipment {
    return { ...existing, ...changes, id: existing.id, createdAt: existing.createdAt, updatedAt: now };
  }

  async findMany(ids: readonly string[]): Promise<Shipment[]> {
    const wanted = new Set(ids);
    return this.newestFirst().filter((shipment) => wanted.has(shipment.id));
  }

  async list(filter: ShipmentFilter = {}): Promise<Shipment[]> {
    const search = filter.search?.trim().toLowerCase();

    return this.newestFirst().filter((shipment) => {
      if (filter.status && shipment.status !== filter.status) {
        return false;
      }
      if (search) {
        return [
          shipment.orderNo,
          shipment.shipToFirstName,
          shipment.shipToLastName,
          shipment.shipToAddress,
          shipment.shipToCity,
        ].some((value) => value.toLowerCase().includes(search));
      }
      return true;
    });
  }

  async updateMany(updates: readonly ShipmentUpdate[]): Promise<number> {
    const missing = updates.find((update) => !this.records.has(update.id));
    if (missing) {
      throw this.notFound(missing.id);
    }

    const now = new Date();
    const merged = updates.map(({ id, changes }) => {
      const current = this.records.get(id);
      if (!current) {
        throw this.notFound(id);
      }
      return this.merge(current, structuredClone(changes), now);
    });
    merged.forEach((shipment) => this.records.set(shipment.id, shipment));

    return merged.length;
  }

  async deleteMany(ids: readonly string[]): Promise<number> {
    return ids.reduce((deleted, id) => (this.records.delete(id) ? deleted + 1 : deleted), 0);
  }
}

export class InMemorySavedAddressRepository
  extends InMemoryStore<SavedAddress, NewSavedAddress>
  implements SavedAddressRepository
{
  protected readonly notFoundCode = ErrorCode.ADDRESS_NOT_FOUND;
  protected readonly entityName = 'Address';

  protected build(input: NewSavedAddress, id: string, now: Date): SavedAddress {
    return { ...input, id, createdAt: now, updatedAt: now };
  }

  protected merge(existing: SavedAddress, changes: Partial<NewSavedAddress>, now: Date): SavedAddress {
    return { ...existing, ...changes, id: existing.id, createdAt: existing.createdAt, updatedAt: now };
  }

  async list(): Promise<SavedAddress[]> {
    return Array.from(this.records.values())
      .sort((a, b) => Number(b.isDefault) - Number(a.isDefault) || a.name.localeCompare(b.name))
      .map((address) => structuredClone(address));
  }

  async findDefault(): Promise<SavedAddress | undefined> {
    const [first] = await this.list();
    return first;
  }
}

export class InMemorySavedPackageRepository
  extends InMemoryStore<SavedPackage, NewSavedPackage>
  implements SavedPackageRepository
{
  protected readonly notFoundCode = ErrorCode.PACKAGE_NOT_FOUND;
  protected readonly entityName = 'Package';

  protected build(input: NewSavedPackage, id: string, now: Date): SavedPackage {
    return { ...input, id, createdAt: now, updatedAt: now };
  }

  protected merge(existing: SavedPackage, changes: Partial<NewSavedPackage>, now: Date): SavedPackage {
    return { ...existing, ...changes, id: existing.id, createdAt: existing.createdAt, updatedAt: now };
  }

  async list(): Promise<SavedPackage[]> {
    return Array.from(this.records.values())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((pkg) => structuredClone(pkg));
  }
}
