/**
 * Storage contracts
 * The platform depends only on these interfaces; any record store can sit behind them
 */

import {
  NewShipment,
  SavedAddress,
  SavedPackage,
  Shipment,
  ShipmentChanges,
  ShipmentStatus,
} from '../types/domain';

export interface ShipmentFilter {
  status?: ShipmentStatus;
  /** Case-insensitive match on order number and recipient name, street and city */
  search?: string;
}

export interface ShipmentUpdate {
  id: string;
  changes: ShipmentChanges;
}

export interface ShipmentRepository {
  create(input: NewShipment): Promise<Shipment>;
  findById(id: string): Promise<Shipment | undefined>;
  findMany(ids: readonly string[]): Promise<Shipment[]>;
  /** Newest first */
  list(filter?: ShipmentFilter): Promise<Shipment[]>;
  /** Rejects with SHIPMENT_NOT_FOUND for unknown ids */
  update(id: string, changes: ShipmentChanges): Promise<Shipment>;
  /** All or nothing: unknown ids reject before anything is written */
  updateMany(updates: readonly ShipmentUpdate[]): Promise<number>;
  delete(id: string): Promise<boolean>;
  deleteMany(ids: readonly string[]): Promise<number>;
}

export type NewSavedAddress = Omit<SavedAddress, 'id' | 'createdAt' | 'updatedAt'>;
export type NewSavedPackage = Omit<SavedPackage, 'id' | 'createdAt' | 'updatedAt'>;

export interface SavedAddressRepository {
  create(input: NewSavedAddress): Promise<SavedAddress>;
  findById(id: string): Promise<SavedAddress | undefined>;
  /** Default address first, then by name */
  list(): Promise<SavedAddress[]>;
  update(id: string, changes: Partial<NewSavedAddress>): Promise<SavedAddress>;
  delete(id: string): Promise<boolean>;
  /** The address flagged as default, else the first listed */
  findDefault(): Promise<SavedAddress | undefined>;
}

export interface SavedPackageRepository {
  create(input: NewSavedPackage): Promise<SavedPackage>;
  findById(id: string): Promise<SavedPackage | undefined>;
  /** Ordered by name */
  list(): Promise<SavedPackage[]>;
  update(id: string, changes: Partial<NewSavedPackage>): Promise<SavedPackage>;
  delete(id: string): Promise<boolean>;
}
