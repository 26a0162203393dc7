/**
 * Integration tests for batch ingestion
 * Runs the full parse -> validate -> persist -> verify -> price pipeline against in-process stores
 */

import { ShipmentBatchIngestor } from '../ingest/batch';
import { InMemoryShipmentRepository } from '../storage/memory';
import { PriceQuoter } from '../pricing/quoter';
import { ErrorCode } from '../errors';
import { NewShipment, Shipment, ShipmentChanges, ShipmentStatus, VerificationSource } from '../types/domain';
import { csvFile, csvRow, DEFAULT_ADDRESS, PACKAGE, RECIPIENT, SENDER, StaticVerifier } from './fixtures';

const parseOptions = { delimiter: ',', validateHeaders: false };

class FailingCreateRepository extends InMemoryShipmentRepository {
  async create(input: NewShipment): Promise<Shipment> {
    if (input.orderNo === 'BAD') {
      throw new Error('disk full');
    }
    return super.create(input);
  }
}

class FailingUpdateRepository extends InMemoryShipmentRepository {
  async update(id: string, changes: ShipmentChanges): Promise<Shipment> {
    if (changes.shippingService) {
      throw new Error('write conflict');
    }
    return super.update(id, changes);
  }
}

describe('ShipmentBatchIngestor', () => {
  let shipments: InMemoryShipmentRepository;
  let verifier: StaticVerifier;
  let ingestor: ShipmentBatchIngestor;

  beforeEach(() => {
    shipments = new InMemoryShipmentRepository();
    verifier = new StaticVerifier();
    ingestor = new ShipmentBatchIngestor({ shipments, verifier, quoter: new PriceQuoter(), parseOptions });
  });

  it('should persist, verify and price every row', async () => {
    const content = csvFile([csvRow({ ...SENDER, ...RECIPIENT, ...PACKAGE, orderNo: 'A-1' })]);

    const result = await ingestor.ingest(content);

    expect(result.errors).toEqual([]);
    expect(result.created).toHaveLength(1);

    const stored = await shipments.findById(result.created[0]);
    expect(stored).toMatchObject({
      orderNo: 'A-1',
      status: ShipmentStatus.VALID,
      validationIssues: [],
      addressValidationStatus: 'valid',
      addressValidationSource: VerificationSource.PRIMARY,
      addressValidationMessage: 'Address validated',
      shippingService: 'ground_shipping',
      calculatedPrice: 4.1,
    });
    expect(verifier.calls.map((address) => address.street)).toEqual(['42 Test Ave', '9 Dock Rd']);
  });

  it('should store rows that fail validation with their issues', async () => {
    const content = csvFile([csvRow({ ...SENDER, ...RECIPIENT, ...PACKAGE, shipToZip: '' })]);

    const { created, errors } = await ingestor.ingest(content);

    expect(errors).toEqual([]);
    const stored = await shipments.findById(created[0]);
    expect(stored?.status).toBe(ShipmentStatus.ERROR);
    expect(stored?.validationIssues).toEqual(['Missing Ship To ZIP code']);
  });

  it('should apply the default sender address', async () => {
    const content = csvFile([csvRow({ ...RECIPIENT, ...PACKAGE })]);

    const { created } = await ingestor.ingest(content, DEFAULT_ADDRESS);

    const stored = await shipments.findById(created[0]);
    expect(stored?.status).toBe(ShipmentStatus.DEFAULT_APPLIED);
    expect(stored?.shipFromCity).toBe('San Dimas');
    expect(stored?.shipFromZip).toBe('91773');
  });

  it('should leave shipments without package data unpriced', async () => {
    const content = csvFile([csvRow({ ...SENDER, ...RECIPIENT })]);

    const { created } = await ingestor.ingest(content);

    const stored = await shipments.findById(created[0]);
    expect(stored?.shippingService).toBeUndefined();
    expect(stored?.calculatedPrice).toBeUndefined();
  });

  it('should skip verification for a recipient without a street', async () => {
    const content = csvFile([csvRow({ ...RECIPIENT, shipToAddress: '' })]);

    const { created } = await ingestor.ingest(content);

    const stored = await shipments.findById(created[0]);
    expect(stored?.addressValidationStatus).toBeUndefined();
    expect(verifier.calls).toHaveLength(0);
  });

  it('should store a pending status when the recipient cannot be verified', async () => {
    verifier = new StaticVerifier({
      verified: false,
      source: VerificationSource.NONE,
      message: 'manual verification required',
    });
    ingestor = new ShipmentBatchIngestor({ shipments, verifier, quoter: new PriceQuoter(), parseOptions });

    const { created } = await ingestor.ingest(csvFile([csvRow({ ...RECIPIENT })]));

    const stored = await shipments.findById(created[0]);
    expect(stored?.addressValidationStatus).toBe('pending');
    expect(stored?.addressValidationSource).toBe(VerificationSource.NONE);
    expect(stored?.addressValidationMessage).toBe('manual verification required');
  });

  it('should report a failing row and keep going', async () => {
    shipments = new FailingCreateRepository();
    ingestor = new ShipmentBatchIngestor({ shipments, verifier, quoter: new PriceQuoter(), parseOptions });

    const content = csvFile([
      csvRow({ ...RECIPIENT, orderNo: 'A-1' }),
      csvRow({ ...RECIPIENT, orderNo: 'BAD' }),
      csvRow({ ...RECIPIENT, orderNo: 'A-3' }),
    ]);

    const result = await ingestor.ingest(content);

    expect(result.errors).toEqual([{ row: 2, message: 'disk full' }]);
    expect(result.created).toHaveLength(2);
    const stored = await shipments.list();
    expect(stored.map((shipment) => shipment.orderNo).sort()).toEqual(['A-1', 'A-3']);
  });

  it('should remove the shipment when a later step of its row fails', async () => {
    shipments = new FailingUpdateRepository();
    ingestor = new ShipmentBatchIngestor({ shipments, verifier, quoter: new PriceQuoter(), parseOptions });

    const result = await ingestor.ingest(csvFile([csvRow({ ...SENDER, ...RECIPIENT, ...PACKAGE })]));

    expect(result.created).toEqual([]);
    expect(result.errors).toEqual([{ row: 1, message: 'write conflict' }]);
    await expect(shipments.list()).resolves.toEqual([]);
  });

  it('should reject a malformed file before writing anything', async () => {
    await expect(ingestor.ingest('only one line')).rejects.toMatchObject({ code: ErrorCode.FORMAT_ERROR });
    await expect(shipments.list()).resolves.toEqual([]);
  });
});
