/**
 * Unit tests for record validation and status derivation
 */

import { ISSUES, validateShipmentRecord } from '../ingest/validator';
import { ShipmentStatus } from '../types/domain';
import { DEFAULT_ADDRESS, fieldRecord } from './fixtures';

const fullPackage = { weightLbs: 2, weightOz: 0, length: 10, width: 8, height: 4 };

const fullSender = {
  shipFromFirstName: 'Shop',
  shipFromLastName: 'Floor',
  shipFromAddress: '9 Dock Rd',
  shipFromCity: 'Fontana',
  shipFromState: 'CA',
  shipFromZip: '92335',
};

describe('validateShipmentRecord', () => {
  describe('Sender handling', () => {
    it('should warn when the sender is missing and no default is given', () => {
      const outcome = validateShipmentRecord(fieldRecord());

      expect(outcome.status).toBe(ShipmentStatus.WARNING);
      expect(outcome.issues).toEqual([ISSUES.MISSING_SHIP_FROM, ISSUES.MISSING_WEIGHT_AND_DIMENSIONS]);
      expect(outcome.defaultApplied).toBe(false);
    });

    it('should fill the sender from the default address', () => {
      const outcome = validateShipmentRecord(fieldRecord(), DEFAULT_ADDRESS);

      expect(outcome.status).toBe(ShipmentStatus.DEFAULT_APPLIED);
      expect(outcome.issues).toEqual([ISSUES.MISSING_WEIGHT_AND_DIMENSIONS]);
      expect(outcome.defaultApplied).toBe(true);
      expect(outcome).toMatchObject({
        shipFromFirstName: 'Print',
        shipFromLastName: 'TTS',
        shipFromAddress: '502 W Arrow Hwy, STE P',
        shipFromAddress2: '',
        shipFromCity: 'San Dimas',
        shipFromState: 'CA',
        shipFromZip: '91773',
        shipFromPhone: '555-0100',
      });
    });

    it('should report default_applied with a clean issue list when the package is complete', () => {
      const outcome = validateShipmentRecord(fieldRecord(fullPackage), DEFAULT_ADDRESS);

      expect(outcome.status).toBe(ShipmentStatus.DEFAULT_APPLIED);
      expect(outcome.issues).toEqual([]);
    });

    it('should treat a sender with only a city as present', () => {
      const outcome = validateShipmentRecord(fieldRecord({ ...fullPackage, shipFromCity: 'Fontana' }), DEFAULT_ADDRESS);

      expect(outcome.status).toBe(ShipmentStatus.VALID);
      expect(outcome.shipFromAddress).toBe('');
      expect(outcome.defaultApplied).toBe(false);
    });

    it('should not modify the input record', () => {
      const record = fieldRecord();

      validateShipmentRecord(record, DEFAULT_ADDRESS);

      expect(record.shipFromAddress).toBe('');
      expect(record.defaultApplied).toBeUndefined();
    });

    it('should give the same result when validated again with the same default', () => {
      const once = validateShipmentRecord(fieldRecord(), DEFAULT_ADDRESS);
      const twice = validateShipmentRecord(once, DEFAULT_ADDRESS);

      expect(twice.status).toBe(once.status);
      expect(twice.issues).toEqual(once.issues);
      expect(twice.shipFromAddress).toBe(once.shipFromAddress);
      expect(twice.defaultApplied).toBe(true);
    });
  });

  describe('Recipient checks', () => {
    it('should fail with exactly the missing ZIP code', () => {
      const outcome = validateShipmentRecord(fieldRecord({ ...fullSender, ...fullPackage, shipToZip: '' }));

      expect(outcome.status).toBe(ShipmentStatus.ERROR);
      expect(outcome.issues).toEqual([ISSUES.MISSING_SHIP_TO_ZIP]);
    });

    it('should accept a recipient with only a last name', () => {
      const outcome = validateShipmentRecord(
        fieldRecord({ ...fullSender, ...fullPackage, shipToFirstName: '', shipToLastName: 'Whitfield' })
      );

      expect(outcome.status).toBe(ShipmentStatus.VALID);
      expect(outcome.issues).toEqual([]);
    });

    it('should list every recipient gap in order', () => {
      const outcome = validateShipmentRecord(
        fieldRecord({
          ...fullSender,
          ...fullPackage,
          shipToFirstName: ' ',
          shipToLastName: '',
          shipToAddress: '',
          shipToCity: '',
          shipToState: '',
          shipToZip: '',
        })
      );

      expect(outcome.issues).toEqual([
        ISSUES.MISSING_SHIP_TO_NAME,
        ISSUES.MISSING_SHIP_TO_ADDRESS,
        ISSUES.MISSING_SHIP_TO_CITY,
        ISSUES.MISSING_SHIP_TO_STATE,
        ISSUES.MISSING_SHIP_TO_ZIP,
      ]);
    });

    it('should keep error status when later checks only warn', () => {
      const outcome = validateShipmentRecord(fieldRecord({ shipToFirstName: '', shipToLastName: '' }));

      expect(outcome.status).toBe(ShipmentStatus.ERROR);
      expect(outcome.issues).toEqual([
        ISSUES.MISSING_SHIP_TO_NAME,
        ISSUES.MISSING_SHIP_FROM,
        ISSUES.MISSING_WEIGHT_AND_DIMENSIONS,
      ]);
    });

    it('should keep error status when the default address is applied', () => {
      const outcome = validateShipmentRecord(fieldRecord({ ...fullPackage, shipToCity: '' }), DEFAULT_ADDRESS);

      expect(outcome.status).toBe(ShipmentStatus.ERROR);
      expect(outcome.defaultApplied).toBe(true);
      expect(outcome.issues).toEqual([ISSUES.MISSING_SHIP_TO_CITY]);
    });
  });

  describe('Package checks', () => {
    it('should treat zero weights as missing', () => {
      const outcome = validateShipmentRecord(
        fieldRecord({ ...fullSender, weightLbs: 0, weightOz: 0, length: 10, width: 8, height: 4 })
      );

      expect(outcome.status).toBe(ShipmentStatus.WARNING);
      expect(outcome.issues).toEqual([ISSUES.MISSING_WEIGHT]);
    });

    it('should accept ounces alone as a weight', () => {
      const outcome = validateShipmentRecord(
        fieldRecord({ ...fullSender, weightOz: 8, length: 4, width: 4, height: 4 })
      );

      expect(outcome.status).toBe(ShipmentStatus.VALID);
    });

    it('should require all three dimensions', () => {
      const outcome = validateShipmentRecord(fieldRecord({ ...fullSender, weightLbs: 1, length: 10, width: 8 }));

      expect(outcome.status).toBe(ShipmentStatus.WARNING);
      expect(outcome.issues).toEqual([ISSUES.MISSING_DIMENSIONS]);
    });

    it('should count zero dimensions as present', () => {
      const outcome = validateShipmentRecord(
        fieldRecord({ ...fullSender, weightLbs: 1, length: 0, width: 0, height: 0 })
      );

      expect(outcome.status).toBe(ShipmentStatus.VALID);
    });
  });
});
