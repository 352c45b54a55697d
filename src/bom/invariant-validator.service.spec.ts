import { Test, TestingModule } from '@nestjs/testing';
import { InvariantValidatorService } from './invariant-validator.service';
import { BomIntegrityError } from '../common/errors';
import { CanonicalRecord } from '../common/interfaces';
import { emptyRecord } from './types';

describe('InvariantValidatorService', () => {
  let service: InvariantValidatorService;

  const record = (overrides: Partial<CanonicalRecord>): CanonicalRecord => ({ ...emptyRecord(), ...overrides });

  const captureError = (operation: () => void): unknown => {
    try {
      operation();
    } catch (error) {
      return error;
    }
    return undefined;
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [InvariantValidatorService],
    }).compile();

    service = module.get<InvariantValidatorService>(InvariantValidatorService);
  });

  it('should accept a consistent table', () => {
    const records = [
      record({ item: '1', quantity: '1', designator: 'R1' }),
      record({ item: '1', quantity: '1', designator: 'R2' }),
      record({ item: '2', quantity: '2', designator: 'C1,C2' }),
      record({ item: '3', quantity: '1', designator: 'PCB' }),
    ];
    expect(() => service.validate(records, 'Main')).not.toThrow();
  });

  describe('checkQuantityMatchesDesignators', () => {
    it('should name the record whose quantity differs from its designators', () => {
      const error = captureError(() =>
        service.checkQuantityMatchesDesignators([record({ item: '7', quantity: '2', designator: 'R1' })]),
      );

      expect(error).toBeInstanceOf(BomIntegrityError);
      expect(error).toMatchObject({
        message: 'Quantity 2 does not match 1 designators "R1" for item 7',
        offendingValues: ['7', 'R1'],
      });
    });

    it('should skip zero, empty and fractional quantities', () => {
      const records = [
        record({ quantity: '0', designator: 'U1' }),
        record({ quantity: '', designator: 'U2,U3' }),
        record({ quantity: '0.5', designator: '' }),
      ];
      expect(() => service.checkQuantityMatchesDesignators(records)).not.toThrow();
    });

    it('should reject a non-numeric quantity', () => {
      expect(() =>
        service.checkQuantityMatchesDesignators([record({ item: '8', quantity: 'two', designator: 'R1,R2' })]),
      ).toThrow('Invalid quantity "two" for item 8');
    });
  });

  describe('checkDuplicateDesignators', () => {
    it('should report a designator shared by two records', () => {
      const error = captureError(() =>
        service.checkDuplicateDesignators([
          record({ item: '1', quantity: '1', designator: 'C5' }),
          record({ item: '2', quantity: '1', designator: 'C5' }),
        ]),
      );

      expect(error).toBeInstanceOf(BomIntegrityError);
      expect(error).toMatchObject({ message: 'Duplicate designators found: C5', offendingValues: ['C5'] });
    });

    it('should list every duplicate once', () => {
      const error = captureError(() =>
        service.checkDuplicateDesignators([
          record({ quantity: '2', designator: 'R1,R2' }),
          record({ quantity: '2', designator: 'R2,R1' }),
          record({ quantity: '1', designator: 'R2' }),
        ]),
      );
      expect(error).toMatchObject({ offendingValues: ['R2', 'R1'] });
    });

    it('should still count records with an empty quantity', () => {
      const error = captureError(() =>
        service.validate([
          record({ item: '1', quantity: '1', designator: 'R5' }),
          record({ item: '2', quantity: '', designator: 'R5' }),
        ]),
      );
      expect(error).toMatchObject({ message: 'Duplicate designators found: R5', offendingValues: ['R5'] });
    });

    it('should still count records with a fractional quantity', () => {
      const error = captureError(() =>
        service.validate([
          record({ item: '1', quantity: '0.5', designator: 'H1' }),
          record({ item: '2', quantity: '0.5', designator: 'H1' }),
        ]),
      );
      expect(error).toBeInstanceOf(BomIntegrityError);
      expect(error).toMatchObject({ offendingValues: ['H1'] });
    });

    it('should ignore zero quantity alternates sharing the primary designators', () => {
      const records = [
        record({ item: '1', manufacturer: 'Acme', quantity: '1', designator: 'U1' }),
        record({ item: '1', manufacturer: 'Beta', quantity: '0', designator: 'U1' }),
      ];
      expect(() => service.validate(records)).not.toThrow();
    });
  });
});
