import { Test, TestingModule } from '@nestjs/testing';
import { HeaderResolverService } from './header-resolver.service';
import { BomStructureError } from '../common/errors';
import { CanonicalRecord, Grid } from '../common/interfaces';
import { emptyRecord } from './types';

describe('HeaderResolverService', () => {
  let service: HeaderResolverService;

  const record = (overrides: Partial<CanonicalRecord>): CanonicalRecord => ({ ...emptyRecord(), ...overrides });

  const table: Grid = [
    ['QTY', 'designator ', 'Manufacturer\nP/N', null, 'MANUFACTURER', '#', 'Qty'],
    [2, ' R1, R2 ', 'RC0402', 'x', 'Yageo', 'note', 5],
    [1, 'C1', 'GRM155', null, 'Murata', null, 9],
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [HeaderResolverService],
    }).compile();

    service = module.get<HeaderResolverService>(HeaderResolverService);
  });

  describe('resolveLabels', () => {
    it('should rename an abbreviated label and keep exact ones', () => {
      const resolutions = service.resolveLabels(
        ['Qty', 'Designator', 'Manufacturer'],
        ['Quantity', 'Designator', 'Manufacturer'],
      );

      expect(resolutions).toEqual([
        { columnIndex: 0, rawLabel: 'Qty', canonicalLabel: 'Quantity' },
        { columnIndex: 1, rawLabel: 'Designator', canonicalLabel: 'Designator' },
        { columnIndex: 2, rawLabel: 'Manufacturer', canonicalLabel: 'Manufacturer' },
      ]);
    });

    it('should skip blank header cells', () => {
      const resolutions = service.resolveLabels([null, '  ', 'Designator'], ['Designator']);
      expect(resolutions).toEqual([{ columnIndex: 2, rawLabel: 'Designator', canonicalLabel: 'Designator' }]);
    });
  });

  describe('resolveTable', () => {
    it('should map columns to canonical fields whatever their order', () => {
      const result = service.resolveTable(table, { sheetName: 'Board A' });

      expect(result.records).toEqual([
        record({ quantity: '2', designator: 'R1, R2', mfgPartNumber: 'RC0402', manufacturer: 'Yageo' }),
        record({ quantity: '1', designator: 'C1', mfgPartNumber: 'GRM155', manufacturer: 'Murata' }),
      ]);
    });

    it('should report unmatched and duplicate columns for review', () => {
      const result = service.resolveTable(table, { sheetName: 'Board A' });

      expect(result.reviews).toEqual([
        { reason: 'unmatched_header', value: '#', sheetName: 'Board A' },
        {
          reason: 'duplicate_header',
          value: 'Qty',
          sheetName: 'Board A',
          detail: 'Column already mapped to "Qty"',
        },
      ]);
    });

    it('should reject unmatched columns in strict mode', () => {
      expect(() => service.resolveTable(table, { strict: true })).toThrow(BomStructureError);
      expect(() => service.resolveTable(table, { strict: true })).toThrow(
        'Header resolution failed: no consensus match for #',
      );
    });

    it('should accept a custom field map', () => {
      const result = service.resolveTable(
        [
          ['Quantity', 'Ref'],
          [3, 'R1,R2,R3'],
        ],
        {
          fieldMap: [
            ['Quantity', 'quantity'],
            ['Ref', 'designator'],
          ],
        },
      );

      expect(result.records).toEqual([record({ quantity: '3', designator: 'R1,R2,R3' })]);
      expect(result.reviews).toEqual([]);
    });

    it('should reject an empty table block', () => {
      expect(() => service.resolveTable([])).toThrow('Header resolution failed: table block is empty.');
    });
  });
});
