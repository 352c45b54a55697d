import { CanonicalRecord, Grid } from '../../common/interfaces';
import { emptyRecord } from '../types';

export const record = (overrides: Partial<CanonicalRecord>): CanonicalRecord => ({ ...emptyRecord(), ...overrides });

export const TABLE_HEADER = [
  'Item',
  'Component',
  'Description',
  'Classification',
  'Manufacturer',
  'Manufacturer P/N',
  'Qty',
  'Designator',
];

export const METADATA_ROWS: Grid = [
  ['Model No:', 'MB-100', null, 'Rev:', 'EVT'],
  ['Description:', 'Main board', null, 'Date:', '2024-03-01'],
  ['Manufacturer:', 'Contoso', null, 'Material', 12.5],
  ['OHP', 1.5, null, 'Total', 14],
  [],
];

// Ligne 3: alternative de la ligne 2 (Item vide). MLCC est un condensateur: pas d'éclatement fabricant.
export const TABLE_ROWS: Grid = [
  [1, 'Res', '10k 0402', 'A', 'Yageo', 'RC0402-10K', 2, 'R1, r2'],
  [2, 'MLCC', '100nF', 'A', 'Murata\nSamsung', 'GRM155\nCL05B', 1, 'C1'],
  ['', '', '', '', 'TDK', 'C1005', '', ''],
  [3, 'IC', 'MCU', 'A', 'ST\nGigaDevice', 'STM32F0\nGD32F0', 1, 'U1'],
  [null, null, null, null, null, null, null, null],
];

export const BOARD_GRID: Grid = [...METADATA_ROWS, TABLE_HEADER, ...TABLE_ROWS];

export const EXPECTED_RECORDS: CanonicalRecord[] = [
  record({ item: '1', componentType: 'Resistor', description: '10k 0402', classification: 'A', manufacturer: 'Yageo', mfgPartNumber: 'RC0402-10K', quantity: '1', designator: 'R1' }),
  record({ item: '1', componentType: 'Resistor', description: '10k 0402', classification: 'A', manufacturer: 'Yageo', mfgPartNumber: 'RC0402-10K', quantity: '1', designator: 'R2' }),
  record({ item: '2', componentType: 'Capacitor', description: '100nF', classification: 'A', manufacturer: 'Murata\nSamsung\nTDK', mfgPartNumber: 'GRM155\nCL05B\nC1005', quantity: '1', designator: 'C1' }),
  record({ item: '3', componentType: 'IC', description: 'MCU', classification: 'A', manufacturer: 'ST', mfgPartNumber: 'STM32F0', quantity: '1', designator: 'U1' }),
  record({ item: '3', componentType: 'IC', description: 'MCU', classification: 'A', manufacturer: 'GigaDevice', mfgPartNumber: 'GD32F0', quantity: '0', designator: 'U1' }),
];
