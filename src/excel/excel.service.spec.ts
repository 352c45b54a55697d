import { Test, TestingModule } from '@nestjs/testing';
import * as ExcelJS from 'exceljs';
import { ExcelService, EXPORT_TITLE, REVIEW_SHEET_NAME } from './excel.service';
import { BomParseResult, emptyBoardHeader, emptyRecord } from '../bom/types';

describe('ExcelService', () => {
  let service: ExcelService;

  const buildWorkbook = async (sheets: Record<string, unknown[][]>): Promise<Buffer> => {
    const workbook = new ExcelJS.Workbook();
    for (const [name, rows] of Object.entries(sheets)) {
      const sheet = workbook.addWorksheet(name);
      rows.forEach((row) => sheet.addRow(row));
    }
    return Buffer.from(await workbook.xlsx.writeBuffer());
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ExcelService],
    }).compile();

    service = module.get<ExcelService>(ExcelService);
  });

  describe('readWorkbook', () => {
    it('should return one grid per sheet in workbook order', async () => {
      const buffer = await buildWorkbook({
        Summary: [['Project', 'Demo']],
        Main: [
          ['Item', 'Qty', 'Designator'],
          [1, 2, 'R1,R2'],
        ],
      });

      const sheets = service.readWorkbook(buffer);

      expect(sheets.map((s) => s.name)).toEqual(['Summary', 'Main']);
      expect(sheets[1].grid).toEqual([
        ['Item', 'Qty', 'Designator'],
        [1, 2, 'R1,R2'],
      ]);
    });

    it('should fill missing cells with null', async () => {
      const buffer = await buildWorkbook({ Main: [['Model No:', 'MB-100', 'x'], ['Rev:']] });

      const [sheet] = service.readWorkbook(buffer);

      expect(sheet.grid[1]).toEqual(['Rev:', null, null]);
    });
  });

  describe('writeBom', () => {
    const result: BomParseResult = {
      fileName: 'board.xlsx',
      boards: [
        {
          sheetName: 'Main',
          header: { ...emptyBoardHeader(), modelNo: 'MB-100', buildStage: 'EVT' },
          records: [{ ...emptyRecord(), item: '1', componentType: 'Resistor', quantity: '1', designator: 'R1' }],
        },
      ],
      reviews: [{ reason: 'unmatched_header', value: '#', sheetName: 'Main' }],
      stats: [],
    };

    it('should write one sheet per board and a review sheet', async () => {
      const sheets = service.readWorkbook(await service.writeBom(result));

      expect(sheets.map((s) => s.name)).toEqual(['Main', REVIEW_SHEET_NAME]);
      const [headerRow, reviewRow] = sheets[1].grid;
      expect(headerRow).toEqual(['Reason', 'Sheet', 'Item', 'Value', 'Detail']);
      expect([reviewRow[0], reviewRow[1], reviewRow[3]]).toEqual(['unmatched_header', 'Main', '#']);
    });

    it('should write the title, filled metadata and the canonical table', async () => {
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.load(await service.writeBom(result));
      const sheet = workbook.getWorksheet('Main');

      expect(sheet?.getRow(1).getCell(1).value).toBe(EXPORT_TITLE);
      expect(sheet?.getRow(1).getCell(2).value).toBe('board.xlsx');
      expect(sheet?.getRow(2).getCell(1).value).toBe('Model No:');
      expect(sheet?.getRow(3).getCell(1).value).toBe('Rev:');
      expect(sheet?.getRow(5).getCell(1).value).toBe('Item');
      expect(sheet?.getRow(5).getCell(14).value).toBe('Sub-Total (RMB W/ VAT)');
      expect(sheet?.getRow(6).getCell(2).value).toBe('Resistor');
      expect(sheet?.getRow(6).getCell(12).value).toBe('R1');
    });

    it('should skip the review sheet when there is nothing to review', async () => {
      const sheets = service.readWorkbook(await service.writeBom({ ...result, reviews: [] }));
      expect(sheets.map((s) => s.name)).toEqual(['Main']);
    });
  });
});
