import { Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import { Board, CellValue, SheetGrid } from '../common/interfaces';
import { BOARD_HEADER_LABEL_TO_FIELD, BomParseResult, TABLE_LABEL_TO_FIELD } from '../bom/types';

// Titre placé en première ligne de chaque feuille générée
export const EXPORT_TITLE = 'Normalized BOM';
export const REVIEW_SHEET_NAME = 'Review';
const MAX_SHEET_NAME_LENGTH = 31;

const COLUMN_WIDTHS: Record<string, number> = {
  Item: 6,
  Component: 16,
  'Device Package': 14,
  Description: 40,
  Manufacturer: 20,
  'Manufacturer P/N': 22,
  Qty: 6,
  Designator: 24,
};

/**
 * ExcelService - Lecture des classeurs reçus (xlsx) et écriture du résultat normalisé (exceljs)
 */
@Injectable()
export class ExcelService {
  private readonly logger = new Logger(ExcelService.name);

  /**
   * Une grille par feuille, dans l'ordre du classeur.
   * Les cellules vides valent null, les dates sont des Date.
   */
  readWorkbook(buffer: Buffer): SheetGrid[] {
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });

    const sheets = workbook.SheetNames.map((name) => {
      const sheet = workbook.Sheets[name];
      const grid = sheet
        ? XLSX.utils.sheet_to_json<CellValue[]>(sheet, { header: 1, defval: null, blankrows: true, raw: true })
        : [];
      return { name, grid };
    });

    this.logger.log(`Workbook read: ${sheets.length} sheets (${sheets.map((s) => s.name).join(', ')})`);
    return sheets;
  }

  /**
   * Classeur de sortie: une feuille par carte (métadonnées puis tableau),
   * et une feuille Review si des notes existent.
   * La mise en page reste lisible par BomParserService.
   */
  async writeBom(result: BomParseResult): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date();

    const usedNames = new Set<string>();
    for (const board of result.boards) {
      this.addBoardSheet(workbook, board, this.uniqueSheetName(board.sheetName, usedNames), result.fileName);
    }

    if (result.reviews.length > 0) {
      const sheet = workbook.addWorksheet(this.uniqueSheetName(REVIEW_SHEET_NAME, usedNames));
      sheet.columns = [
        { header: 'Reason', key: 'reason', width: 22 },
        { header: 'Sheet', key: 'sheetName', width: 18 },
        { header: 'Item', key: 'item', width: 8 },
        { header: 'Value', key: 'value', width: 30 },
        { header: 'Detail', key: 'detail', width: 40 },
      ];
      for (const review of result.reviews) {
        sheet.addRow({
          reason: review.reason,
          sheetName: review.sheetName ?? '',
          item: review.item ?? '',
          value: review.value,
          detail: review.detail ?? '',
        });
      }
      this.styleHeaderRow(sheet.getRow(1));
    }

    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
    this.logger.log(`Workbook written: ${result.boards.length} boards, ${result.reviews.length} review notes`);
    return buffer;
  }

  private addBoardSheet(workbook: ExcelJS.Workbook, board: Board, sheetName: string, fileName: string): void {
    const sheet = workbook.addWorksheet(sheetName);

    sheet.addRow([EXPORT_TITLE, fileName]).font = { bold: true, size: 12 };

    // Seules les métadonnées renseignées sont écrites (un libellé sans valeur est invalide)
    for (const [label, field] of BOARD_HEADER_LABEL_TO_FIELD) {
      const value = board.header[field];
      if (value) sheet.addRow([label, value]);
    }
    sheet.addRow([]);

    const headerRow = sheet.addRow(TABLE_LABEL_TO_FIELD.map(([label]) => label));
    this.styleHeaderRow(headerRow);

    for (const record of board.records) {
      const row = sheet.addRow(TABLE_LABEL_TO_FIELD.map(([, field]) => record[field]));
      row.alignment = { vertical: 'top', wrapText: true };
    }

    TABLE_LABEL_TO_FIELD.forEach(([label], index) => {
      sheet.getColumn(index + 1).width = COLUMN_WIDTHS[label] ?? 12;
    });
  }

  private styleHeaderRow(row: ExcelJS.Row): void {
    row.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    row.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FF2F5496' },
    };
    row.alignment = { horizontal: 'center', vertical: 'middle' };
  }

  private uniqueSheetName(name: string, usedNames: Set<string>): string {
    const base = (name.trim() || 'Board').slice(0, MAX_SHEET_NAME_LENGTH);
    let candidate = base;
    let counter = 2;
    while (usedNames.has(candidate.toLowerCase())) {
      const suffix = ` (${counter++})`;
      candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
    }
    usedNames.add(candidate.toLowerCase());
    return candidate;
  }
}
