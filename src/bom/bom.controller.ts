import {
  Controller,
  Post,
  Body,
  Res,
  UseInterceptors,
  UploadedFile,
  BadRequestException,
  HttpCode,
  Logger,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { z } from 'zod';
import { ExcelService } from '../excel/excel.service';
import { NormalizationOptionsDto, NormalizeRecordsDto } from '../common/dto';
import { SheetGrid } from '../common/interfaces';
import { toHttpException } from '../common/errors';
import { BomParserService, NormalizedRecords } from './bom-parser.service';
import { TableLocatorService } from './table-locator.service';
import { BomParseResult, CanonicalRecordSchema, REQUIRED_V3_BOARD_TABLE_IDENTIFIERS } from './types';

const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface SheetDetection {
  name: string;
  hasAllLabels: boolean;
  unmatchedLabels: string[];
}

@Controller('bom')
export class BomController {
  private readonly logger = new Logger(BomController.name);

  constructor(
    private readonly bomParser: BomParserService,
    private readonly tableLocator: TableLocatorService,
    private readonly excelService: ExcelService,
  ) {}

  /**
   * POST /api/bom/detect
   * Indique si le classeur suit le gabarit version 3, feuille par feuille
   */
  @Post('detect')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  detect(@UploadedFile() file: Express.Multer.File | undefined) {
    const sheets = this.readUpload(file);

    const detections: SheetDetection[] = sheets.map((sheet) => {
      const unmatchedLabels = this.tableLocator.findUnmatchedLabelsInBestRow(
        sheet.grid,
        REQUIRED_V3_BOARD_TABLE_IDENTIFIERS,
      );
      return { name: sheet.name, hasAllLabels: unmatchedLabels.length === 0, unmatchedLabels };
    });

    return {
      fileName: file?.originalname ?? '',
      isV3Bom: this.bomParser.isV3Bom(sheets),
      sheets: detections,
    };
  }

  /**
   * POST /api/bom/parse
   * Nomenclature normalisée en JSON (cartes, notes de revue, statistiques)
   */
  @Post('parse')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  parse(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() options: NormalizationOptionsDto,
  ): BomParseResult {
    const sheets = this.readUpload(file);
    return this.run(() => this.bomParser.parseV3Bom(file?.originalname ?? 'upload.xlsx', sheets, options));
  }

  /**
   * POST /api/bom/export
   * Même traitement que /parse, résultat téléchargé en xlsx
   */
  @Post('export')
  @UseInterceptors(FileInterceptor('file'))
  async exportBom(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() options: NormalizationOptionsDto,
    @Res() res: Response,
  ): Promise<void> {
    const sheets = this.readUpload(file);
    const fileName = file?.originalname ?? 'upload.xlsx';
    const result = this.run(() => this.bomParser.parseV3Bom(fileName, sheets, options));
    const buffer = await this.excelService.writeBom(result);

    const outputName = `${fileName.replace(/\.xlsx?$/i, '')}-normalized.xlsx`;
    res.setHeader('Content-Type', XLSX_MIME_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="${outputName}"`);
    res.send(buffer);
  }

  /**
   * POST /api/bom/normalize
   * Pipeline de normalisation sur des lignes déjà extraites (JSON)
   */
  @Post('normalize')
  @HttpCode(200)
  normalize(@Body() dto: NormalizeRecordsDto): NormalizedRecords {
    const parsed = z.array(CanonicalRecordSchema).safeParse(dto.records);
    if (!parsed.success) {
      throw new BadRequestException({
        message: 'Invalid records',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const options = this.bomParser.resolveOptions(dto.options);
    return this.run(() => this.bomParser.normalizeRecords(parsed.data, options, dto.sheetName));
  }

  private readUpload(file: Express.Multer.File | undefined): SheetGrid[] {
    if (!file) {
      throw new BadRequestException('Fichier requis');
    }
    this.logger.log(`Reading ${file.originalname} (${file.size} bytes)`);

    try {
      return this.excelService.readWorkbook(file.buffer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(`Classeur illisible: ${message}`);
    }
  }

  private run<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Normalization aborted: ${message}`);
      throw toHttpException(error);
    }
  }
}
