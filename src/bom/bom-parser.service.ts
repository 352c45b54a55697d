import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Board, BoardHeader, CanonicalRecord, Grid, ReviewNote, SheetGrid } from '../common/interfaces';
import { BomStructureError } from '../common/errors';
import { TableLocatorService } from './table-locator.service';
import { HeaderResolverService } from './header-resolver.service';
import { RecordTransformerService } from './record-transformer.service';
import { Taxonomy, TaxonomyService } from './taxonomy.service';
import { InvariantValidatorService } from './invariant-validator.service';
import {
  BOARD_HEADER_LABEL_TO_FIELD,
  BoardStats,
  BomParseResult,
  DEFAULT_NORMALIZATION_OPTIONS,
  NormalizationOptions,
  REQUIRED_V3_BOARD_TABLE_IDENTIFIERS,
  REQUIRED_V3_BOM_IDENTIFIERS,
  TransformResult,
  emptyBoardHeader,
} from './types';

export interface NormalizedRecords extends TransformResult {
  stats: BoardStats;
}

interface ParsedBoard {
  board: Board;
  reviews: ReviewNote[];
  stats: BoardStats;
}

/**
 * BomParserService - Lecture d'une nomenclature au gabarit version 3
 *
 * Pour chaque feuille qualifiée:
 * 1. Bloc métadonnées -> BoardHeader
 * 2. Bloc tableau -> CanonicalRecord[] (résolution des en-têtes)
 * 3. Pipeline: lignes vides, alternatives, filtres, repères, fabricants,
 *    références dans les descriptions, quantités, taxonomie, validation
 */
@Injectable()
export class BomParserService {
  private readonly logger = new Logger(BomParserService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly tableLocator: TableLocatorService,
    private readonly headerResolver: HeaderResolverService,
    private readonly transformer: RecordTransformerService,
    private readonly taxonomyService: TaxonomyService,
    private readonly validator: InvariantValidatorService,
  ) {}

  /**
   * Options effectives: valeurs par défaut < configuration < options de la requête
   */
  resolveOptions(overrides: Partial<NormalizationOptions> = {}): NormalizationOptions {
    const strictHeaders = this.configService.get<boolean>('bom.strictHeaders') ?? DEFAULT_NORMALIZATION_OPTIONS.strictHeaders;
    const splitExemptTypes =
      this.configService.get<string[]>('bom.splitExemptTypes') ?? DEFAULT_NORMALIZATION_OPTIONS.splitExemptTypes;
    const excludeDescriptionTerms =
      this.configService.get<string[]>('bom.excludeDescriptionTerms') ?? DEFAULT_NORMALIZATION_OPTIONS.excludeDescriptionTerms;
    const excludeComponentTypes =
      this.configService.get<string[]>('bom.excludeComponentTypes') ?? DEFAULT_NORMALIZATION_OPTIONS.excludeComponentTypes;

    return {
      strictHeaders: overrides.strictHeaders ?? strictHeaders,
      mergeAlternates: overrides.mergeAlternates ?? DEFAULT_NORMALIZATION_OPTIONS.mergeAlternates,
      dropZeroQuantity: overrides.dropZeroQuantity ?? DEFAULT_NORMALIZATION_OPTIONS.dropZeroQuantity,
      cleanupDesignators: overrides.cleanupDesignators ?? DEFAULT_NORMALIZATION_OPTIONS.cleanupDesignators,
      splitManufacturers: overrides.splitManufacturers ?? DEFAULT_NORMALIZATION_OPTIONS.splitManufacturers,
      splitQuantities: overrides.splitQuantities ?? DEFAULT_NORMALIZATION_OPTIONS.splitQuantities,
      normalizeTaxonomy: overrides.normalizeTaxonomy ?? DEFAULT_NORMALIZATION_OPTIONS.normalizeTaxonomy,
      validate: overrides.validate ?? DEFAULT_NORMALIZATION_OPTIONS.validate,
      stripPartNumbers: overrides.stripPartNumbers ?? DEFAULT_NORMALIZATION_OPTIONS.stripPartNumbers,
      splitExemptTypes: overrides.splitExemptTypes ?? splitExemptTypes,
      excludeDescriptionTerms: overrides.excludeDescriptionTerms ?? excludeDescriptionTerms,
      excludeComponentTypes: overrides.excludeComponentTypes ?? excludeComponentTypes,
    };
  }

  // ============================================
  // DÉTECTION DU GABARIT
  // ============================================

  isV3BoardSheet(sheet: SheetGrid): boolean {
    return this.tableLocator.hasAllLabelsInRow(sheet.name, sheet.grid, REQUIRED_V3_BOARD_TABLE_IDENTIFIERS);
  }

  /**
   * Vrai dès qu'une feuille porte tous les identifiants v3 sur une même ligne
   */
  isV3Bom(sheets: readonly SheetGrid[]): boolean {
    for (const sheet of sheets) {
      if (this.tableLocator.hasAllLabelsInRow(sheet.name, sheet.grid, REQUIRED_V3_BOM_IDENTIFIERS)) {
        this.logger.log(`Sheet "${sheet.name}" is using version 3 BOM template`);
        return true;
      }
    }
    this.logger.debug('BOM is not using version 3 template');
    return false;
  }

  // ============================================
  // PARSING
  // ============================================

  parseBoardHeader(headerBlock: Grid, sheetName?: string): { header: BoardHeader; reviews: ReviewNote[] } {
    const header = emptyBoardHeader();
    const reviews: ReviewNote[] = [];
    const flattened = this.tableLocator.flattenGrid(headerBlock);

    for (const [label, field] of BOARD_HEADER_LABEL_TO_FIELD) {
      const value = this.tableLocator.extractLabelValue(flattened, label);
      if (value === null) {
        reviews.push({ reason: 'missing_metadata', value: label, sheetName });
        this.logger.warn(`Board metadata "${label}" not found${sheetName ? ` in sheet "${sheetName}"` : ''}`);
        continue;
      }
      header[field] = value;
    }

    return { header, reviews };
  }

  parseBoardTable(tableBlock: Grid, options: NormalizationOptions, sheetName?: string): TransformResult {
    return this.headerResolver.resolveTable(tableBlock, { strict: options.strictHeaders, sheetName });
  }

  /**
   * Pipeline de normalisation sur des lignes déjà extraites
   */
  normalizeRecords(
    records: readonly CanonicalRecord[],
    options: NormalizationOptions,
    sheetName = '',
    taxonomy: Taxonomy = this.taxonomyService.getDefaultTaxonomy(),
  ): NormalizedRecords {
    const reviews: ReviewNote[] = [];
    const stats: BoardStats = {
      sheetName,
      rowsRead: records.length,
      afterAlternateMerge: 0,
      afterFilters: 0,
      afterManufacturerSplit: 0,
      afterQuantitySplit: 0,
    };

    let current = this.transformer.dropEmptyRecords(records);

    if (options.mergeAlternates) current = this.transformer.mergeAlternates(current);
    stats.afterAlternateMerge = current.length;

    if (options.dropZeroQuantity) current = this.transformer.dropZeroQuantity(current);
    current = this.transformer.excludeRecords(current, options.excludeDescriptionTerms, options.excludeComponentTypes);
    stats.afterFilters = current.length;

    if (options.cleanupDesignators) current = this.transformer.cleanupDesignators(current);

    if (options.splitManufacturers) {
      // Exemption testée sur la catégorie (MLCC -> Capacitor), même si la taxonomie s'applique plus tard
      current = this.transformer.splitManufacturers(
        current,
        options.splitExemptTypes,
        (componentType) => this.taxonomyService.normalizeComponentType(componentType, taxonomy).value,
      );
    }
    stats.afterManufacturerSplit = current.length;

    if (options.stripPartNumbers) current = this.transformer.stripPartNumbersFromDescription(current);

    if (options.splitQuantities) {
      const split = this.transformer.splitQuantities(current, sheetName || undefined);
      current = split.records;
      reviews.push(...split.reviews);
    }
    stats.afterQuantitySplit = current.length;

    if (options.normalizeTaxonomy) {
      const normalized = this.taxonomyService.normalizeRecords(current, taxonomy, sheetName || undefined);
      current = normalized.records;
      reviews.push(...normalized.reviews);
    }

    if (options.validate) this.validator.validate(current, sheetName || undefined);

    return { records: current, reviews, stats };
  }

  parseBoardSheet(sheet: SheetGrid, options: NormalizationOptions): ParsedBoard {
    const headerBlock = this.tableLocator.extractHeader(sheet.grid, REQUIRED_V3_BOARD_TABLE_IDENTIFIERS);
    const { header, reviews: headerReviews } = this.parseBoardHeader(headerBlock, sheet.name);

    const tableBlock = this.tableLocator.extractTable(sheet.grid, REQUIRED_V3_BOARD_TABLE_IDENTIFIERS);
    const table = this.parseBoardTable(tableBlock, options, sheet.name);

    const normalized = this.normalizeRecords(table.records, options, sheet.name);

    return {
      board: { sheetName: sheet.name, header, records: normalized.records },
      reviews: [...headerReviews, ...table.reviews, ...normalized.reviews],
      stats: normalized.stats,
    };
  }

  /**
   * Une Board par feuille qualifiée. Aucune feuille exploitable: erreur structurelle.
   */
  parseV3Bom(
    fileName: string,
    sheets: readonly SheetGrid[],
    overrides: Partial<NormalizationOptions> = {},
  ): BomParseResult {
    const options = this.resolveOptions(overrides);
    const result: BomParseResult = { fileName, boards: [], reviews: [], stats: [] };

    for (const sheet of sheets) {
      if (!this.isV3BoardSheet(sheet)) {
        this.logger.debug(`Sheet "${sheet.name}" was not parsed`);
        continue;
      }

      const parsed = this.parseBoardSheet(sheet, options);
      result.boards.push(parsed.board);
      result.reviews.push(...parsed.reviews);
      result.stats.push(parsed.stats);
      this.logger.log(`Sheet "${sheet.name}" parsed: ${parsed.stats.rowsRead} rows read, ${parsed.board.records.length} rows out`);
    }

    if (result.boards.length === 0) {
      throw new BomStructureError('Parsed version 3 bom is empty.', [...REQUIRED_V3_BOM_IDENTIFIERS]);
    }

    this.logger.log(`${fileName}: ${result.boards.length} boards, ${result.reviews.length} review notes`);
    return result;
  }
}
