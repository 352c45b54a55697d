/**
 * Types et constantes du gabarit BOM version 3
 * Libellés Excel attendus, correspondance vers les champs canoniques, schémas Zod.
 */

import { z } from 'zod';
import {
  Bom,
  BoardHeader,
  BoardHeaderField,
  CanonicalRecord,
  RecordField,
  ReviewNote,
} from '../common/interfaces';

// ============================================================================
// TABLE FIELDS - Colonnes du tableau de composants
// ============================================================================

export const BOARD_TABLE_FIELDS = {
  ITEM: 'Item',
  COMPONENT: 'Component',
  PACKAGE: 'Device Package',
  DESCRIPTION: 'Description',
  UNIT: 'Unit',
  CLASSIFICATION: 'Classification',
  MANUFACTURER: 'Manufacturer',
  MFG_PART_NO: 'Manufacturer P/N',
  UL_VDE_NUMBER: 'UL/VDE Number',
  VALIDATED_AT: 'Validated at',
  QTY: 'Qty',
  DESIGNATOR: 'Designator',
  UNIT_PRICE: 'U/P (RMB W/ VAT)',
  SUB_TOTAL: 'Sub-Total (RMB W/ VAT)',
} as const;

/**
 * Libellé Excel -> champ du CanonicalRecord, dans l'ordre canonique des colonnes
 */
export const TABLE_LABEL_TO_FIELD: ReadonlyArray<readonly [string, RecordField]> = [
  [BOARD_TABLE_FIELDS.ITEM, 'item'],
  [BOARD_TABLE_FIELDS.COMPONENT, 'componentType'],
  [BOARD_TABLE_FIELDS.PACKAGE, 'devicePackage'],
  [BOARD_TABLE_FIELDS.DESCRIPTION, 'description'],
  [BOARD_TABLE_FIELDS.UNIT, 'unit'],
  [BOARD_TABLE_FIELDS.CLASSIFICATION, 'classification'],
  [BOARD_TABLE_FIELDS.MANUFACTURER, 'manufacturer'],
  [BOARD_TABLE_FIELDS.MFG_PART_NO, 'mfgPartNumber'],
  [BOARD_TABLE_FIELDS.UL_VDE_NUMBER, 'ulVdeNumber'],
  [BOARD_TABLE_FIELDS.VALIDATED_AT, 'validatedAt'],
  [BOARD_TABLE_FIELDS.QTY, 'quantity'],
  [BOARD_TABLE_FIELDS.DESIGNATOR, 'designator'],
  [BOARD_TABLE_FIELDS.UNIT_PRICE, 'unitPrice'],
  [BOARD_TABLE_FIELDS.SUB_TOTAL, 'subTotal'],
];

export const TABLE_VOCABULARY: string[] = TABLE_LABEL_TO_FIELD.map(([label]) => label);

export const RECORD_FIELDS: RecordField[] = TABLE_LABEL_TO_FIELD.map(([, field]) => field);

// ============================================================================
// BOARD HEADER FIELDS - Métadonnées au-dessus du tableau
// ============================================================================

export const BOARD_HEADER_LABEL_TO_FIELD: ReadonlyArray<readonly [string, BoardHeaderField]> = [
  ['Model No:', 'modelNo'],
  ['Rev:', 'buildStage'],
  ['Description:', 'boardName'],
  ['Manufacturer:', 'manufacturer'],
  ['Date:', 'date'],
  ['Material', 'materialCost'],
  ['OHP', 'overheadCost'],
  ['Total', 'totalCost'],
];

// ============================================================================
// REQUIRED IDENTIFIERS - Détection du gabarit version 3
// ============================================================================

export const REQUIRED_V3_BOM_IDENTIFIERS: readonly string[] = [
  BOARD_TABLE_FIELDS.CLASSIFICATION,
  BOARD_TABLE_FIELDS.DESIGNATOR,
  BOARD_TABLE_FIELDS.MANUFACTURER,
  BOARD_TABLE_FIELDS.MFG_PART_NO,
];

export const REQUIRED_V3_BOARD_TABLE_IDENTIFIERS: readonly string[] = [
  BOARD_TABLE_FIELDS.CLASSIFICATION,
  BOARD_TABLE_FIELDS.DESIGNATOR,
  BOARD_TABLE_FIELDS.MANUFACTURER,
  BOARD_TABLE_FIELDS.MFG_PART_NO,
];

// ============================================================================
// FACTORIES
// ============================================================================

export function emptyRecord(): CanonicalRecord {
  return {
    item: '',
    componentType: '',
    devicePackage: '',
    description: '',
    unit: '',
    classification: '',
    manufacturer: '',
    mfgPartNumber: '',
    ulVdeNumber: '',
    validatedAt: '',
    quantity: '',
    designator: '',
    unitPrice: '',
    subTotal: '',
  };
}

export function emptyBoardHeader(): BoardHeader {
  return {
    modelNo: '',
    boardName: '',
    manufacturer: '',
    buildStage: '',
    date: '',
    materialCost: '',
    overheadCost: '',
    totalCost: '',
  };
}

// ============================================================================
// NORMALIZATION OPTIONS - Profil de normalisation
// ============================================================================

export interface NormalizationOptions {
  strictHeaders: boolean;           // Colonne sans consensus = erreur
  mergeAlternates: boolean;
  dropZeroQuantity: boolean;        // Avant les éclatements
  cleanupDesignators: boolean;
  splitManufacturers: boolean;
  splitQuantities: boolean;
  normalizeTaxonomy: boolean;
  validate: boolean;
  stripPartNumbers: boolean;        // Références retirées des descriptions
  splitExemptTypes: string[];       // Sous-chaînes de type exemptées (Res, Cap, Ind)
  excludeDescriptionTerms: string[];
  excludeComponentTypes: string[];
}

export const DEFAULT_SPLIT_EXEMPT_TYPES = ['Res', 'Cap', 'Ind'];

export interface ExclusionPreset {
  descriptionTerms: string[];
  componentTypes: string[];
}

// Lignes hors nomenclature électrique (consommables, visserie, câblage, circuit nu)
export const EXCLUSION_PRESETS: Record<string, ExclusionPreset> = {
  none: { descriptionTerms: [], componentTypes: [] },
  electrical: {
    descriptionTerms: ['Glue', 'Solder', 'Compound', 'Conformal', 'Coating', 'Screw', 'Wire', 'AWG'],
    componentTypes: ['PCB', 'Wire'],
  },
};

export const DEFAULT_NORMALIZATION_OPTIONS: NormalizationOptions = {
  strictHeaders: false,
  mergeAlternates: true,
  dropZeroQuantity: false,
  cleanupDesignators: true,
  splitManufacturers: true,
  splitQuantities: true,
  normalizeTaxonomy: true,
  validate: true,
  stripPartNumbers: true,
  splitExemptTypes: DEFAULT_SPLIT_EXEMPT_TYPES,
  excludeDescriptionTerms: [],
  excludeComponentTypes: [],
};

// ============================================================================
// RESULTS
// ============================================================================

export interface BoardStats {
  sheetName: string;
  rowsRead: number;
  afterAlternateMerge: number;
  afterFilters: number;
  afterManufacturerSplit: number;
  afterQuantitySplit: number;
}

export interface BomParseResult extends Bom {
  reviews: ReviewNote[];
  stats: BoardStats[];
}

/**
 * Résultat d'une transformation : lignes produites + notes de revue
 */
export interface TransformResult {
  records: CanonicalRecord[];
  reviews: ReviewNote[];
}

// ============================================================================
// VALIDATION SCHEMAS - Schémas de validation Zod
// ============================================================================

export const TaxonomyFileSchema = z.object({
  version: z.number().int().positive(),
  categories: z.array(z.object({
    name: z.string().min(1),
    synonyms: z.array(z.string().min(1)),
  })).min(1),
});

export const CanonicalRecordSchema = z.object({
  item: z.string().default(''),
  componentType: z.string().default(''),
  devicePackage: z.string().default(''),
  description: z.string().default(''),
  unit: z.string().default(''),
  classification: z.string().default(''),
  manufacturer: z.string().default(''),
  mfgPartNumber: z.string().default(''),
  ulVdeNumber: z.string().default(''),
  validatedAt: z.string().default(''),
  quantity: z.string().default(''),
  designator: z.string().default(''),
  unitPrice: z.string().default(''),
  subTotal: z.string().default(''),
});

export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;
