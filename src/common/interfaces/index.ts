/**
 * Types partagés du moteur BOM
 * Les cellules brutes arrivent du lecteur de tableur, tout le reste est en string.
 */

// ============================================================================
// GRID - Feuille brute telle que lue par le lecteur Excel
// ============================================================================

export type CellValue = string | number | boolean | Date | null | undefined;

export type Grid = CellValue[][];

export interface SheetGrid {
  name: string;
  grid: Grid;
}

// ============================================================================
// CANONICAL RECORD - Une ligne de nomenclature normalisée
// ============================================================================

export interface CanonicalRecord {
  item: string;             // Numéro de ligne dans la BOM
  componentType: string;    // Type de composant (Resistor, Diode, ...)
  devicePackage: string;    // Boîtier (0402, SOT-23, DIP)
  description: string;
  unit: string;             // Unité (PCS)
  classification: string;   // Classe A/B/C
  manufacturer: string;     // Un ou plusieurs fabricants séparés par \n
  mfgPartNumber: string;    // Références fabricant, alignées sur manufacturer
  ulVdeNumber: string;      // Certification UL/VDE
  validatedAt: string;      // Phase de validation (EB0, MP)
  quantity: string;
  designator: string;       // Repères séparés par des virgules (R1,R2)
  unitPrice: string;
  subTotal: string;
}

export type RecordField = keyof CanonicalRecord;

// ============================================================================
// BOARD / BOM - Agrégats
// ============================================================================

export interface BoardHeader {
  modelNo: string;
  boardName: string;
  manufacturer: string;
  buildStage: string;
  date: string;
  materialCost: string;
  overheadCost: string;
  totalCost: string;
}

export type BoardHeaderField = keyof BoardHeader;

export interface Board {
  sheetName: string;
  header: BoardHeader;
  records: CanonicalRecord[];
}

export interface Bom {
  fileName: string;
  boards: Board[];
}

// ============================================================================
// REVIEW NOTES - Anomalies non bloquantes à vérifier manuellement
// ============================================================================

export type ReviewReason =
  | 'unmatched_header'          // Colonne sans consensus
  | 'duplicate_header'          // Deux colonnes vers le même champ
  | 'unrecognized_component'    // Type de composant sans consensus
  | 'fractional_quantity'       // Quantité non entière, non éclatée
  | 'missing_metadata';         // Libellé d'en-tête de carte absent

export interface ReviewNote {
  reason: ReviewReason;
  value: string;
  sheetName?: string;
  item?: string;
  detail?: string;
}
