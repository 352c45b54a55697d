import { Injectable, Logger } from '@nestjs/common';
import { CellValue, Grid } from '../common/interfaces';
import { normalizeLabel, normalizeToString } from '../common/label-normalizer';
import { BomStructureError } from '../common/errors';

// Un index de ligne valide est >= 0
export const NO_BEST_MATCH_ROW = -1;

/**
 * TableLocatorService - Localise le tableau BOM dans une feuille non structurée
 *
 * - Détection tolérante (sous-chaîne) de la ligne d'en-tête
 * - Validation stricte (égalité) des libellés requis sur cette ligne
 * - Découpage bloc métadonnées / bloc tableau
 */
@Injectable()
export class TableLocatorService {
  private readonly logger = new Logger(TableLocatorService.name);

  /**
   * Ligne contenant le plus de libellés attendus.
   * Un libellé compte s'il est sous-chaîne d'une cellule texte normalisée (une fois par ligne).
   * Égalité: la première ligne gagne. Aucun score > 0: NO_BEST_MATCH_ROW.
   */
  findRowWithMostLabelMatches(grid: Grid, labels: readonly string[]): number {
    const normalizedLabels = labels.map((label) => normalizeLabel(label));
    let bestRowIndex = NO_BEST_MATCH_ROW;
    let highestMatchCount = 0;

    grid.forEach((row, rowIndex) => {
      const cells = row
        .filter((cell): cell is string => typeof cell === 'string')
        .map((cell) => normalizeLabel(cell));

      let matchCount = 0;
      for (const label of normalizedLabels) {
        if (cells.some((cell) => cell.includes(label))) matchCount++;
      }

      if (matchCount > highestMatchCount) {
        highestMatchCount = matchCount;
        bestRowIndex = rowIndex;
      }
    });

    return bestRowIndex;
  }

  /**
   * Libellés requis absents (égalité exacte après normalisation) de la meilleure ligne.
   * Sans meilleure ligne, tous les libellés sont retournés.
   */
  findUnmatchedLabelsInBestRow(grid: Grid, requiredLabels: readonly string[]): string[] {
    const bestRow = this.findRowWithMostLabelMatches(grid, requiredLabels);
    if (bestRow === NO_BEST_MATCH_ROW) return [...requiredLabels];

    const normalizedRow = new Set(grid[bestRow].map((cell) => normalizeLabel(cell)));
    return requiredLabels.filter((label) => !normalizedRow.has(normalizeLabel(label)));
  }

  hasAllLabelsInRow(sheetName: string, grid: Grid, requiredLabels: readonly string[]): boolean {
    const unmatched = this.findUnmatchedLabelsInBestRow(grid, requiredLabels);
    if (unmatched.length === 0) {
      this.logger.debug(`Sheet "${sheetName}" contains all required labels`);
      return true;
    }
    this.logger.debug(`Sheet "${sheetName}" is missing labels: ${unmatched.join(', ')}`);
    return false;
  }

  /**
   * Bloc de métadonnées: toutes les lignes strictement au-dessus de l'en-tête du tableau
   */
  extractHeader(grid: Grid, labels: readonly string[]): Grid {
    const headerRow = this.findRowWithMostLabelMatches(grid, labels);

    if (headerRow === NO_BEST_MATCH_ROW) {
      throw new BomStructureError(
        'Header extraction failed: unable to locate BOM table header row.',
        [...labels],
      );
    }
    if (headerRow === 0) {
      throw new BomStructureError('Header extraction failed: resulting header is empty.');
    }

    return grid.slice(0, headerRow);
  }

  /**
   * Bloc tableau: la ligne d'en-tête et toutes les lignes suivantes
   */
  extractTable(grid: Grid, labels: readonly string[]): Grid {
    const headerRow = this.findRowWithMostLabelMatches(grid, labels);

    if (headerRow === NO_BEST_MATCH_ROW) {
      throw new BomStructureError(
        'Table extraction failed: unable to locate BOM table start row.',
        [...labels],
      );
    }

    const table = grid.slice(headerRow);
    if (table.length <= 1) {
      throw new BomStructureError('Table extraction failed: no data rows found in the table.');
    }

    return table;
  }

  /**
   * Aplatit un bloc en liste de strings, ligne par ligne (cellules vides -> '')
   */
  flattenGrid(grid: Grid): string[] {
    return grid.flatMap((row) => row.map((cell: CellValue) => normalizeToString(cell)));
  }

  /**
   * Valeur associée à un libellé dans une liste aplatie "libellé, valeur, libellé, valeur..."
   * - libellé absent: null
   * - libellé présent sans valeur derrière: erreur (tout libellé doit porter une valeur)
   */
  extractLabelValue(data: readonly string[], label: string, skipEmpty = true): string | null {
    const normalizedLabel = normalizeLabel(label);
    const labelIndex = data.findIndex((value) => normalizeLabel(value) === normalizedLabel);
    if (labelIndex < 0) return null;

    for (let i = labelIndex + 1; i < data.length; i++) {
      const value = data[i].trim();
      if (!skipEmpty || value) return value;
    }

    throw new BomStructureError(
      `No value found for label = ${label}, at index = ${labelIndex}.`,
      [label],
    );
  }
}
