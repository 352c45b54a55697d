import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord, CellValue, Grid, RecordField, ReviewNote } from '../common/interfaces';
import { normalizeLabel, normalizeToString } from '../common/label-normalizer';
import { findConsensusMatch } from '../common/similarity';
import { BomStructureError } from '../common/errors';
import { TABLE_LABEL_TO_FIELD, TransformResult, emptyRecord } from './types';

export interface LabelResolution {
  columnIndex: number;
  rawLabel: string;
  canonicalLabel: string | null;
}

export interface ResolveTableOptions {
  strict?: boolean;
  sheetName?: string;
  fieldMap?: ReadonlyArray<readonly [string, RecordField]>;
}

/**
 * HeaderResolverService - Renomme les colonnes brutes vers le vocabulaire canonique
 *
 * Une colonne n'est renommée que si Jaccard et Levenshtein s'accordent.
 * Les colonnes sans consensus sont écartées et signalées pour revue.
 */
@Injectable()
export class HeaderResolverService {
  private readonly logger = new Logger(HeaderResolverService.name);

  resolveLabels(rawLabels: readonly CellValue[], vocabulary: readonly string[]): LabelResolution[] {
    const resolutions: LabelResolution[] = [];

    rawLabels.forEach((cell, columnIndex) => {
      const rawLabel = normalizeToString(cell);
      // Colonnes sans titre ignorées
      if (!normalizeLabel(rawLabel)) return;

      const canonicalLabel = findConsensusMatch(rawLabel, vocabulary);
      this.logger.debug(`${rawLabel.replace(/\s+/g, ' ').trim()} -> ${canonicalLabel ?? '(none)'}`);
      resolutions.push({ columnIndex, rawLabel, canonicalLabel });
    });

    return resolutions;
  }

  /**
   * Convertit un bloc tableau (en-tête en première ligne) en CanonicalRecord[].
   * Les champs sans colonne source restent ''.
   */
  resolveTable(table: Grid, options: ResolveTableOptions = {}): TransformResult {
    const fieldMap = options.fieldMap ?? TABLE_LABEL_TO_FIELD;
    const vocabulary = fieldMap.map(([label]) => label);
    const labelToField = new Map<string, RecordField>(fieldMap.map(([label, field]) => [label, field]));
    const reviews: ReviewNote[] = [];

    if (table.length === 0) {
      throw new BomStructureError('Header resolution failed: table block is empty.');
    }

    const [headerRow, ...dataRows] = table;
    const columns = new Map<RecordField, number>();
    const unmatched: string[] = [];

    for (const resolution of this.resolveLabels(headerRow, vocabulary)) {
      const rawLabel = resolution.rawLabel.replace(/\s+/g, ' ').trim();

      if (resolution.canonicalLabel === null) {
        unmatched.push(rawLabel);
        reviews.push({ reason: 'unmatched_header', value: rawLabel, sheetName: options.sheetName });
        continue;
      }

      const field = labelToField.get(resolution.canonicalLabel);
      if (!field) continue;

      if (columns.has(field)) {
        reviews.push({
          reason: 'duplicate_header',
          value: rawLabel,
          sheetName: options.sheetName,
          detail: `Column already mapped to "${resolution.canonicalLabel}"`,
        });
        continue;
      }
      columns.set(field, resolution.columnIndex);
    }

    if (options.strict && unmatched.length > 0) {
      throw new BomStructureError(
        `Header resolution failed: no consensus match for ${unmatched.join(', ')}`,
        unmatched,
      );
    }

    for (const review of reviews) {
      this.logger.warn(`${review.reason}: "${review.value}"${review.sheetName ? ` in sheet "${review.sheetName}"` : ''}`);
    }

    const records = dataRows.map((row) => {
      const record: CanonicalRecord = emptyRecord();
      for (const [field, columnIndex] of columns) {
        record[field] = normalizeToString(row[columnIndex]).trim();
      }
      return record;
    });

    return { records, reviews };
  }
}
