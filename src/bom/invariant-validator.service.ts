import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord } from '../common/interfaces';
import { BomIntegrityError } from '../common/errors';
import { parseDesignators, parseQuantity } from './record-transformer.service';

/**
 * InvariantValidatorService - Contrôles globaux sur le tableau final
 *
 * 1. Quantité déclarée = nombre de repères (hors quantité vide, nulle ou fractionnaire)
 * 2. Aucun repère partagé entre deux lignes (hors alternatives de quantité 0)
 */
@Injectable()
export class InvariantValidatorService {
  private readonly logger = new Logger(InvariantValidatorService.name);

  checkQuantityMatchesDesignators(records: readonly CanonicalRecord[]): void {
    for (const record of records) {
      if (!record.quantity.trim()) continue;

      const quantity = parseQuantity(record.quantity);
      if (quantity === null) {
        throw new BomIntegrityError(
          `Invalid quantity "${record.quantity}" for item ${record.item}`,
          [record.quantity],
        );
      }
      // Alternative non retenue ou quantité à revoir manuellement
      if (quantity === 0 || !Number.isInteger(quantity)) continue;

      const designators = parseDesignators(record.designator);
      if (designators.length !== quantity) {
        throw new BomIntegrityError(
          `Quantity ${record.quantity} does not match ${designators.length} designators ` +
            `"${record.designator}" for item ${record.item}`,
          [record.item, record.designator],
        );
      }
    }
  }

  /**
   * Unicité globale des repères. Seules les lignes de quantité 0 (alternatives)
   * partagent les repères de leur ligne principale et ne comptent pas.
   */
  checkDuplicateDesignators(records: readonly CanonicalRecord[]): void {
    const seen = new Set<string>();
    const duplicates: string[] = [];

    for (const record of records) {
      if (parseQuantity(record.quantity) === 0) continue;

      for (const designator of parseDesignators(record.designator)) {
        if (seen.has(designator)) {
          if (!duplicates.includes(designator)) duplicates.push(designator);
          continue;
        }
        seen.add(designator);
      }
    }

    if (duplicates.length > 0) {
      throw new BomIntegrityError(`Duplicate designators found: ${duplicates.join(', ')}`, duplicates);
    }
  }

  validate(records: readonly CanonicalRecord[], sheetName?: string): void {
    this.checkQuantityMatchesDesignators(records);
    this.checkDuplicateDesignators(records);
    this.logger.debug(`${records.length} rows validated${sheetName ? ` in sheet "${sheetName}"` : ''}`);
  }
}
