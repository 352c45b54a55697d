import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord, ReviewNote } from '../common/interfaces';
import { BomIntegrityError } from '../common/errors';
import { RECORD_FIELDS, TransformResult } from './types';

// Séparateurs de repères acceptés dans la cellule Designator
const DESIGNATOR_SEPARATORS = /[,:;]/;
// Un repère commence par une lettre et finit par un chiffre (R1, C12, U3A1)
const DESIGNATOR_PATTERN = /^[A-Z].*[0-9]$/;
const BOARD_DESIGNATOR = 'PCB';
// Ligne "alternative": Item vide ou commençant par "alt"
const ALTERNATE_ITEM_PATTERN = /^alt/i;

export function parseDesignators(value: string): string[] {
  return value
    .split(DESIGNATOR_SEPARATORS)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Quantité numérique, ou null si vide / non numérique
 */
export function parseQuantity(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const quantity = Number(trimmed);
  return Number.isFinite(quantity) ? quantity : null;
}

/**
 * Découpe une cellule multi-lignes (fabricants, références).
 * Les lignes vides finales sont ignorées; une cellule vide donne [''].
 */
export function splitLines(value: string): string[] {
  const lines = value.split(/\r?\n/).map((line) => line.trim());
  while (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Catégorie d'un type de composant, pour les tests d'exemption.
 * Par défaut le type brut est utilisé tel quel.
 */
export type ComponentCategoryResolver = (componentType: string) => string;

const rawComponentType: ComponentCategoryResolver = (componentType) => componentType;

function hasPartData(record: CanonicalRecord): boolean {
  return record.item.trim() !== '' || record.manufacturer.trim() !== '' || record.mfgPartNumber.trim() !== '';
}

function containsAny(value: string, terms: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return terms.some((term) => term.length > 0 && lower.includes(term.toLowerCase()));
}

/**
 * RecordTransformerService - Transformations ligne à ligne de la nomenclature
 *
 * Chaque opération retourne une nouvelle liste; les lignes d'entrée ne sont jamais modifiées.
 */
@Injectable()
export class RecordTransformerService {
  private readonly logger = new Logger(RecordTransformerService.name);

  dropEmptyRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
    const kept = records.filter((record) => RECORD_FIELDS.some((field) => record[field].trim() !== ''));
    if (kept.length !== records.length) {
      this.logger.debug(`Removed ${records.length - kept.length} empty rows`);
    }
    return kept;
  }

  isAlternate(record: CanonicalRecord): boolean {
    const item = record.item.trim();
    const hasPart = record.manufacturer.trim() !== '' || record.mfgPartNumber.trim() !== '';
    if (ALTERNATE_ITEM_PATTERN.test(item)) return true;
    return item === '' && hasPart;
  }

  /**
   * Fusionne chaque ligne alternative dans la dernière ligne principale qui la précède.
   * Les lignes sans Item, fabricant ni référence (notes) ne peuvent pas être principales.
   * Fabricant et référence sont ajoutés sur une nouvelle ligne, pour être éclatés ensuite
   * par splitManufacturers (quantité 0 pour l'alternative).
   */
  mergeAlternates(records: readonly CanonicalRecord[]): CanonicalRecord[] {
    const merged: CanonicalRecord[] = [];
    let primary: CanonicalRecord | undefined;

    for (const record of records) {
      if (!this.isAlternate(record)) {
        const copy = { ...record };
        merged.push(copy);
        if (hasPartData(copy)) primary = copy;
        continue;
      }

      if (!primary) {
        throw new BomIntegrityError(
          `Alternate part ${record.manufacturer} ${record.mfgPartNumber} has no primary row above it`,
          [record.mfgPartNumber || record.manufacturer],
        );
      }

      const alternateDesignators = parseDesignators(record.designator);
      if (
        alternateDesignators.length > 0 &&
        alternateDesignators.join(',') !== parseDesignators(primary.designator).join(',')
      ) {
        throw new BomIntegrityError(
          `Alternate part ${record.mfgPartNumber} designators "${record.designator}" differ from primary item ${primary.item} "${primary.designator}"`,
          [record.designator],
        );
      }

      primary.manufacturer = `${primary.manufacturer}\n${record.manufacturer.trim()}`;
      primary.mfgPartNumber = `${primary.mfgPartNumber}\n${record.mfgPartNumber.trim()}`;
    }

    if (merged.length !== records.length) {
      this.logger.log(`Merged ${records.length - merged.length} alternate rows into their primary row`);
    }
    return merged;
  }

  dropZeroQuantity(records: readonly CanonicalRecord[]): CanonicalRecord[] {
    const kept = records.filter((record) => parseQuantity(record.quantity) !== 0);
    this.logger.log(`Number of rows reduced from ${records.length} to ${kept.length} after zero quantity cleanup`);
    return kept;
  }

  /**
   * Retire les lignes dont la description ou le type contient un des termes (insensible à la casse)
   */
  excludeRecords(
    records: readonly CanonicalRecord[],
    descriptionTerms: readonly string[],
    componentTerms: readonly string[],
  ): CanonicalRecord[] {
    if (descriptionTerms.length === 0 && componentTerms.length === 0) return [...records];

    const kept = records.filter(
      (record) =>
        !containsAny(record.description, descriptionTerms) &&
        !containsAny(record.componentType, componentTerms),
    );
    this.logger.log(`Number of rows reduced from ${records.length} to ${kept.length} after exclusions`);
    return kept;
  }

  /**
   * Repères en majuscules, séparés par des virgules, chacun au format lettre...chiffre ou PCB
   */
  cleanupDesignators(records: readonly CanonicalRecord[]): CanonicalRecord[] {
    let changed = 0;

    const cleaned = records.map((record) => {
      const designators = parseDesignators(record.designator).map((entry) => entry.toUpperCase());
      const invalid = designators.filter(
        (entry) => entry !== BOARD_DESIGNATOR && !DESIGNATOR_PATTERN.test(entry),
      );
      if (invalid.length > 0) {
        throw new BomIntegrityError(
          `Invalid reference designator ${invalid.join(', ')} for item ${record.item}`,
          invalid,
        );
      }

      const designator = designators.join(',');
      if (designator !== record.designator) changed++;
      return { ...record, designator };
    });

    this.logger.debug(`Fixed reference designators in ${changed} rows`);
    return cleaned;
  }

  /**
   * Une ligne par couple fabricant / référence.
   * La première garde la quantité, les suivantes (alternatives) passent à 0.
   * Une seule référence est réutilisée pour chaque fabricant; tout autre écart est une erreur.
   * L'exemption porte sur la catégorie du type (MLCC -> Capacitor), pas sur le texte brut.
   */
  splitManufacturers(
    records: readonly CanonicalRecord[],
    exemptTypes: readonly string[],
    categoryOf: ComponentCategoryResolver = rawComponentType,
  ): CanonicalRecord[] {
    const result: CanonicalRecord[] = [];

    for (const record of records) {
      const names = splitLines(record.manufacturer);
      let partNumbers = splitLines(record.mfgPartNumber);

      if (names.length !== partNumbers.length) {
        if (partNumbers.length !== 1) {
          throw new BomIntegrityError(
            `Number of part numbers must be one or the same as number of manufacturers: ` +
              `${names.length} manufacturer names [${names.join(', ')}], ` +
              `${partNumbers.length} part numbers [${partNumbers.join(', ')}] (item ${record.item})`,
            [...names, ...partNumbers],
          );
        }
        partNumbers = names.map(() => partNumbers[0]);
      }

      if (names.length <= 1 || containsAny(categoryOf(record.componentType), exemptTypes)) {
        result.push({ ...record });
        continue;
      }

      names.forEach((manufacturer, index) => {
        result.push({
          ...record,
          manufacturer,
          mfgPartNumber: partNumbers[index],
          quantity: index === 0 ? record.quantity : '0',
        });
      });
    }

    this.logger.log(`Number of rows in the BOM increased from ${records.length} to ${result.length} after manufacturer split`);
    return result;
  }

  /**
   * Retire de chaque description les références fabricant présentes dans le tableau,
   * avec leur séparateur (", " ou ",").
   */
  stripPartNumbersFromDescription(records: readonly CanonicalRecord[]): CanonicalRecord[] {
    const partNumbers = [
      ...new Set(records.flatMap((record) => splitLines(record.mfgPartNumber)).filter((pn) => pn.length > 0)),
    ];
    let changed = 0;

    const result = records.map((record) => {
      let description = record.description;
      for (const partNumber of partNumbers) {
        description = description
          .replaceAll(`${partNumber},`, '')
          .replaceAll(`,${partNumber}`, '')
          .replaceAll(`, ${partNumber}`, '')
          .replaceAll(partNumber, '');
      }
      description = description.trim();
      if (description === record.description) return { ...record };
      changed++;
      return { ...record, description };
    });

    this.logger.log(`${changed} descriptions updated after part number removal`);
    return result;
  }

  /**
   * Tant que la quantité est un entier >= 2, détache le premier repère dans une ligne de quantité 1.
   * Les quantités fractionnaires ne sont pas éclatées et sont signalées pour revue.
   */
  splitQuantities(records: readonly CanonicalRecord[], sheetName?: string): TransformResult {
    const result: CanonicalRecord[] = [];
    const reviews: ReviewNote[] = [];

    for (const record of records) {
      const quantity = parseQuantity(record.quantity);

      if (quantity !== null && !Number.isInteger(quantity)) {
        reviews.push({ reason: 'fractional_quantity', value: record.quantity, sheetName, item: record.item });
        this.logger.warn(`Fractional quantity ${record.quantity} on item ${record.item} left unsplit`);
        result.push({ ...record });
        continue;
      }

      if (quantity === null || quantity < 2) {
        result.push({ ...record });
        continue;
      }

      const designators = parseDesignators(record.designator);
      if (designators.length !== quantity) {
        throw new BomIntegrityError(
          `Quantity ${record.quantity} does not match ${designators.length} designators for item ${record.item}`,
          [record.item, record.designator],
        );
      }

      let remaining = quantity;
      let rest = designators;
      while (remaining >= 2) {
        const [first, ...others] = rest;
        result.push({ ...record, quantity: '1', designator: first });
        rest = others;
        remaining--;
      }
      result.push({ ...record, quantity: String(remaining), designator: rest.join(',') });
    }

    this.logger.log(`Number of rows in the BOM increased from ${records.length} to ${result.length} after quantity split`);
    return { records: result, reviews };
  }
}
