import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { CanonicalRecord, ReviewNote } from '../common/interfaces';
import { normalizeLabel } from '../common/label-normalizer';
import { findConsensusMatch } from '../common/similarity';
import { TaxonomyFile, TaxonomyFileSchema, TransformResult } from './types';

/**
 * Dictionnaire de catégories prêt à l'emploi.
 * Chaque catégorie liste son propre nom en premier synonyme.
 */
export interface Taxonomy {
  categories: ReadonlyArray<{ name: string; synonyms: readonly string[] }>;
  synonyms: readonly string[];                       // Liste aplatie, sans doublons normalisés
  ownerBySynonym: ReadonlyMap<string, string>;       // synonyme normalisé -> catégorie
}

export interface ComponentTypeMatch {
  value: string;
  matched: boolean;
}

// Utilisé si le fichier de taxonomie est absent
const FALLBACK_CATEGORIES = [
  'Capacitor', 'Connector', 'Crystal', 'Diode', 'FUSE', 'IC', 'Inductor', 'LED',
  'MCU', 'PCB', 'Relay', 'Resistor', 'Sensor', 'Switch', 'Transformer',
  'Transistor', 'Unknown/Misc', 'Voltage Regulator', 'Wire',
];

/**
 * TaxonomyService - Ramène le type de composant libre à une catégorie canonique
 *
 * Correspondance exacte d'abord, puis consensus Jaccard/Levenshtein sur la liste
 * aplatie des synonymes. Sans consensus la valeur d'origine est conservée et signalée.
 */
@Injectable()
export class TaxonomyService implements OnModuleInit {
  private readonly logger = new Logger(TaxonomyService.name);
  private defaultTaxonomy: Taxonomy = TaxonomyService.buildTaxonomy({
    version: 1,
    categories: FALLBACK_CATEGORIES.map((name) => ({ name, synonyms: [] })),
  });

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const configured = this.configService.get<string>('bom.taxonomyPath') || 'data/component-taxonomy.json';
    const filePath = path.isAbsolute(configured) ? configured : path.join(process.cwd(), configured);

    if (!fs.existsSync(filePath)) {
      this.logger.warn(`Taxonomy file not found at ${filePath}, using ${FALLBACK_CATEGORIES.length} fallback categories`);
      return;
    }

    this.defaultTaxonomy = TaxonomyService.loadTaxonomyFile(filePath);
    this.logger.log(
      `Loaded ${this.defaultTaxonomy.categories.length} component categories (${this.defaultTaxonomy.synonyms.length} synonyms)`,
    );
  }

  getDefaultTaxonomy(): Taxonomy {
    return this.defaultTaxonomy;
  }

  static loadTaxonomyFile(filePath: string): Taxonomy {
    const content: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return TaxonomyService.buildTaxonomy(TaxonomyFileSchema.parse(content));
  }

  static buildTaxonomy(file: TaxonomyFile): Taxonomy {
    const synonyms: string[] = [];
    const ownerBySynonym = new Map<string, string>();

    const categories = file.categories.map((category) => {
      const categorySynonyms = [category.name, ...category.synonyms];
      for (const synonym of categorySynonyms) {
        const key = normalizeLabel(synonym);
        // Premier propriétaire gagne
        if (!key || ownerBySynonym.has(key)) continue;
        ownerBySynonym.set(key, category.name);
        synonyms.push(synonym);
      }
      return { name: category.name, synonyms: categorySynonyms };
    });

    return { categories, synonyms, ownerBySynonym };
  }

  normalizeComponentType(value: string, taxonomy: Taxonomy): ComponentTypeMatch {
    const key = normalizeLabel(value);
    if (!key) return { value, matched: true };

    const exactOwner = taxonomy.ownerBySynonym.get(key);
    if (exactOwner) return { value: exactOwner, matched: true };

    const synonym = findConsensusMatch(value, taxonomy.synonyms);
    const owner = synonym === null ? undefined : taxonomy.ownerBySynonym.get(normalizeLabel(synonym));
    if (!owner) return { value, matched: false };

    return { value: owner, matched: true };
  }

  normalizeRecords(records: readonly CanonicalRecord[], taxonomy: Taxonomy, sheetName?: string): TransformResult {
    const reviews: ReviewNote[] = [];
    let changed = 0;

    const normalized = records.map((record) => {
      const match = this.normalizeComponentType(record.componentType, taxonomy);
      if (!match.matched) {
        reviews.push({
          reason: 'unrecognized_component',
          value: record.componentType,
          sheetName,
          item: record.item,
        });
        this.logger.warn(`Unrecognized component type "${record.componentType}" (item ${record.item || '?'})`);
      }
      if (match.value !== record.componentType) changed++;
      return { ...record, componentType: match.value };
    });

    this.logger.log(`${changed} component types updated, ${reviews.length} left for review`);
    return { records: normalized, reviews };
  }
}
