import { Controller, Get } from '@nestjs/common';
import { TaxonomyService } from './bom/taxonomy.service';
import { REQUIRED_V3_BOM_IDENTIFIERS, TABLE_VOCABULARY } from './bom/types';

@Controller()
export class AppController {
  constructor(private readonly taxonomyService: TaxonomyService) {}

  @Get()
  getInfo() {
    return {
      name: 'BOM Normalizer',
      version: '1.0.0',
      description: 'Extraction et normalisation de nomenclatures (BOM) depuis des classeurs Excel',
      features: [
        "Détection de la ligne d'en-tête par correspondance floue des libellés",
        'Renommage des colonnes par consensus Jaccard / Levenshtein',
        'Normalisation des types de composants (taxonomie)',
        'Éclatement quantités / fabricants, fusion des alternatives',
        'Contrôle quantité = repères et unicité des repères',
      ],
      template: {
        requiredIdentifiers: REQUIRED_V3_BOM_IDENTIFIERS,
        tableColumns: TABLE_VOCABULARY,
        componentCategories: this.taxonomyService.getDefaultTaxonomy().categories.map((c) => c.name),
      },
      endpoints: {
        bom: {
          'POST /bom/detect': 'Détecter le gabarit version 3 (multipart: file)',
          'POST /bom/parse': 'Nomenclature normalisée en JSON (multipart: file + options)',
          'POST /bom/export': 'Nomenclature normalisée en xlsx (multipart: file + options)',
          'POST /bom/normalize': 'Normaliser des lignes déjà extraites (JSON: records, options)',
        },
      },
    };
  }

  @Get('health')
  healthCheck() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
