import { DEFAULT_SPLIT_EXEMPT_TYPES, EXCLUSION_PRESETS } from '../bom/types';

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export default () => {
  // Préréglage d'exclusions (none | electrical), surchargé liste par liste
  const exclusions = EXCLUSION_PRESETS[process.env.BOM_EXCLUSION_PRESET || 'none'] ?? EXCLUSION_PRESETS.none;

  return {
    app: {
      port: parseInt(process.env.PORT || '3000', 10),
    },
    bom: {
      taxonomyPath: process.env.BOM_TAXONOMY_PATH || 'data/component-taxonomy.json',
      strictHeaders: process.env.BOM_STRICT_HEADERS === 'true',
      splitExemptTypes: parseList(process.env.BOM_SPLIT_EXEMPT_TYPES, DEFAULT_SPLIT_EXEMPT_TYPES),
      excludeDescriptionTerms: parseList(process.env.BOM_EXCLUDE_DESCRIPTION_TERMS, exclusions.descriptionTerms),
      excludeComponentTypes: parseList(process.env.BOM_EXCLUDE_COMPONENT_TYPES, exclusions.componentTypes),
      // Taille max des fichiers Excel reçus (10 Mo par défaut)
      maxUploadBytes: parseInt(process.env.BOM_MAX_UPLOAD_BYTES || '10485760', 10),
    },
  };
};
