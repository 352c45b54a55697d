import { UnprocessableEntityException } from '@nestjs/common';

/**
 * Erreurs métier du moteur BOM
 * Les services lèvent ces erreurs, les contrôleurs les traduisent en HTTP.
 */

/**
 * Structure du tableur inexploitable : en-tête introuvable, bloc vide,
 * identifiants requis absents.
 */
export class BomStructureError extends Error {
  constructor(
    message: string,
    public readonly missingLabels: string[] = [],
  ) {
    super(message);
    this.name = 'BomStructureError';
  }
}

/**
 * Données incohérentes dans une ligne : quantité vs repères, repère en double,
 * fabricants vs références. Le fichier source doit être corrigé.
 */
export class BomIntegrityError extends Error {
  constructor(
    message: string,
    public readonly offendingValues: string[] = [],
  ) {
    super(message);
    this.name = 'BomIntegrityError';
  }
}

/**
 * Traduction HTTP des erreurs métier (422), les autres erreurs sont relancées telles quelles
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof BomStructureError) {
    return new UnprocessableEntityException({
      message: error.message,
      error: error.name,
      missingLabels: error.missingLabels,
    });
  }
  if (error instanceof BomIntegrityError) {
    return new UnprocessableEntityException({
      message: error.message,
      error: error.name,
      offendingValues: error.offendingValues,
    });
  }
  return error;
}
