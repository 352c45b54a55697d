import { CellValue } from './interfaces';

// Caractères ASCII imprimables + espaces (\t \n \v \f \r)
const PRINTABLE_ASCII = /[^\x20-\x7E\t\n\v\f\r]/g;
const WHITESPACE = /\s+/g;

/**
 * Convertit une cellule en string
 * - null, undefined, NaN -> ''
 * - Date -> AAAA-MM-JJ (ou ISO complet si une heure est présente)
 * - nombres et booléens -> String()
 */
export function normalizeToString(value: CellValue): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return '';
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  return String(value);
}

export function removeNonPrintableAscii(text: string): string {
  return text.replace(PRINTABLE_ASCII, '');
}

export function removeAllWhitespace(text: string): string {
  return text.replace(WHITESPACE, '');
}

/**
 * Clé de comparaison d'un libellé : sans caractères non imprimables,
 * sans aucun espace, en minuscules.
 * "U/P \n(RMB W/ VAT)" -> "u/p(rmbw/vat)"
 */
export function normalizeLabel(value: CellValue): string {
  return removeAllWhitespace(removeNonPrintableAscii(normalizeToString(value))).toLowerCase();
}
