import { normalizeLabel } from './label-normalizer';

/**
 * Distance d'édition (insertion, suppression, substitution)
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost,
      );
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Similarité de Jaccard sur les ensembles de caractères
 */
export function jaccardSimilarity(a: string, b: string): number {
  const setA = new Set(a);
  const setB = new Set(b);
  const union = new Set([...setA, ...setB]);
  if (union.size === 0) return 0;

  let intersection = 0;
  for (const ch of setA) {
    if (setB.has(ch)) intersection++;
  }
  return intersection / union.size;
}

/**
 * Référence la plus proche au sens de Jaccard.
 * Premier vu gagne en cas d'égalité; null si aucun caractère commun.
 */
export function findBestMatchJaccard(candidate: string, references: readonly string[]): string | null {
  let bestMatch: string | null = null;
  let bestScore = 0;

  for (const reference of references) {
    const score = jaccardSimilarity(candidate, reference);
    if (score > bestScore) {
      bestScore = score;
      bestMatch = reference;
    }
  }
  return bestMatch;
}

/**
 * Référence la plus proche au sens de Levenshtein.
 * Premier vu gagne en cas d'égalité; null seulement si la liste est vide.
 */
export function findBestMatchLevenshtein(candidate: string, references: readonly string[]): string | null {
  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const reference of references) {
    const distance = levenshteinDistance(candidate, reference);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestMatch = reference;
    }
  }
  return bestMatch;
}

/**
 * Consensus des deux détecteurs, sur les formes normalisées.
 * Retourne la référence d'origine si Jaccard et Levenshtein désignent la même, sinon null.
 */
export function findConsensusMatch(candidate: string, references: readonly string[]): string | null {
  const normalizedCandidate = normalizeLabel(candidate);
  const normalizedReferences = references.map((ref) => normalizeLabel(ref));

  const byJaccard = findBestMatchJaccard(normalizedCandidate, normalizedReferences);
  const byLevenshtein = findBestMatchLevenshtein(normalizedCandidate, normalizedReferences);

  if (byJaccard === null || byJaccard !== byLevenshtein) return null;

  // Deux références peuvent partager la même forme normalisée: la première gagne
  return references[normalizedReferences.indexOf(byJaccard)];
}
