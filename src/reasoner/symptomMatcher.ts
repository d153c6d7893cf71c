export const STOP_WORDS: ReadonlySet<string> = new Set(['on', 'the', 'of', 'in', 'at', 'with', 'and', 'or', 'a', 'an']);

// root keyword -> stems that count as the same finding
export const SYMPTOM_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  yellow: ['yellowing', 'chlorosis'],
  brown: ['browning', 'necrosis'],
  wilt: ['wilting', 'drooping'],
  spot: ['spots', 'lesions', 'patches'],
  dry: ['drying', 'dried', 'dessication'],
  rot: ['rotting', 'decay', 'decomposition'],
  stunt: ['stunted', 'stunting', 'dwarf']
};

const WORD_OVERLAP_THRESHOLD = 0.5;

export type SymptomPredicate = (a: string, b: string) => boolean;

export function normalizeSymptom(text: string): string {
  return (text || '')
    .replace(/^[\s.,;:!?]+|[\s.,;:!?]+$/g, '')
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

function contentWords(text: string): Set<string> {
  return new Set(text.split(' ').filter(w => w && !STOP_WORDS.has(w)));
}

export const exactMatch: SymptomPredicate = (a, b) => a === b;

export const containmentMatch: SymptomPredicate = (a, b) => a.includes(b) || b.includes(a);

export const wordOverlapMatch: SymptomPredicate = (a, b) => {
  const left = contentWords(a);
  const right = contentWords(b);
  if (!left.size || !right.size) return false;
  let shared = 0;
  for (const w of left) if (right.has(w)) shared++;
  const union = left.size + right.size - shared;
  return shared / union > WORD_OVERLAP_THRESHOLD;
};

export const synonymMatch: SymptomPredicate = (a, b) => {
  for (const [keyword, synonyms] of Object.entries(SYMPTOM_SYNONYMS)) {
    const terms = [keyword, ...synonyms];
    if (terms.some(t => a.includes(t)) && terms.some(t => b.includes(t))) return true;
  }
  return false;
};

const PREDICATES: readonly SymptomPredicate[] = [exactMatch, containmentMatch, wordOverlapMatch, synonymMatch];

/**
 * Symmetric fuzzy equivalence between two symptom descriptions. Not
 * transitive: use it for pairwise comparison only.
 */
export function symptomsMatch(a: string, b: string): boolean {
  const left = normalizeSymptom(a);
  const right = normalizeSymptom(b);
  if (!left || !right) return false;
  return PREDICATES.some(p => p(left, right));
}

export function matchesAny(symptom: string, others: Iterable<string>): boolean {
  for (const other of others) if (symptomsMatch(symptom, other)) return true;
  return false;
}
