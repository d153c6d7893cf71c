import type { CandidateDisease, DifferentiatorCandidate } from '../types.js';
import type { GraphStore } from './graphStore.js';
import { diseaseByName, symptomsOf } from './knowledge.js';
import { matchesAny, normalizeSymptom, symptomsMatch } from './symptomMatcher.js';

export const MAX_RANKED = 10;
export const MAX_DIFFERENTIATION_POOL = 5;

/**
 * Scores every disease against the confirmed symptoms. Each confirmed symptom
 * claims at most one disease symptom, so matchCount never exceeds
 * totalSymptoms. Ties on (percentage, count) fall back to name order.
 */
export function rankDiseases(store: GraphStore, confirmed: Iterable<string>): CandidateDisease[] {
  const userSymptoms = [...new Set([...confirmed].map(normalizeSymptom))].filter(Boolean);
  if (!userSymptoms.length) return [];

  const ranked: CandidateDisease[] = [];
  for (const disease of store.nodesByKind('Disease')) {
    const allSymptoms = symptomsOf(store, disease);
    const matched: string[] = [];
    for (const userSymptom of userSymptoms) {
      const hit = allSymptoms.find(s => !matched.includes(s) && symptomsMatch(userSymptom, s));
      if (hit) matched.push(hit);
    }
    if (!matched.length) continue;

    const totalSymptoms = Math.max(allSymptoms.length, 1);
    ranked.push({
      name: disease.name,
      description: disease.description,
      allSymptoms,
      matchedSymptoms: matched,
      matchCount: matched.length,
      totalSymptoms,
      matchPercentage: matched.length / totalSymptoms
    });
  }

  return ranked
    .sort((a, b) =>
      b.matchPercentage - a.matchPercentage ||
      b.matchCount - a.matchCount ||
      a.name.localeCompare(b.name))
    .slice(0, MAX_RANKED);
}

export function differentiationScore(withCount: number, poolSize: number): number {
  const withoutCount = poolSize - withCount;
  if (withCount === 0 || withoutCount <= 0) return 0;
  return Math.min(withCount, withoutCount) + 0.1 * withCount;
}

/** Every non-excluded symptom of the given diseases, best split first. */
export function rankDifferentiators(
  store: GraphStore,
  diseaseNames: string[],
  excluded: Iterable<string>
): DifferentiatorCandidate[] {
  const pool = [...new Set(diseaseNames)].slice(0, MAX_DIFFERENTIATION_POOL);
  const excludedList = [...excluded].map(normalizeSymptom).filter(Boolean);

  const bySymptom = new Map<string, Set<string>>();
  for (const name of pool) {
    const disease = diseaseByName(store, name);
    if (!disease) continue;
    for (const symptom of symptomsOf(store, disease)) {
      if (matchesAny(symptom, excludedList)) continue;
      const holders = bySymptom.get(symptom) ?? new Set<string>();
      holders.add(name);
      bySymptom.set(symptom, holders);
    }
  }

  return [...bySymptom.entries()]
    .map(([symptom, diseases]) => ({
      symptom,
      diseases: [...diseases],
      score: differentiationScore(diseases.size, pool.length)
    }))
    .sort((a, b) => b.score - a.score || a.symptom.localeCompare(b.symptom));
}

export function selectDifferentiatingSymptom(
  store: GraphStore,
  topDiseaseNames: string[],
  excluded: Iterable<string>
): string | null {
  const [best] = rankDifferentiators(store, topDiseaseNames, excluded);
  return best && best.score > 0 ? best.symptom : null;
}
