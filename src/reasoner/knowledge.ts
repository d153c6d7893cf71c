import fs from 'fs';
import path from 'path';
import type { GraphNode, Solution } from '../types.js';
import { GraphLoadError, GraphStore } from './graphStore.js';
import { normalizeSymptom } from './symptomMatcher.js';

export const SYMPTOM_LINKS: ReadonlySet<string> = new Set(['HAS_SYMPTOM', 'MANIFESTS_AS', 'SHOWS', 'EXHIBITS']);

export function isSymptomLink(kind: string): boolean {
  return SYMPTOM_LINKS.has(kind);
}

export function isSolutionLink(kind: string): boolean {
  const k = kind.toLowerCase();
  return k.includes('solution') || k.includes('treatment') || k === 'has_solution' || k === 'treated_by';
}

/** Reads a graph snapshot file; a missing file gives an empty graph. */
export function loadGraphSnapshot(rel: string): GraphStore {
  const p = path.resolve(process.cwd(), rel);
  if (!fs.existsSync(p)) {
    console.warn(`[Graph] ${p} not found, using empty graph`);
    return GraphStore.empty();
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (err) {
    throw new GraphLoadError(`Cannot parse graph snapshot ${p}`, { cause: err });
  }
  const store = GraphStore.load(parsed);
  console.log(`[Graph] loaded ${store.size.nodes} nodes, ${store.size.relationships} relationships from ${p}`);
  return store;
}

/** Distinct normalized symptom names linked from a disease, in relationship order. */
export function symptomsOf(store: GraphStore, disease: GraphNode): string[] {
  const out = new Set<string>();
  for (const rel of store.relationshipsFrom(disease.id)) {
    if (!isSymptomLink(rel.kind)) continue;
    const target = store.nodeById(rel.target);
    if (!target || target.kind !== 'Symptom') continue;
    const name = normalizeSymptom(target.name);
    if (name) out.add(name);
  }
  return [...out];
}

export function diseaseByName(store: GraphStore, name: string): GraphNode | null {
  return store.nodesByKind('Disease').find(d => d.name === name) ?? null;
}

export function solutionsFor(store: GraphStore, diseaseName: string): Solution[] {
  const disease = diseaseByName(store, diseaseName);
  if (!disease) return [];

  const solutions: Solution[] = [];
  for (const rel of store.relationshipsFrom(disease.id)) {
    if (!isSolutionLink(rel.kind)) continue;
    const target = store.nodeById(rel.target);
    if (!target || target.kind !== 'Solution' || !target.name) continue;
    solutions.push({
      name: target.name,
      description: target.description,
      treatment: target.extra.treatment || target.extra.content || target.extra.instructions || target.name
    });
  }
  return solutions;
}
