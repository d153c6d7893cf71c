import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import { GraphStore } from '../src/reasoner/graphStore.js';
import type { CandidateDisease } from '../src/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export function fixturePath(name: string) {
  return path.join(__dirname, 'fixtures', name);
}

export function loadFixture(name: 'sample_graph.json' | 'orchard_graph.json'): GraphStore {
  return GraphStore.load(JSON.parse(fs.readFileSync(fixturePath(name), 'utf8')));
}

export function fakeGenerator(text = 'Narrative') {
  return {
    generate: vi.fn(async (_symptoms: string[], _context: string) => text),
    healthCheck: vi.fn(async () => ({ available: true, message: 'fake available' }))
  };
}

export function candidate(name: string, matchCount: number, totalSymptoms: number): CandidateDisease {
  return {
    name,
    description: '',
    allSymptoms: [],
    matchedSymptoms: [],
    matchCount,
    totalSymptoms,
    matchPercentage: matchCount / totalSymptoms
  };
}
