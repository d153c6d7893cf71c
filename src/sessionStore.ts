import { Redis } from 'ioredis';
import { makeDefaultState } from './agents/DiagnosisAgent.js';
import { config } from './config.js';
import type { CandidateDisease, ChatMessage, ConversationState, DiagnosisRecord, StopReason } from './types.js';

const mem = new Map<string, ConversationState>();

let redis: Redis | null = null;
if (config.redis.enabled) {
  redis = config.redis.url ? new Redis(config.redis.url) : new Redis();
  redis.on('error', (e) => console.error('[Redis]', e));
}

// -- normalisation of stored JSON ------------------------------------------

type Raw = Record<string, unknown>;

const isRecord = (v: unknown): v is Raw => typeof v === 'object' && v !== null && !Array.isArray(v);
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const strings = (v: unknown): string[] => Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];

const STOP_REASONS: StopReason[] = ['definitive', 'clear_lead', 'strong_match', 'sufficient_evidence', 'no_more_questions'];

function toCandidate(v: unknown): CandidateDisease | null {
  if (!isRecord(v) || typeof v.name !== 'string') return null;
  if (!isNumber(v.matchCount) || !isNumber(v.totalSymptoms) || !isNumber(v.matchPercentage)) return null;
  return {
    name: v.name,
    description: typeof v.description === 'string' ? v.description : '',
    allSymptoms: strings(v.allSymptoms),
    matchedSymptoms: strings(v.matchedSymptoms),
    matchCount: v.matchCount,
    totalSymptoms: v.totalSymptoms,
    matchPercentage: v.matchPercentage
  };
}

function toMessage(v: unknown): ChatMessage | null {
  if (!isRecord(v) || typeof v.content !== 'string') return null;
  if (v.role !== 'system' && v.role !== 'user' && v.role !== 'assistant') return null;
  return { role: v.role, content: v.content };
}

function toDiagnosis(v: unknown): DiagnosisRecord | null {
  if (!isRecord(v) || typeof v.disease !== 'string' || typeof v.text !== 'string' || !isNumber(v.matchPercentage)) return null;
  const reason = STOP_REASONS.find(r => r === v.reason);
  if (!reason) return null;
  return { disease: v.disease, matchPercentage: v.matchPercentage, reason, text: v.text };
}

export function normalizeState(id: string, raw: unknown): ConversationState {
  if (!isRecord(raw)) return makeDefaultState(id);
  const diagnosis = toDiagnosis(raw.diagnosis);
  return {
    id,
    stage: raw.stage === 'diagnosed' && diagnosis ? 'diagnosed' : 'collecting',
    turn: isNumber(raw.turn) ? raw.turn : 0,
    confirmed: strings(raw.confirmed),
    ruledOut: strings(raw.ruledOut),
    asked: strings(raw.asked),
    lastAsked: typeof raw.lastAsked === 'string' ? raw.lastAsked : null,
    candidateDiseases: Array.isArray(raw.candidateDiseases)
      ? raw.candidateDiseases.map(toCandidate).filter((c): c is CandidateDisease => c !== null)
      : [],
    history: Array.isArray(raw.history)
      ? raw.history.map(toMessage).filter((m): m is ChatMessage => m !== null)
      : [],
    diagnosis
  };
}

// -- store API ---------------------------------------------------------------

export const sessionStore = {
  async getSession(id: string): Promise<ConversationState> {
    if (!redis) {
      const s = mem.get(id) ?? makeDefaultState(id);
      mem.set(id, s);
      return s;
    }
    const key = `session:${id}`;
    const data = await redis.get(key);
    if (!data) {
      const s = makeDefaultState(id);
      await redis.set(key, JSON.stringify(s));
      return s;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      console.warn(`[sessionStore] Corrupt JSON for ${key}, resetting.`, err);
      parsed = null;
    }
    return normalizeState(id, parsed);
  },

  async saveSession(id: string, state: ConversationState) {
    if (!redis) { mem.set(id, state); return; }
    await redis.set(`session:${id}`, JSON.stringify(state));
  },

  async resetSession(id: string) {
    if (!redis) { mem.delete(id); return; }
    await redis.del(`session:${id}`);
  }
};
