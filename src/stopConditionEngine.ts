import { Engine, type RuleProperties } from 'json-rules-engine';
import type { CandidateDisease, StopReason } from './types.js';

export interface StopFacts {
  confirmedCount: number;
  candidateCount: number;
  topPercentage: number;
  gap: number;
  topMatchCount: number;
}

export interface StopDecision {
  reason: StopReason;
  disease: CandidateDisease;
}

const ENOUGH_EVIDENCE = { fact: 'confirmedCount', operator: 'greaterThanInclusive', value: 2 };

// Higher priority wins when several rules fire.
export const STOP_RULES: RuleProperties[] = [
  {
    name: 'single-candidate',
    priority: 40,
    conditions: {
      all: [ENOUGH_EVIDENCE, { fact: 'candidateCount', operator: 'equal', value: 1 }]
    },
    event: { type: 'definitive' }
  },
  {
    name: 'clear-lead',
    priority: 30,
    conditions: {
      all: [
        ENOUGH_EVIDENCE,
        { fact: 'candidateCount', operator: 'greaterThanInclusive', value: 2 },
        {
          any: [
            { fact: 'gap', operator: 'greaterThan', value: 0.2 },
            {
              all: [
                { fact: 'topPercentage', operator: 'greaterThan', value: 0.7 },
                { fact: 'gap', operator: 'greaterThan', value: 0.1 }
              ]
            }
          ]
        }
      ]
    },
    event: { type: 'clear_lead' }
  },
  {
    name: 'strong-match',
    priority: 20,
    conditions: {
      all: [
        ENOUGH_EVIDENCE,
        { fact: 'candidateCount', operator: 'greaterThanInclusive', value: 1 },
        { fact: 'topMatchCount', operator: 'greaterThanInclusive', value: 3 },
        { fact: 'topPercentage', operator: 'greaterThanInclusive', value: 0.6 }
      ]
    },
    event: { type: 'strong_match' }
  },
  {
    name: 'sufficient-evidence',
    priority: 10,
    conditions: {
      all: [
        { fact: 'confirmedCount', operator: 'greaterThanInclusive', value: 4 },
        { fact: 'candidateCount', operator: 'greaterThanInclusive', value: 1 }
      ]
    },
    event: { type: 'sufficient_evidence' }
  }
];

const PRECEDENCE: StopReason[] = ['definitive', 'clear_lead', 'strong_match', 'sufficient_evidence'];

const engine = new Engine(STOP_RULES, { allowUndefinedFacts: false });

export function stopFacts(confirmedCount: number, candidates: CandidateDisease[]): StopFacts {
  const [top, second] = candidates;
  const topPercentage = top?.matchPercentage ?? 0;
  return {
    confirmedCount,
    candidateCount: candidates.length,
    topPercentage,
    gap: second ? topPercentage - second.matchPercentage : topPercentage,
    topMatchCount: top?.matchCount ?? 0
  };
}

function isStopReason(type: string): type is StopReason {
  return PRECEDENCE.some(r => r === type);
}

/** Decides whether the evidence so far is enough to name the top candidate. */
export async function evaluateStopConditions(
  confirmedCount: number,
  candidates: CandidateDisease[]
): Promise<StopDecision | null> {
  const top = candidates[0];
  if (!top) return null;

  const { events } = await engine.run({ ...stopFacts(confirmedCount, candidates) });
  const fired = events.map(e => e.type).filter(isStopReason);
  if (!fired.length) return null;

  const reason = PRECEDENCE.find(r => fired.includes(r)) ?? fired[0];
  return { reason, disease: top };
}
