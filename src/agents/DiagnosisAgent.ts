import type { GraphStore } from '../reasoner/graphStore.js';
import { solutionsFor } from '../reasoner/knowledge.js';
import { MAX_DIFFERENTIATION_POOL, rankDiseases, selectDifferentiatingSymptom } from '../reasoner/reasoner.js';
import { normalizeSymptom } from '../reasoner/symptomMatcher.js';
import { config } from '../config.js';
import type { TextGenerator } from '../llmService.js';
import { UNAVAILABLE_PREFIX } from '../llmService.js';
import { evaluateStopConditions } from '../stopConditionEngine.js';
import type { CandidateDisease, ConversationState, DiagnosisRecord, StateView, StopReason, TurnResult } from '../types.js';
import { OPEN_PROMPT, formatQuestion } from './clarifyingQuestions.js';
import { classifyReply } from './replyClassifier.js';

export interface AgentDeps {
  graph: GraphStore;
  llm: TextGenerator;
  maxCandidates?: number;
}

type Framing = 'complete' | 'analysis_complete' | 'final' | 'summary';
type TurnFraming = Exclude<Framing, 'summary'>;

const HEADLINES: Record<TurnFraming, string> = {
  complete: 'DIAGNOSIS COMPLETE!',
  analysis_complete: 'DIAGNOSIS (Analysis Complete)!',
  final: 'FINAL DIAGNOSIS!'
};

export const NEED_MORE_INFO = `I need more information. ${OPEN_PROMPT}`;

export function makeDefaultState(id: string): ConversationState {
  return {
    id,
    stage: 'collecting',
    turn: 0,
    confirmed: [],
    ruledOut: [],
    asked: [],
    lastAsked: null,
    candidateDiseases: [],
    history: [],
    diagnosis: null
  };
}

function addUnique(list: string[], value: string) {
  if (value && !list.includes(value)) list.push(value);
}

function pct(p: number) { return `${(p * 100).toFixed(1)}%`; }

function listOrNone(items: string[]) { return items.length ? items.join(', ') : 'none'; }

function framingFor(reason: StopReason): TurnFraming {
  if (reason === 'sufficient_evidence') return 'analysis_complete';
  if (reason === 'no_more_questions') return 'final';
  return 'complete';
}

function framingNote(framing: Framing, state: ConversationState): string {
  switch (framing) {
    case 'complete': return `DIAGNOSIS after ${state.confirmed.length} symptoms confirmed`;
    case 'analysis_complete': return 'ANALYSIS COMPLETE - Sufficient symptoms';
    case 'final': return 'NO MORE QUESTIONS - Final diagnosis';
    case 'summary': return 'SUMMARY ANALYSIS';
  }
}

export function buildDiagnosisContext(
  graph: GraphStore,
  state: Pick<ConversationState, 'confirmed' | 'ruledOut'>,
  disease: CandidateDisease,
  note = ''
): string {
  const parts = [
    `CONFIRMED symptoms: ${listOrNone(state.confirmed)}`,
    `RULED OUT symptoms: ${listOrNone(state.ruledOut)}`,
    `DIAGNOSED disease: ${disease.name} (${pct(disease.matchPercentage)} match)`,
    `MATCHED symptoms: ${listOrNone(disease.matchedSymptoms)}`
  ];
  if (note) parts.push(note);

  const solutions = solutionsFor(graph, disease.name);
  if (!solutions.length) {
    parts.push('NO SPECIFIC SOLUTIONS FOUND IN GRAPH');
  } else {
    parts.push(`AVAILABLE SOLUTIONS: ${solutions.map(s => s.name).join(', ')}`);
    for (const s of solutions) {
      if (s.description) parts.push(`SOLUTION - ${s.name}: ${s.description}`);
      if (s.treatment) parts.push(`TREATMENT - ${s.name}: ${s.treatment}`);
    }
  }
  return parts.join(' | ');
}

async function narrate(llm: TextGenerator, symptoms: string[], context: string): Promise<string> {
  try {
    return await llm.generate(symptoms, context);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error('[Agent] text generation threw:', reason);
    return `${UNAVAILABLE_PREFIX}: ${reason}`;
  }
}

async function diagnose(
  deps: AgentDeps,
  state: ConversationState,
  disease: CandidateDisease,
  reason: StopReason
): Promise<TurnResult> {
  const framing = framingFor(reason);
  const context = buildDiagnosisContext(deps.graph, state, disease, framingNote(framing, state));
  const text = await narrate(deps.llm, [...state.confirmed], context);

  const diagnosis: DiagnosisRecord = {
    disease: disease.name,
    matchPercentage: disease.matchPercentage,
    reason,
    text
  };
  state.stage = 'diagnosed';
  state.diagnosis = diagnosis;
  state.history.push({ role: 'assistant', content: text });
  console.log(`[Agent] session=${state.id} diagnosed "${disease.name}" (${pct(disease.matchPercentage)}) reason=${reason}`);

  return { status: 'diagnosis', stage: 'diagnosed', message: `${HEADLINES[framing]}\n\n${text}`, diagnosis };
}

function applyReply(state: ConversationState, input: string, normalized: string, firstTurn: boolean) {
  if (firstTurn) {
    addUnique(state.confirmed, normalized);
    return;
  }
  const kind = classifyReply(input);
  console.log(`[Agent] session=${state.id} reply="${input}" -> ${kind}`);
  if (kind === 'new_symptom') {
    addUnique(state.confirmed, normalized);
    return;
  }
  if (!state.lastAsked) {
    console.warn(`[Agent] session=${state.id} got "${kind}" with no pending question`);
    return;
  }
  addUnique(kind === 'confirmed' ? state.confirmed : state.ruledOut, state.lastAsked);
  state.lastAsked = null;
}

/**
 * Runs one user turn against the session state, mutating it in place.
 * Never rejects: failures come back as an `error` result.
 */
export async function processTurn(deps: AgentDeps, state: ConversationState, userInput: string): Promise<TurnResult> {
  const input = (userInput ?? '').trim();

  if (state.stage === 'diagnosed') {
    const name = state.diagnosis?.disease ?? 'unknown';
    return {
      status: 'already_diagnosed',
      stage: 'diagnosed',
      message: `Diagnosis already complete (${name}). Reset the session to start over.`,
      diagnosis: state.diagnosis
    };
  }

  const normalized = normalizeSymptom(input);
  if (!normalized) return { status: 'need_more_info', stage: 'collecting', message: OPEN_PROMPT };

  try {
    const firstTurn = state.turn === 0;
    state.turn += 1;
    state.history.push({ role: 'user', content: input });
    applyReply(state, input, normalized, firstTurn);

    const limit = deps.maxCandidates ?? config.maxCandidates;
    state.candidateDiseases = rankDiseases(deps.graph, state.confirmed).slice(0, limit);
    const candidates = state.candidateDiseases;
    console.log(`[Agent] session=${state.id} turn=${state.turn} confirmed=${state.confirmed.length} candidates=${candidates.length}`);

    const decision = await evaluateStopConditions(state.confirmed.length, candidates);
    if (decision) return await diagnose(deps, state, decision.disease, decision.reason);

    const excluded = [...state.confirmed, ...state.ruledOut, ...state.asked];
    const pool = candidates.slice(0, MAX_DIFFERENTIATION_POOL).map(c => c.name);
    const next = selectDifferentiatingSymptom(deps.graph, pool, excluded);
    if (next) {
      state.lastAsked = next;
      addUnique(state.asked, next);
      const question = formatQuestion(next);
      state.history.push({ role: 'assistant', content: question });
      return { status: 'question', stage: 'collecting', message: question, symptom: next };
    }

    const top = candidates[0];
    if (top) return await diagnose(deps, state, top, 'no_more_questions');

    return { status: 'need_more_info', stage: 'collecting', message: NEED_MORE_INFO };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[Agent] session=${state.id} turn failed:`, reason);
    return { status: 'error', stage: state.stage, message: `Could not process that reply: ${reason}` };
  }
}

/** One-shot narrative for the current evidence; leaves the state untouched. */
export async function summarize(deps: AgentDeps, state: ConversationState): Promise<string> {
  if (!state.confirmed.length) {
    return 'No symptoms confirmed yet. Please describe what you observe on the plant.';
  }
  const [top] = rankDiseases(deps.graph, state.confirmed);
  if (!top) return 'No matching diseases found in graph for the confirmed symptoms.';
  const context = buildDiagnosisContext(deps.graph, state, top, framingNote('summary', state));
  return narrate(deps.llm, [...state.confirmed], context);
}

export function describeState(state: ConversationState): StateView {
  return {
    stage: state.stage,
    turn: state.turn,
    confirmed: [...state.confirmed],
    ruledOut: [...state.ruledOut],
    asked: [...state.asked],
    candidateDiseases: state.candidateDiseases.map(c => ({
      ...c,
      allSymptoms: [...c.allSymptoms],
      matchedSymptoms: [...c.matchedSymptoms]
    }))
  };
}

export function resetState(state: ConversationState) {
  Object.assign(state, makeDefaultState(state.id));
}

export interface DiagnosisSession {
  readonly state: ConversationState;
  processTurn(input: string): Promise<string>;
  summary(): Promise<string>;
  currentState(): StateView;
  reset(): void;
}

/** Binds one conversation state to the shared graph and generator. */
export function createDiagnosisSession(deps: AgentDeps, state: ConversationState): DiagnosisSession {
  return {
    state,
    processTurn: async (input) => (await processTurn(deps, state, input)).message,
    summary: () => summarize(deps, state),
    currentState: () => describeState(state),
    reset: () => resetState(state)
  };
}
