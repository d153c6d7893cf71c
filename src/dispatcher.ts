import { config } from './config.js';
import { LlmTextGenerator } from './llmService.js';
import { loadGraphSnapshot } from './reasoner/knowledge.js';
import { sessionStore } from './sessionStore.js';
import { describeState, processTurn, resetState, summarize, type AgentDeps } from './agents/DiagnosisAgent.js';
import type { StateView, TurnResult } from './types.js';

let _deps: AgentDeps | null = null;
export function getAgentDeps(): AgentDeps {
  if (_deps) return _deps;
  _deps = {
    graph: loadGraphSnapshot(config.graphPath),
    llm: new LlmTextGenerator(),
    maxCandidates: config.maxCandidates
  };
  return _deps;
}

/** Swaps the shared graph/generator, e.g. for an in-process fake. */
export function setAgentDeps(deps: AgentDeps | null) {
  _deps = deps;
}

export type DispatchResult =
  | ({ command: 'turn' } & TurnResult)
  | { command: 'reset'; status: 'reset'; sessionId: string }
  | { command: 'summary'; status: 'summary'; summary: string }
  | { command: 'state'; status: 'state'; state: StateView };

export async function runTurn(sessionId: string, text: string): Promise<TurnResult> {
  const state = await sessionStore.getSession(sessionId);
  const result = await processTurn(getAgentDeps(), state, text);
  await sessionStore.saveSession(sessionId, state);
  return result;
}

export async function getSummary(sessionId: string): Promise<string> {
  const state = await sessionStore.getSession(sessionId);
  return summarize(getAgentDeps(), state);
}

export async function getState(sessionId: string): Promise<StateView> {
  return describeState(await sessionStore.getSession(sessionId));
}

export async function resetSession(sessionId: string): Promise<void> {
  const state = await sessionStore.getSession(sessionId);
  resetState(state);
  await sessionStore.resetSession(sessionId);
}

// text commands a user can type instead of a symptom
export async function dispatchMessage(userInput: string = '', sessionId: string): Promise<DispatchResult> {
  const input = userInput.trim().toLowerCase();

  if (input === 'reset') {
    await resetSession(sessionId);
    return { command: 'reset', status: 'reset', sessionId };
  }
  if (input === 'summary') {
    return { command: 'summary', status: 'summary', summary: await getSummary(sessionId) };
  }
  if (input === 'state') {
    return { command: 'state', status: 'state', state: await getState(sessionId) };
  }

  const result = await runTurn(sessionId, userInput);
  return { command: 'turn', ...result };
}
