import { describe, expect, it } from 'vitest';
import { makeDefaultState } from '../src/agents/DiagnosisAgent.js';
import { normalizeState, sessionStore } from '../src/sessionStore.js';

describe('sessionStore (in memory)', () => {
  it('creates, saves and resets sessions', async () => {
    const fresh = await sessionStore.getSession('store-1');
    expect(fresh).toEqual(makeDefaultState('store-1'));

    fresh.confirmed.push('brown spots');
    fresh.turn = 1;
    await sessionStore.saveSession('store-1', fresh);
    expect((await sessionStore.getSession('store-1')).confirmed).toEqual(['brown spots']);

    await sessionStore.resetSession('store-1');
    expect(await sessionStore.getSession('store-1')).toEqual(makeDefaultState('store-1'));
  });

  it('keeps sessions apart', async () => {
    const a = await sessionStore.getSession('store-a');
    a.asked.push('leaf drop');
    await sessionStore.saveSession('store-a', a);

    expect((await sessionStore.getSession('store-b')).asked).toEqual([]);
  });
});

describe('normalizeState', () => {
  it('falls back to defaults for non-records', () => {
    expect(normalizeState('x', null)).toEqual(makeDefaultState('x'));
    expect(normalizeState('x', 'corrupt')).toEqual(makeDefaultState('x'));
  });

  it('drops malformed entries', () => {
    const state = normalizeState('x', {
      stage: 'diagnosed',
      turn: 'two',
      confirmed: ['yellowing leaves', 3],
      lastAsked: 7,
      candidateDiseases: [{ name: 'Iron Chlorosis' }, 'junk'],
      history: [{ role: 'robot', content: 'hi' }, { role: 'user', content: 'yellowing leaves' }],
      diagnosis: { disease: 'Iron Chlorosis', matchPercentage: 1, reason: 'guess', text: 'x' }
    });

    expect(state).toEqual({
      ...makeDefaultState('x'),
      confirmed: ['yellowing leaves'],
      history: [{ role: 'user', content: 'yellowing leaves' }]
    });
  });
});
