import { describe, it, expect } from 'vitest';
import { WorkingMemory, estimateTurnTokens, estimateTextTokens } from '../working-memory.js';
import { makeTurn } from './helpers.js';

// One token per character keeps the arithmetic readable
const byLength = (turn: { content: string }) => turn.content.length;

function memory(overrides: { tokenBudget?: number; minRetainedTurns?: number } = {}): WorkingMemory {
  return new WorkingMemory({
    tokenBudget: overrides.tokenBudget ?? 100,
    fillRatio: 0.7,
    evictionBatchRatio: 0.3,
    minRetainedTurns: overrides.minRetainedTurns ?? 2,
    estimateTokens: byLength,
  });
}

const text = (length: number) => 'x'.repeat(length);

describe('estimateTurnTokens', () => {
  it('counts a quarter token per character plus role and overhead', () => {
    expect(estimateTurnTokens({ role: 'user', content: text(40) })).toBe(16);
    expect(estimateTurnTokens({ role: 'agent', content: text(3) })).toBe(6);
    expect(estimateTurnTokens({ role: 'system', content: '' })).toBe(6);
  });

  it('rounds free text up', () => {
    expect(estimateTextTokens(text(9))).toBe(3);
    expect(estimateTextTokens('')).toBe(0);
  });
});

describe('WorkingMemory', () => {
  it('keeps turns in arrival order and tracks tokens', () => {
    const wm = memory();
    wm.append(makeTurn('t1', text(10)));
    wm.append(makeTurn('t2', text(15), 'agent'));

    expect(wm.snapshot().map(turn => turn.id)).toEqual(['t1', 't2']);
    expect(wm.size).toBe(2);
    expect(wm.tokenCount).toBe(25);
    expect(wm.utilization()).toBe(25);
  });

  it('signals eviction only above the fill threshold', () => {
    const wm = memory();
    wm.append(makeTurn('t1', text(35)));
    wm.append(makeTurn('t2', text(35)));
    expect(wm.tokenCount).toBe(70);
    expect(wm.shouldEvict()).toBe(false);

    wm.append(makeTurn('t3', text(1)));
    expect(wm.shouldEvict()).toBe(true);
  });

  it('selects the oldest span covering the batch and restoring the threshold', () => {
    const wm = memory();
    for (let i = 1; i <= 8; i++) {
      wm.append(makeTurn(`t${i}`, text(10)));
    }

    const span = wm.selectEvictionSpan();
    expect(span.map(turn => turn.id)).toEqual(['t1', 't2', 't3']);
    // Selection alone removes nothing
    expect(wm.size).toBe(8);

    wm.commitEviction(span);
    expect(wm.snapshot().map(turn => turn.id)).toEqual(['t4', 't5', 't6', 't7', 't8']);
    expect(wm.tokenCount).toBe(50);
    expect(wm.shouldEvict()).toBe(false);
  });

  it('never evicts the newest retained turns', () => {
    const wm = memory();
    wm.append(makeTurn('t1', text(40)));
    wm.append(makeTurn('t2', text(40)));
    wm.append(makeTurn('t3', text(40)));

    expect(wm.evictOldest().map(turn => turn.id)).toEqual(['t1']);
    expect(wm.shouldEvict()).toBe(true);
    expect(wm.selectEvictionSpan()).toEqual([]);
  });

  it('commits a selected span after newer turns arrive', () => {
    const wm = memory();
    for (let i = 1; i <= 4; i++) {
      wm.append(makeTurn(`t${i}`, text(20)));
    }
    const span = wm.selectEvictionSpan();
    expect(span.map(turn => turn.id)).toEqual(['t1', 't2']);

    wm.append(makeTurn('t5', text(5)));
    wm.commitEviction(span);

    expect(wm.snapshot().map(turn => turn.id)).toEqual(['t3', 't4', 't5']);
    expect(wm.tokenCount).toBe(45);
  });

  it('rejects a span that is not at the head', () => {
    const wm = memory();
    wm.append(makeTurn('t1', text(10)));
    wm.append(makeTurn('t2', text(10)));

    expect(() => wm.commitEviction([makeTurn('t2', text(10))])).toThrow(
      'Eviction span is not the oldest run of resident turns'
    );
    expect(wm.size).toBe(2);
  });

  it('loads the newest turns that fit the budget', () => {
    const wm = memory();
    wm.append(makeTurn('stale', text(5)));

    const persisted = [1, 2, 3, 4, 5].map(i => makeTurn(`t${i}`, text(30)));
    wm.loadFrom(persisted);

    expect(wm.snapshot().map(turn => turn.id)).toEqual(['t3', 't4', 't5']);
    expect(wm.tokenCount).toBe(90);
  });

  it('clears to empty', () => {
    const wm = memory();
    wm.append(makeTurn('t1', text(10)));
    wm.clear();

    expect(wm.size).toBe(0);
    expect(wm.tokenCount).toBe(0);
    expect(wm.utilization()).toBe(0);
  });
});
