import { describe, expect, it } from 'vitest';
import { allItems, atLeast, deriveJobOutcome, fraction, requiredSuccesses, type ItemState } from './outcome.js';

function items(statuses: Array<'completed' | 'failed'>, round = 1): ItemState[] {
  return statuses.map((status, index) => ({
    round,
    ordinal: index + 1,
    label: `doc-${index + 1}`,
    status,
    errorMessage: status === 'failed' ? `error on ${index + 1}` : null,
  }));
}

describe('requiredSuccesses', () => {
  it('resolves each threshold kind against the item count', () => {
    expect(requiredSuccesses(allItems(), 5)).toBe(5);
    expect(requiredSuccesses(atLeast(4), 8)).toBe(4);
    expect(requiredSuccesses(fraction(0.5), 5)).toBe(3);
  });
});

describe('deriveJobOutcome', () => {
  const fourOfFive = items(['completed', 'completed', 'completed', 'completed', 'failed']);

  it('fails an all-items round when one item failed', () => {
    const outcome = deriveJobOutcome([{ round: 1, label: 'Summaries', threshold: allItems() }], fourOfFive);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.errorMessage).toBe('Summaries: only 4 of 5 items succeeded (minimum 5)');
    expect(outcome.itemErrors).toEqual([{ round: 1, ordinal: 5, label: 'doc-5', error: 'error on 5' }]);
  });

  it('completes with partial errors when the threshold allows it', () => {
    const outcome = deriveJobOutcome([{ round: 1, label: 'Summaries', threshold: atLeast(4) }], fourOfFive);

    expect(outcome.status).toBe('completed');
    expect(outcome.detail).toBe('Completed with 4 of 5 items; 1 failed');
    expect(outcome.itemErrors).toHaveLength(1);
  });

  it('is a pure function of its inputs', () => {
    const rules = [{ round: 1, label: 'Reviews', threshold: atLeast(4) }];
    const shuffled = [...fourOfFive].reverse();

    expect(deriveJobOutcome(rules, shuffled)).toEqual(deriveJobOutcome(rules, fourOfFive));
  });

  it('stops at the first round below its threshold', () => {
    const rules = [
      { round: 1, label: 'Reviews', threshold: atLeast(1) },
      { round: 2, label: 'Meta-review', threshold: allItems() },
      { round: 3, label: 'Fact check', threshold: allItems() },
    ];
    const outcome = deriveJobOutcome(rules, [...items(['completed', 'failed']), ...items(['failed'], 2)]);

    expect(outcome.status).toBe('failed');
    expect(outcome.rounds.map(r => r.round)).toEqual([1, 2]);
    if (outcome.status === 'failed') {
      expect(outcome.errorMessage).toBe('Meta-review: only 0 of 1 items succeeded (minimum 1)');
    }
  });

  it('treats an empty optional round as met', () => {
    const rules = [
      { round: 1, label: 'Summaries', threshold: allItems() },
      { round: 2, label: 'Translations', threshold: allItems() },
    ];
    const outcome = deriveJobOutcome(rules, items(['completed', 'completed']));

    expect(outcome.status).toBe('completed');
    expect(outcome.detail).toBe('Completed: 2 of 2 items succeeded');
  });

  it('fails on a fatal error whatever the items say', () => {
    const outcome = deriveJobOutcome([{ round: 1, label: 'Files', threshold: atLeast(1) }], items(['completed']), 'disk full');

    expect(outcome).toMatchObject({ status: 'failed', errorMessage: 'disk full' });
  });

  it('refuses to derive while items are still running', () => {
    const running: ItemState[] = [{ round: 1, ordinal: 1, label: 'a', status: 'processing', errorMessage: null }];
    expect(() => deriveJobOutcome([{ round: 1, label: 'x', threshold: allItems() }], running)).toThrow(/still running/);
  });
});
