import { times } from 'lodash';

import { makeInteraction } from '../../test/testHelpers';
import { InvalidConfigurationError, InvalidProbabilityError, UnknownDocumentError } from '../errors';

import { EpsilonGreedyRanking } from './epsilon-greedy.policy';

describe('EpsilonGreedyRanking', () => {
  const docIds = ['a', 'b', 'c'];

  it('keeps universe order while every score is tied', () => {
    const policy = new EpsilonGreedyRanking(docIds, 2, { epsilon: 0 }, 1);
    expect(policy.selectSlate()).toEqual(['a', 'b']);
  });

  it('ranks by smoothed click-through rate when exploiting', () => {
    const policy = new EpsilonGreedyRanking(docIds, 2, { epsilon: 0 }, 1);
    times(2, () => {
      policy.update(makeInteraction(['a', 'b'], ['a'], 0));
      policy.update(makeInteraction(['b', 'a'], ['b'], null));
    });
    expect(policy.score('a')).toBeCloseTo(0.75);
    expect(policy.score('b')).toBeCloseTo(0.25);
    expect(policy.score('c')).toBeCloseTo(0.5);
    expect(policy.selectSlate()).toEqual(['a', 'c']);
  });

  it('credits only the first click', () => {
    const policy = new EpsilonGreedyRanking(docIds, 3, { epsilon: 0 }, 1);
    policy.update(makeInteraction(['a', 'b', 'c'], ['a', 'b', 'c'], 0, [0, 2]));
    expect(policy.statistics()).toEqual({
      a: { impressions: 1, clicks: 1 },
      b: { impressions: 1, clicks: 0 },
      c: { impressions: 1, clicks: 0 },
    });
  });

  it('counts impressions for examined documents only', () => {
    const policy = new EpsilonGreedyRanking(docIds, 3, { epsilon: 0 }, 1);
    policy.update(makeInteraction(['a', 'b', 'c'], ['a'], null));
    expect(policy.statistics().b).toEqual({ impressions: 0, clicks: 0 });
    expect(policy.statistics().a).toEqual({ impressions: 1, clicks: 0 });
  });

  it('explores with distinct documents', () => {
    const policy = new EpsilonGreedyRanking(docIds, 2, { epsilon: 1 }, 8);
    times(25, () => {
      const slate = policy.selectSlate();
      expect(slate).toHaveLength(2);
      expect(new Set(slate).size).toBe(2);
      slate.forEach((docId) => expect(docIds).toContain(docId));
    });
  });

  it('rejects invalid hyperparameters', () => {
    expect(() => new EpsilonGreedyRanking(docIds, 2, { epsilon: 1.5 })).toThrow(
      InvalidProbabilityError,
    );
    expect(() => new EpsilonGreedyRanking(docIds, 2, { priorSuccess: 0 })).toThrow(
      InvalidConfigurationError,
    );
  });

  it('rejects feedback about unknown documents', () => {
    const policy = new EpsilonGreedyRanking(docIds, 2, {}, 1);
    expect(() => policy.update(makeInteraction(['x', 'a'], ['x'], null))).toThrow(
      UnknownDocumentError,
    );
  });

  it('returns statistics snapshots', () => {
    const policy = new EpsilonGreedyRanking(docIds, 2, {}, 1);
    const snapshot = policy.statistics();
    policy.update(makeInteraction(['a', 'b'], ['a'], 0));
    expect(snapshot.a).toEqual({ impressions: 0, clicks: 0 });
    expect(Object.isFrozen(snapshot.a)).toBe(true);
  });
});
