import { makeInteraction } from '../test/testHelpers';

import { InvalidProbabilityError } from './errors';
import { clickedDocId, clickedDocIds, createInteraction, Document } from './types';

describe('Document', () => {
  it('accepts the probability bounds', () => {
    expect(new Document('never', 0).attraction).toBe(0);
    expect(new Document('always', 1).attraction).toBe(1);
  });

  it.each([-0.01, 1.01, NaN, Infinity])('rejects attraction %p', (attraction) => {
    expect(() => new Document('doc', attraction)).toThrow(InvalidProbabilityError);
  });

  it('names the document in the error', () => {
    expect(() => new Document('doc-X', 1.5)).toThrow(
      "Attraction probability of 'doc-X' must be in [0, 1], got 1.5.",
    );
  });

  it('is frozen', () => {
    expect(Object.isFrozen(new Document('a', 0.5))).toBe(true);
  });
});

describe('Interaction', () => {
  it('copies and freezes its sequences', () => {
    const slate = ['a', 'b'];
    const interaction = createInteraction({
      slate,
      seen: ['a'],
      clickIndex: 0,
      clickPositions: [0],
      reward: 1,
    });
    slate.push('c');
    expect(interaction.slate).toEqual(['a', 'b']);
    expect(Object.isFrozen(interaction)).toBe(true);
    expect(Object.isFrozen(interaction.seen)).toBe(true);
    expect(Object.isFrozen(interaction.clickPositions)).toBe(true);
  });

  it('resolves click positions through the slate', () => {
    // examination skipped "b", so slate position 2 is seen index 1
    const interaction = makeInteraction(['a', 'b', 'c'], ['a', 'c'], 0, [0, 2]);
    expect(clickedDocId(interaction)).toBe('a');
    expect(clickedDocIds(interaction)).toEqual(['a', 'c']);
  });

  it('has no clicked document without a click', () => {
    const interaction = makeInteraction(['a', 'b'], ['a', 'b'], null);
    expect(clickedDocId(interaction)).toBeNull();
    expect(clickedDocIds(interaction)).toEqual([]);
  });

  it('ignores positions outside the slate', () => {
    const interaction = makeInteraction(['a', 'b'], ['a', 'b'], 5, [5, 1, -1]);
    expect(clickedDocId(interaction)).toBeNull();
    expect(clickedDocIds(interaction)).toEqual(['b']);
  });
});
