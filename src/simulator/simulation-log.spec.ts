import { buildLog, makeInteraction } from '../../test/testHelpers';

import { SimulationLog } from './simulation-log';

describe('SimulationLog', () => {
  it('derives totals from the interactions', () => {
    const log = buildLog([1, 0, 1], 0.8);
    expect(log.rounds).toBe(3);
    expect(log.totalReward).toBe(2);
    expect(log.ctr).toBeCloseTo(2 / 3);
    expect(log.cumulativeRegret()).toBeCloseTo(0.4);
  });

  it('satisfies rounds * optimal - total = regret', () => {
    const log = buildLog([2, 0, 1, 1, 0], 1.3);
    const regret = log.cumulativeRegret();
    expect(regret).not.toBeNull();
    expect(regret).toBeCloseTo(log.rounds * 1.3 - log.totalReward);
  });

  it('has no regret without a baseline', () => {
    const log = buildLog([1, 0], null);
    expect(log.cumulativeRegret()).toBeNull();
    expect(log.roundMetrics().map((metric) => metric.instantRegret)).toEqual([null, null]);
  });

  it('reports a zero click-through rate when empty', () => {
    const log = new SimulationLog([]);
    expect(log.rounds).toBe(0);
    expect(log.ctr).toBe(0);
    expect(log.optimalReward).toBeNull();
  });

  it('computes per-round metrics', () => {
    const metrics = buildLog([1, 0, 1], 0.8).roundMetrics();
    expect(metrics.map((metric) => metric.roundIndex)).toEqual([1, 2, 3]);
    expect(metrics.map((metric) => metric.cumulativeReward)).toEqual([1, 1, 2]);
    expect(metrics[1].ctr).toBe(0.5);
    expect(metrics[0].instantRegret).toBeCloseTo(-0.2);
    expect(metrics[1].instantRegret).toBeCloseTo(0.8);
    expect(metrics[2].cumulativeRegret).toBeCloseTo(0.4);
  });

  it('counts examinations and clicks per document', () => {
    const log = new SimulationLog([
      makeInteraction(['a', 'b'], ['a'], 0),
      makeInteraction(['b', 'a'], ['b', 'a'], null),
      makeInteraction(['a', 'b', 'c'], ['a', 'c'], 0, [0, 2]),
    ]);
    expect(log.seenCounts()).toEqual({ a: 3, b: 1, c: 1 });
    expect(log.clickCounts()).toEqual({ a: 2, c: 1 });
  });

  it('summarizes a run', () => {
    const summary = buildLog([1, 1], 1).summary();
    expect(summary).toEqual({
      rounds: 2,
      totalReward: 2,
      ctr: 1,
      optimalReward: 1,
      cumulativeRegret: 0,
      seenCounts: { a: 2 },
      clickCounts: { a: 2 },
    });
  });

  it('freezes its history', () => {
    expect(Object.isFrozen(buildLog([1]).interactions)).toBe(true);
  });
});
