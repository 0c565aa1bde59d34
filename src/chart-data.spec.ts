import { buildLog, makeInteraction } from '../test/testHelpers';

import { docDistributionData, learningCurveData, regretCurveData } from './chart-data';
import { InvalidConfigurationError } from './errors';
import { SimulationLog } from './simulator/simulation-log';

describe('chart data', () => {
  it('builds the learning curve with a baseline line', () => {
    const data = learningCurveData(buildLog([1, 0, 1], 0.8));
    expect(data.rounds).toEqual([1, 2, 3]);
    expect(data.reward).toEqual([1, 0, 1]);
    expect(data.cumulativeReward).toEqual([1, 1, 2]);
    expect(data.ctr[1]).toBe(0.5);
    expect(data.optimalReward).toEqual([0.8, 0.8, 0.8]);
  });

  it('omits the baseline line without one', () => {
    expect(learningCurveData(buildLog([1], null)).optimalReward).toBeUndefined();
  });

  it('builds the regret curve', () => {
    const data = regretCurveData(buildLog([1, 0], 0.5));
    expect(data.rounds).toEqual([1, 2]);
    expect(data.instantRegret).toEqual([-0.5, 0.5]);
    expect(data.cumulativeRegret).toEqual([-0.5, 0]);
  });

  it('requires a baseline for regret', () => {
    expect(() => regretCurveData(buildLog([1], null))).toThrow(InvalidConfigurationError);
  });

  it('counts documents including ones never shown', () => {
    const log = new SimulationLog([
      makeInteraction(['a', 'b'], ['a', 'b'], 1),
      makeInteraction(['a', 'b'], ['a'], null),
    ]);
    expect(docDistributionData(log, ['a', 'b', 'c'])).toEqual({
      docIds: ['a', 'b', 'c'],
      seen: [2, 1, 0],
      clicks: [0, 1, 0],
    });
  });
});
