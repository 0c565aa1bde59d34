import { InvalidConfigurationError } from './errors';
import { SimulationLog } from './simulator/simulation-log';

export interface LearningCurveData {
  rounds: number[];
  reward: number[];
  cumulativeReward: number[];
  ctr: number[];
  optimalReward?: number[];
}

export interface RegretCurveData {
  rounds: number[];
  instantRegret: number[];
  cumulativeRegret: number[];
}

export interface DocDistributionData {
  docIds: string[];
  seen: number[];
  clicks: number[];
}

export function learningCurveData(log: SimulationLog): LearningCurveData {
  const metrics = log.roundMetrics();
  const data: LearningCurveData = {
    rounds: metrics.map((item) => item.roundIndex),
    reward: metrics.map((item) => item.reward),
    cumulativeReward: metrics.map((item) => item.cumulativeReward),
    ctr: metrics.map((item) => item.ctr),
  };
  const { optimalReward } = log;
  if (optimalReward !== null) {
    data.optimalReward = metrics.map(() => optimalReward);
  }
  return data;
}

export function regretCurveData(log: SimulationLog): RegretCurveData {
  if (log.optimalReward === null) {
    throw new InvalidConfigurationError(
      'Regret data requires environments that expose optimal reward information.',
    );
  }
  const metrics = log.roundMetrics();
  return {
    rounds: metrics.map((item) => item.roundIndex),
    instantRegret: metrics.map((item) => item.instantRegret ?? 0),
    cumulativeRegret: metrics.map((item) => item.cumulativeRegret ?? 0),
  };
}

export function docDistributionData(
  log: SimulationLog,
  docIds: readonly string[],
): DocDistributionData {
  const seenCounts = log.seenCounts();
  const clickCounts = log.clickCounts();
  return {
    docIds: [...docIds],
    seen: docIds.map((docId) => seenCounts[docId] ?? 0),
    clicks: docIds.map((docId) => clickCounts[docId] ?? 0),
  };
}
