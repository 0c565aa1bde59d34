import { defaultPositionBiases, SimulationConfig } from './config';
import { POLICY_SEED_OFFSET } from './constants';
import { CascadeEnvironment } from './environment/cascade.environment';
import { ClickModelEnvironment } from './environment/click-model-environment';
import { DependentClickEnvironment } from './environment/dependent-click.environment';
import { PositionBasedEnvironment } from './environment/position-based.environment';
import { EpsilonGreedyRanking } from './policy/epsilon-greedy.policy';
import { IRankingPolicy } from './policy/ranking-policy';
import { SoftmaxRanking } from './policy/softmax.policy';
import { ThompsonSamplingRanking } from './policy/thompson-sampling.policy';
import { UCB1Ranking } from './policy/ucb1.policy';
import { BanditSimulator } from './simulator/bandit-simulator';
import { SimulationLog } from './simulator/simulation-log';
import { Document } from './types';

export interface SimulationRun {
  environment: ClickModelEnvironment;
  policy: IRankingPolicy;
  log: SimulationLog;
}

export function createEnvironment(
  config: SimulationConfig,
  documents: readonly Document[],
): ClickModelEnvironment {
  switch (config.model) {
    case 'cascade':
      return new CascadeEnvironment(documents, config.slateSize, config.seed);
    case 'position':
      return new PositionBasedEnvironment(
        documents,
        config.slateSize,
        config.positionBiases ?? defaultPositionBiases(config.slateSize),
        config.seed,
      );
    case 'dependent':
      return new DependentClickEnvironment(
        documents,
        config.slateSize,
        {
          satisfaction: config.docSatisfaction,
          defaultSatisfaction: config.defaultSatisfaction,
        },
        config.seed,
      );
  }
}

export function createPolicy(config: SimulationConfig, docIds: readonly string[]): IRankingPolicy {
  const seed = config.seed + POLICY_SEED_OFFSET;
  switch (config.algo) {
    case 'epsilon':
      return new EpsilonGreedyRanking(docIds, config.slateSize, { epsilon: config.epsilon }, seed);
    case 'thompson':
      return new ThompsonSamplingRanking(
        docIds,
        config.slateSize,
        { alphaPrior: config.alphaPrior, betaPrior: config.betaPrior },
        seed,
      );
    case 'ucb':
      return new UCB1Ranking(docIds, config.slateSize, { confidence: config.ucbConfidence }, seed);
    case 'softmax':
      return new SoftmaxRanking(docIds, config.slateSize, { temperature: config.temperature }, seed);
  }
}

export function runSimulation(config: SimulationConfig, documents: readonly Document[]): SimulationRun {
  const environment = createEnvironment(config, documents);
  const policy = createPolicy(config, environment.docIds());
  const log = new BanditSimulator(environment, policy).run(config.steps);
  return { environment, policy, log };
}
