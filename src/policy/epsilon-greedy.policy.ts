import { DEFAULT_EPSILON, DEFAULT_PRIOR_FAILURE, DEFAULT_PRIOR_SUCCESS } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { Seed } from '../random';
import { Interaction, PolicyAlgorithm } from '../types';
import { validateProbability } from '../validation';

import { ClickStatistics, emptyClickStatistics, recordFirstClick } from './arm-statistics';
import { RankingPolicy } from './ranking-policy';

export interface EpsilonGreedyOptions {
  epsilon?: number;
  priorSuccess?: number;
  priorFailure?: number;
}

export class EpsilonGreedyRanking extends RankingPolicy<ClickStatistics> {
  readonly name: PolicyAlgorithm = 'epsilon';
  readonly epsilon: number;
  private readonly priorSuccess: number;
  private readonly priorFailure: number;

  constructor(
    docIds: readonly string[],
    slateSize: number,
    options: EpsilonGreedyOptions = {},
    seed?: Seed,
  ) {
    super(docIds, slateSize, emptyClickStatistics, seed);
    this.epsilon = validateProbability('epsilon', options.epsilon ?? DEFAULT_EPSILON);
    this.priorSuccess = options.priorSuccess ?? DEFAULT_PRIOR_SUCCESS;
    this.priorFailure = options.priorFailure ?? DEFAULT_PRIOR_FAILURE;
    if (!(this.priorSuccess > 0) || !(this.priorFailure > 0)) {
      throw new InvalidConfigurationError(
        `priorSuccess and priorFailure must be > 0, got ${this.priorSuccess} and ${this.priorFailure}.`,
      );
    }
  }

  selectSlate(): string[] {
    if (this.rng.random() < this.epsilon) {
      return this.rng.shuffle(this.docIds).slice(0, this.slateSize);
    }
    return this.topByScore((docId) => this.score(docId));
  }

  update(interaction: Interaction): void {
    recordFirstClick(interaction, (docId) => this.statsFor(docId));
  }

  /** Beta-smoothed click-through estimate. */
  score(docId: string): number {
    const stats = this.statsFor(docId);
    return (
      (stats.clicks + this.priorSuccess) /
      (stats.impressions + this.priorSuccess + this.priorFailure)
    );
  }
}
