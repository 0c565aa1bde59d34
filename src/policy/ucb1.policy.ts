import { sumBy } from 'lodash';

import { DEFAULT_UCB_CONFIDENCE } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { Seed } from '../random';
import { Interaction, PolicyAlgorithm } from '../types';

import {
  clickThroughRate,
  ClickStatistics,
  emptyClickStatistics,
  recordFirstClick,
} from './arm-statistics';
import { RankingPolicy } from './ranking-policy';

export interface UCB1Options {
  confidence?: number;
}

export class UCB1Ranking extends RankingPolicy<ClickStatistics> {
  readonly name: PolicyAlgorithm = 'ucb';
  readonly confidence: number;

  constructor(docIds: readonly string[], slateSize: number, options: UCB1Options = {}, seed?: Seed) {
    super(docIds, slateSize, emptyClickStatistics, seed);
    this.confidence = options.confidence ?? DEFAULT_UCB_CONFIDENCE;
    if (!Number.isFinite(this.confidence) || this.confidence < 0) {
      throw new InvalidConfigurationError(`confidence must be >= 0, got ${this.confidence}.`);
    }
  }

  selectSlate(): string[] {
    const totalImpressions = sumBy(this.docIds, (docId) => this.statsFor(docId).impressions);
    return this.topByScore((docId) => this.score(docId, totalImpressions));
  }

  update(interaction: Interaction): void {
    recordFirstClick(interaction, (docId) => this.statsFor(docId));
  }

  /** Upper confidence bound; documents never shown rank first. */
  score(docId: string, totalImpressions: number): number {
    const stats = this.statsFor(docId);
    if (stats.impressions === 0) {
      return Infinity;
    }
    const bonus = this.confidence * Math.sqrt((2 * Math.log(totalImpressions)) / stats.impressions);
    return clickThroughRate(stats) + bonus;
  }
}
