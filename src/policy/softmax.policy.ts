import { DEFAULT_SOFTMAX_TEMPERATURE } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { Seed } from '../random';
import { clickedDocId, Interaction, PolicyAlgorithm } from '../types';

import { emptyRunningMean, RunningMean } from './arm-statistics';
import { RankingPolicy } from './ranking-policy';

export interface SoftmaxOptions {
  temperature?: number;
}

/**
 * Boltzmann exploration: documents are drawn without replacement with probability proportional
 * to exp(mean / temperature).
 */
export class SoftmaxRanking extends RankingPolicy<RunningMean> {
  readonly name: PolicyAlgorithm = 'softmax';
  readonly temperature: number;

  constructor(docIds: readonly string[], slateSize: number, options: SoftmaxOptions = {}, seed?: Seed) {
    super(docIds, slateSize, emptyRunningMean, seed);
    this.temperature = options.temperature ?? DEFAULT_SOFTMAX_TEMPERATURE;
    if (!Number.isFinite(this.temperature) || this.temperature <= 0) {
      throw new InvalidConfigurationError(`temperature must be > 0, got ${this.temperature}.`);
    }
  }

  selectSlate(): string[] {
    const maxMean = this.maxMean();
    const remaining = this.docIds.map((docId) => ({ docId, weight: this.weight(docId, maxMean) }));
    const slate: string[] = [];
    while (slate.length < this.slateSize) {
      const pickedIndex = this.pickIndex(remaining.map(({ weight }) => weight));
      slate.push(remaining[pickedIndex].docId);
      remaining.splice(pickedIndex, 1);
    }
    return slate;
  }

  private pickIndex(weights: readonly number[]): number {
    const totalWeight = weights.reduce((total, weight) => total + weight, 0);
    // every remaining weight underflowed: the candidates are tied, so draw uniformly
    if (!(totalWeight > 0)) {
      return this.rng.nextInt(weights.length);
    }
    const threshold = this.rng.random() * totalWeight;
    let cumulativeWeight = 0;
    for (const [index, weight] of weights.entries()) {
      cumulativeWeight += weight;
      if (cumulativeWeight > threshold) {
        return index;
      }
    }
    // rounding can leave the threshold just past the cumulative sum
    return weights.length - 1;
  }

  update(interaction: Interaction): void {
    const clicked = clickedDocId(interaction);
    interaction.seen.forEach((docId) => {
      const stats = this.statsFor(docId);
      const reward = docId === clicked ? 1 : 0;
      stats.impressions += 1;
      stats.mean += (reward - stats.mean) / stats.impressions;
    });
  }

  /**
   * Unnormalized selection weight, with means shifted by the current maximum to keep the exponent
   * bounded.
   */
  weight(docId: string, maxMean = this.maxMean()): number {
    return Math.exp((this.statsFor(docId).mean - maxMean) / this.temperature);
  }

  private maxMean(): number {
    return Math.max(...this.docIds.map((docId) => this.statsFor(docId).mean));
  }
}
