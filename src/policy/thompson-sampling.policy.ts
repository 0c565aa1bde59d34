import { DEFAULT_ALPHA_PRIOR, DEFAULT_BETA_PRIOR } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { Seed } from '../random';
import { clickedDocId, Interaction, PolicyAlgorithm } from '../types';

import { BetaPosterior, emptyBetaPosterior } from './arm-statistics';
import { RankingPolicy } from './ranking-policy';

export interface ThompsonSamplingOptions {
  alphaPrior?: number;
  betaPrior?: number;
}

/**
 * Thompson sampling with an independent Beta posterior per document.
 */
export class ThompsonSamplingRanking extends RankingPolicy<BetaPosterior> {
  readonly name: PolicyAlgorithm = 'thompson';
  private readonly alphaPrior: number;
  private readonly betaPrior: number;

  constructor(
    docIds: readonly string[],
    slateSize: number,
    options: ThompsonSamplingOptions = {},
    seed?: Seed,
  ) {
    super(docIds, slateSize, emptyBetaPosterior, seed);
    this.alphaPrior = options.alphaPrior ?? DEFAULT_ALPHA_PRIOR;
    this.betaPrior = options.betaPrior ?? DEFAULT_BETA_PRIOR;
    if (!(this.alphaPrior > 0) || !(this.betaPrior > 0)) {
      throw new InvalidConfigurationError(
        `alphaPrior and betaPrior must be > 0, got ${this.alphaPrior} and ${this.betaPrior}.`,
      );
    }
  }

  selectSlate(): string[] {
    const samples = new Map<string, number>();
    this.docIds.forEach((docId) => {
      const { successes, failures } = this.statsFor(docId);
      samples.set(docId, this.rng.beta(this.alphaPrior + successes, this.betaPrior + failures));
    });
    return this.topByScore((docId) => samples.get(docId) ?? 0);
  }

  /**
   * Documents examined before the first click are failures and the clicked document is a success.
   * Crediting stops at the first click, so later documents are left untouched.
   */
  update(interaction: Interaction): void {
    const clicked = clickedDocId(interaction);
    for (const docId of interaction.seen) {
      const posterior = this.statsFor(docId);
      if (docId === clicked) {
        posterior.successes += 1;
        break;
      }
      posterior.failures += 1;
    }
  }
}
