import { InvalidConfigurationError } from '../errors';
import { Seed } from '../random';
import { ClickModel, Document, Interaction, createInteraction } from '../types';
import { validateProbability } from '../validation';

import { ClickModelEnvironment } from './click-model-environment';

/**
 * Position-Based Model: each rank is examined independently with its own probability, and an
 * examined document is clicked with its attraction probability.
 */
export class PositionBasedEnvironment extends ClickModelEnvironment {
  readonly model: ClickModel = 'position';
  private readonly positionBiases: readonly number[];

  constructor(
    documents: readonly Document[],
    slateSize: number,
    positionBiases: readonly number[],
    seed?: Seed,
  ) {
    super(documents, slateSize, seed);
    if (positionBiases.length < slateSize) {
      throw new InvalidConfigurationError(
        `positionBiases length (${positionBiases.length}) must match or exceed slateSize (${slateSize}).`,
      );
    }
    this.positionBiases = Object.freeze(
      positionBiases
        .slice(0, slateSize)
        .map((bias, index) => validateProbability(`Position bias at index ${index}`, bias)),
    );
  }

  biases(): number[] {
    return [...this.positionBiases];
  }

  protected simulate(slate: string[]): Interaction {
    const seen: string[] = [];
    const clickPositions: number[] = [];
    slate.forEach((docId, position) => {
      const examined = this.rng.random() < this.positionBiases[position];
      if (!examined) {
        return;
      }
      seen.push(docId);
      if (this.rng.random() < this.attractionOf(docId)) {
        clickPositions.push(position);
      }
    });
    return createInteraction({
      slate,
      seen,
      clickIndex: clickPositions.length ? clickPositions[0] : null,
      clickPositions,
      reward: clickPositions.length,
    });
  }

  protected scoreSlate(slate: string[]): number {
    return slate.reduce(
      (reward, docId, position) => reward + this.positionBiases[position] * this.attractionOf(docId),
      0.0,
    );
  }
}
