import { DEFAULT_SATISFACTION } from '../constants';
import { UnknownDocumentError } from '../errors';
import { Seed } from '../random';
import { ClickModel, Document, Interaction, createInteraction } from '../types';
import { validateProbability } from '../validation';

import { ClickModelEnvironment } from './click-model-environment';

export interface DependentClickOptions {
  satisfaction?: Record<string, number>;
  defaultSatisfaction?: number;
}

/**
 * Dependent Click Model: sequential scan where a click ends the session only when the user is
 * satisfied by the clicked document.
 */
export class DependentClickEnvironment extends ClickModelEnvironment {
  readonly model: ClickModel = 'dependent';
  private readonly satisfaction = new Map<string, number>();

  constructor(
    documents: readonly Document[],
    slateSize: number,
    options: DependentClickOptions = {},
    seed?: Seed,
  ) {
    super(documents, slateSize, seed);
    const defaultSatisfaction = validateProbability(
      'defaultSatisfaction',
      options.defaultSatisfaction ?? DEFAULT_SATISFACTION,
    );
    const overrides = options.satisfaction ?? {};
    Object.entries(overrides).forEach(([docId, value]) => {
      validateProbability(`Satisfaction probability for '${docId}'`, value);
    });
    this.docIds().forEach((docId) => {
      this.satisfaction.set(
        docId,
        Object.hasOwn(overrides, docId) ? overrides[docId] : defaultSatisfaction,
      );
    });
  }

  satisfactionOf(docId: string): number {
    const value = this.satisfaction.get(docId);
    if (value === undefined) {
      throw new UnknownDocumentError([docId]);
    }
    return value;
  }

  protected simulate(slate: string[]): Interaction {
    const seen: string[] = [];
    const clickPositions: number[] = [];
    for (const [position, docId] of slate.entries()) {
      seen.push(docId);
      if (this.rng.random() >= this.attractionOf(docId)) {
        continue;
      }
      clickPositions.push(position);
      if (this.rng.random() < this.satisfactionOf(docId)) {
        break;
      }
    }
    return createInteraction({
      slate,
      seen,
      clickIndex: clickPositions.length ? clickPositions[0] : null,
      clickPositions,
      reward: clickPositions.length,
    });
  }

  protected scoreSlate(slate: string[]): number {
    let reward = 0.0;
    let continueProbability = 1.0;
    slate.forEach((docId) => {
      const attraction = this.attractionOf(docId);
      reward += continueProbability * attraction;
      continueProbability *= 1.0 - attraction * this.satisfactionOf(docId);
    });
    return reward;
  }
}
