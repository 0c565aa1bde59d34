import { Seed } from '../random';
import { ClickModel, Document, Interaction, createInteraction } from '../types';

import { ClickModelEnvironment } from './click-model-environment';

/**
 * Cascade model: the user scans top to bottom and leaves after the first click.
 */
export class CascadeEnvironment extends ClickModelEnvironment {
  readonly model: ClickModel = 'cascade';

  constructor(documents: readonly Document[], slateSize: number, seed?: Seed) {
    super(documents, slateSize, seed);
  }

  protected simulate(slate: string[]): Interaction {
    const seen: string[] = [];
    let clickIndex: number | null = null;
    for (const [position, docId] of slate.entries()) {
      seen.push(docId);
      if (this.rng.random() < this.attractionOf(docId)) {
        clickIndex = position;
        break;
      }
    }
    return createInteraction({
      slate,
      seen,
      clickIndex,
      clickPositions: clickIndex === null ? [] : [clickIndex],
      reward: clickIndex === null ? 0.0 : 1.0,
    });
  }

  protected scoreSlate(slate: string[]): number {
    const probabilityNoClick = slate.reduce(
      (product, docId) => product * (1 - this.attractionOf(docId)),
      1.0,
    );
    return 1.0 - probabilityNoClick;
  }
}
