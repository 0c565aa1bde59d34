import { UnknownDocumentError } from '../errors';
import { Rng, Seed } from '../random';
import { validateSlateSize, validateUniqueIds } from '../slate';
import { Interaction, PolicyAlgorithm } from '../types';

export interface IRankingPolicy {
  readonly name: PolicyAlgorithm;
  readonly docIds: readonly string[];
  readonly slateSize: number;
  selectSlate(): string[];
  update(interaction: Interaction): void;
  statistics(): Record<string, object>;
}

/**
 * Base for online ranking learners. Each instance owns its random stream and one statistics
 * record per document; nothing is shared between policies.
 */
export abstract class RankingPolicy<S extends object> implements IRankingPolicy {
  abstract readonly name: PolicyAlgorithm;
  readonly docIds: readonly string[];
  readonly slateSize: number;
  protected readonly rng: Rng;
  private readonly arms = new Map<string, S>();

  protected constructor(
    docIds: readonly string[],
    slateSize: number,
    emptyStatistics: () => S,
    seed?: Seed,
  ) {
    validateUniqueIds(docIds);
    this.slateSize = validateSlateSize(slateSize, docIds.length);
    this.docIds = Object.freeze([...docIds]);
    this.docIds.forEach((docId) => this.arms.set(docId, emptyStatistics()));
    this.rng = new Rng(seed);
  }

  abstract selectSlate(): string[];

  abstract update(interaction: Interaction): void;

  statistics(): Record<string, Readonly<S>> {
    const snapshot: Record<string, Readonly<S>> = {};
    this.arms.forEach((stats, docId) => {
      snapshot[docId] = Object.freeze({ ...stats });
    });
    return snapshot;
  }

  protected statsFor(docId: string): S {
    const stats = this.arms.get(docId);
    if (!stats) {
      throw new UnknownDocumentError([docId]);
    }
    return stats;
  }

  /**
   * Top `slateSize` ids by descending score. The sort is stable, so ties keep universe order.
   */
  protected topByScore(score: (docId: string) => number): string[] {
    return this.docIds
      .map((docId) => ({ docId, score: score(docId) }))
      .sort((a, b) => compareDescending(a.score, b.score))
      .slice(0, this.slateSize)
      .map(({ docId }) => docId);
  }
}

function compareDescending(a: number, b: number): number {
  if (a === b) {
    return 0;
  }
  return a > b ? -1 : 1;
}
