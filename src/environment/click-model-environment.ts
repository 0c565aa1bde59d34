import { InvalidConfigurationError, UnknownDocumentError } from '../errors';
import { Rng, Seed } from '../random';
import { ensureKnownDocuments, normalizeSlate, validateSlateSize } from '../slate';
import { ClickModel, Document, Interaction } from '../types';

export interface IClickModelEnvironment {
  readonly model: ClickModel;
  readonly slateSize: number;
  docIds(): string[];
  evaluate(slate: readonly string[]): Interaction;
}

/**
 * Closed-form baseline used for regret accounting. Environments may or may not offer it.
 */
export interface IOptimalRewardOracle {
  optimalSlate(): string[];
  expectedReward(slate: readonly string[]): number;
}

export function hasOptimalRewardOracle<T extends IClickModelEnvironment>(
  environment: T,
): environment is T & IOptimalRewardOracle {
  return (
    'optimalSlate' in environment &&
    typeof environment.optimalSlate === 'function' &&
    'expectedReward' in environment &&
    typeof environment.expectedReward === 'function'
  );
}

export abstract class ClickModelEnvironment implements IClickModelEnvironment, IOptimalRewardOracle {
  abstract readonly model: ClickModel;
  readonly slateSize: number;
  protected readonly documents: readonly Document[];
  protected readonly documentsById = new Map<string, Document>();
  protected readonly rng: Rng;

  protected constructor(documents: readonly Document[], slateSize: number, seed?: Seed) {
    if (!documents.length) {
      throw new InvalidConfigurationError('Environment requires at least one document.');
    }
    documents.forEach((document) => {
      if (this.documentsById.has(document.docId)) {
        throw new InvalidConfigurationError(`Duplicate document id detected: ${document.docId}`);
      }
      this.documentsById.set(document.docId, document);
    });
    this.slateSize = validateSlateSize(slateSize, documents.length);
    this.documents = Object.freeze([...documents]);
    this.rng = new Rng(seed);
  }

  docIds(): string[] {
    return this.documents.map((document) => document.docId);
  }

  evaluate(slate: readonly string[]): Interaction {
    return this.simulate(this.prepareSlate(slate));
  }

  reseed(seed?: Seed) {
    this.rng.reseed(seed);
  }

  optimalSlate(): string[] {
    // Array.prototype.sort is stable, so equal attractions keep construction order
    return [...this.documents]
      .sort((a, b) => b.attraction - a.attraction)
      .slice(0, this.slateSize)
      .map((document) => document.docId);
  }

  expectedReward(slate: readonly string[]): number {
    return this.scoreSlate(this.prepareSlate(slate));
  }

  protected attractionOf(docId: string): number {
    return this.lookup(docId).attraction;
  }

  private lookup(docId: string): Document {
    const document = this.documentsById.get(docId);
    if (!document) {
      throw new UnknownDocumentError([docId]);
    }
    return document;
  }

  private prepareSlate(slate: readonly string[]): string[] {
    ensureKnownDocuments(slate, new Set(this.documentsById.keys()));
    return normalizeSlate(slate, this.slateSize);
  }

  /** Runs one stochastic user session over an already normalized slate. */
  protected abstract simulate(slate: string[]): Interaction;

  /** Closed-form expected reward of an already normalized slate. */
  protected abstract scoreSlate(slate: string[]): number;
}
