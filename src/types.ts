import { validateProbability } from './validation';

export const clickModels = ['cascade', 'position', 'dependent'] as const;
export const policyAlgorithms = ['epsilon', 'thompson', 'ucb', 'softmax'] as const;

export type ClickModel = typeof clickModels[number];
export type PolicyAlgorithm = typeof policyAlgorithms[number];

/**
 * A single document that can appear in a ranking slate.
 * @public
 */
export class Document {
  readonly attraction: number;

  constructor(readonly docId: string, attraction: number) {
    this.attraction = validateProbability(`Attraction probability of '${docId}'`, attraction);
    Object.freeze(this);
  }
}

/**
 * Feedback generated from showing a slate to a simulated user.
 * @public
 */
export interface Interaction {
  /**
   * Document ids in the order they were displayed
   */
  readonly slate: readonly string[];

  /**
   * Document ids the user examined, in display order
   */
  readonly seen: readonly string[];

  /**
   * Slate position of the first click. Position-based examination can skip slots, so positions
   * always index `slate`; for sequential models `seen` is a prefix and the two coincide.
   */
  readonly clickIndex: number | null;

  /**
   * Slate positions of every click, ascending
   */
  readonly clickPositions: readonly number[];

  readonly reward: number;
}

export function createInteraction(fields: Interaction): Interaction {
  return Object.freeze({
    slate: Object.freeze([...fields.slate]),
    seen: Object.freeze([...fields.seen]),
    clickIndex: fields.clickIndex,
    clickPositions: Object.freeze([...fields.clickPositions]),
    reward: fields.reward,
  });
}

function docAt(interaction: Interaction, position: number): string | null {
  if (!Number.isInteger(position) || position < 0 || position >= interaction.slate.length) {
    return null;
  }
  return interaction.slate[position];
}

export function clickedDocId(interaction: Interaction): string | null {
  return interaction.clickIndex === null ? null : docAt(interaction, interaction.clickIndex);
}

export function clickedDocIds(interaction: Interaction): string[] {
  const docIds: string[] = [];
  interaction.clickPositions.forEach((position) => {
    const docId = docAt(interaction, position);
    if (docId !== null) {
      docIds.push(docId);
    }
  });
  return docIds;
}
