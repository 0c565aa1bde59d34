import { sumBy } from 'lodash';

import { clickedDocIds, Interaction } from '../types';

export interface RoundMetrics {
  /** 1-based */
  roundIndex: number;
  reward: number;
  cumulativeReward: number;
  ctr: number;
  instantRegret: number | null;
  cumulativeRegret: number | null;
}

export interface SimulationSummary {
  rounds: number;
  totalReward: number;
  ctr: number;
  optimalReward: number | null;
  cumulativeRegret: number | null;
  seenCounts: Record<string, number>;
  clickCounts: Record<string, number>;
}

function countOccurrences(groups: Iterable<readonly string[]>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const docIds of groups) {
    docIds.forEach((docId) => {
      counts[docId] = (counts[docId] ?? 0) + 1;
    });
  }
  return counts;
}

/**
 * Ordered interaction history of one run plus the expected reward of the best fixed slate, when
 * the environment could provide it. Every metric is derived on demand.
 */
export class SimulationLog {
  readonly interactions: readonly Interaction[];

  constructor(interactions: readonly Interaction[], readonly optimalReward: number | null = null) {
    this.interactions = Object.freeze([...interactions]);
  }

  get rounds(): number {
    return this.interactions.length;
  }

  get totalReward(): number {
    return sumBy(this.interactions, (interaction) => interaction.reward);
  }

  get ctr(): number {
    return this.rounds ? this.totalReward / this.rounds : 0.0;
  }

  seenCounts(): Record<string, number> {
    return countOccurrences(this.interactions.map((interaction) => interaction.seen));
  }

  clickCounts(): Record<string, number> {
    return countOccurrences(this.interactions.map(clickedDocIds));
  }

  cumulativeRegret(): number | null {
    if (this.optimalReward === null) {
      return null;
    }
    return this.rounds * this.optimalReward - this.totalReward;
  }

  roundMetrics(): RoundMetrics[] {
    const { optimalReward } = this;
    let cumulativeReward = 0;
    return this.interactions.map(({ reward }, index) => {
      const roundIndex = index + 1;
      cumulativeReward += reward;
      return {
        roundIndex,
        reward,
        cumulativeReward,
        ctr: cumulativeReward / roundIndex,
        instantRegret: optimalReward === null ? null : optimalReward - reward,
        cumulativeRegret:
          optimalReward === null ? null : roundIndex * optimalReward - cumulativeReward,
      };
    });
  }

  summary(): SimulationSummary {
    return {
      rounds: this.rounds,
      totalReward: this.totalReward,
      ctr: this.ctr,
      optimalReward: this.optimalReward,
      cumulativeRegret: this.cumulativeRegret(),
      seenCounts: this.seenCounts(),
      clickCounts: this.clickCounts(),
    };
  }
}
