import { clickedDocId, Interaction } from '../types';

export interface ClickStatistics {
  impressions: number;
  clicks: number;
}

export interface BetaPosterior {
  successes: number;
  failures: number;
}

export interface RunningMean {
  impressions: number;
  mean: number;
}

export const emptyClickStatistics = (): ClickStatistics => ({ impressions: 0, clicks: 0 });
export const emptyBetaPosterior = (): BetaPosterior => ({ successes: 0, failures: 0 });
export const emptyRunningMean = (): RunningMean => ({ impressions: 0, mean: 0 });

/**
 * Every examined document gains an impression; only the first clicked document gains a click,
 * even when the interaction carries several click positions.
 */
export function recordFirstClick(
  interaction: Interaction,
  statsFor: (docId: string) => ClickStatistics,
): void {
  interaction.seen.forEach((docId) => {
    statsFor(docId).impressions += 1;
  });
  const clicked = clickedDocId(interaction);
  if (clicked !== null) {
    statsFor(clicked).clicks += 1;
  }
}

export function clickThroughRate(stats: ClickStatistics): number {
  return stats.impressions ? stats.clicks / stats.impressions : 0;
}
