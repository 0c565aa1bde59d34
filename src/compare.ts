import * as path from 'path';

import { orderBy } from 'lodash';

import { LoadedLog, loadLog, LogMetadata } from './log-codec';
import { SimulationLog } from './simulator/simulation-log';

export interface LogSummary {
  label: string;
  path: string;
  rounds: number;
  ctr: number;
  totalReward: number;
  optimalReward: number | null;
  cumulativeRegret: number | null;
  algo: string | null;
  model: string | null;
}

export const summarySortKeys = ['ctr', 'regret', 'reward'] as const;
export type SummarySortKey = typeof summarySortKeys[number];

export interface SummarizedLog extends LoadedLog {
  summary: LogSummary;
}

function metadataString(metadata: LogMetadata, key: string): string | null {
  const value = metadata[key];
  return typeof value === 'string' && value.length ? value : null;
}

export function buildSummary(
  logPath: string,
  log: SimulationLog,
  metadata: LogMetadata,
): LogSummary {
  return {
    label: metadataString(metadata, 'label') ?? path.parse(logPath).name,
    path: logPath,
    rounds: log.rounds,
    ctr: log.ctr,
    totalReward: log.totalReward,
    optimalReward: log.optimalReward,
    cumulativeRegret: log.cumulativeRegret(),
    algo: metadataString(metadata, 'algo'),
    model: metadataString(metadata, 'model'),
  };
}

export function summarizeLog(logPath: string): SummarizedLog {
  const { log, metadata } = loadLog(logPath);
  return { log, metadata, summary: buildSummary(logPath, log, metadata) };
}

const sortValue: Record<SummarySortKey, (summary: LogSummary) => number> = {
  ctr: (summary) => summary.ctr,
  // runs without a baseline sort after every run with one when ascending
  regret: (summary) => summary.cumulativeRegret ?? Infinity,
  reward: (summary) => summary.totalReward,
};

export function sortSummaries(
  summaries: readonly LogSummary[],
  key: SummarySortKey,
  descending = false,
): LogSummary[] {
  return orderBy(summaries, [sortValue[key]], [descending ? 'desc' : 'asc']);
}

export function summariesToTable(summaries: readonly LogSummary[]): string {
  const header = [
    'Label'.padEnd(20),
    'Algo'.padEnd(10),
    'Model'.padEnd(10),
    'Rounds'.padStart(8),
    'CTR'.padStart(8),
    'Regret'.padStart(10),
  ].join(' ');
  const lines = [header, '-'.repeat(header.length)];
  summaries.forEach((summary) => {
    const regret =
      summary.cumulativeRegret === null ? '-' : summary.cumulativeRegret.toFixed(2);
    lines.push(
      [
        summary.label.padEnd(20),
        (summary.algo ?? '-').padEnd(10),
        (summary.model ?? '-').padEnd(10),
        String(summary.rounds).padStart(8),
        summary.ctr.toFixed(4).padStart(8),
        regret.padStart(10),
      ].join(' '),
    );
  });
  return lines.join('\n');
}
