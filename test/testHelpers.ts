import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { SimulationLog } from '../src/simulator/simulation-log';
import { createInteraction, Document, Interaction } from '../src/types';

export const TEST_TMP_PREFIX = path.join(os.tmpdir(), 'rank-bandit-lab-');

export function makeDocuments(attractions: Record<string, number>): Document[] {
  return Object.entries(attractions).map(([docId, attraction]) => new Document(docId, attraction));
}

// reward defaults to the number of clicks, as the multi-click environments count it
export function makeInteraction(
  slate: string[],
  seen: string[],
  clickIndex: number | null,
  clickPositions: number[] = clickIndex === null ? [] : [clickIndex],
  reward: number = clickPositions.length,
): Interaction {
  return createInteraction({ slate, seen, clickIndex, clickPositions, reward });
}

/**
 * One-document log where a positive reward means doc "a" was clicked.
 */
export function buildLog(rewards: number[], optimalReward: number | null = 0.8): SimulationLog {
  const interactions = rewards.map((reward) =>
    reward > 0
      ? makeInteraction(['a'], ['a'], 0, [0], reward)
      : makeInteraction(['a'], ['a'], null),
  );
  return new SimulationLog(interactions, optimalReward);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(TEST_TMP_PREFIX);
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}
