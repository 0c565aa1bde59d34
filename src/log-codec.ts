import * as fs from 'fs';

import { z } from 'zod';

import { LogFormatError } from './errors';
import { SimulationLog } from './simulator/simulation-log';
import { createInteraction, Interaction } from './types';
import { formatIssues } from './validation';

export type LogMetadata = Record<string, unknown>;

const interactionRecordSchema = z.object({
  round: z.number().int(),
  slate: z.array(z.string()),
  seen: z.array(z.string()),
  click_index: z.number().int().nullable(),
  click_positions: z.array(z.number().int()),
  reward: z.number(),
});

const logRecordSchema = z.object({
  metadata: z.record(z.unknown()),
  optimal_reward: z.number().nullable(),
  interactions: z.array(interactionRecordSchema),
});

export type InteractionRecord = z.infer<typeof interactionRecordSchema>;
export type LogRecord = z.infer<typeof logRecordSchema>;

export interface LoadedLog {
  log: SimulationLog;
  metadata: LogMetadata;
}

export function interactionToRecord(round: number, interaction: Interaction): InteractionRecord {
  return {
    round,
    slate: [...interaction.slate],
    seen: [...interaction.seen],
    click_index: interaction.clickIndex,
    click_positions: [...interaction.clickPositions],
    reward: interaction.reward,
  };
}

export function recordToInteraction(record: InteractionRecord): Interaction {
  return createInteraction({
    slate: record.slate,
    seen: record.seen,
    clickIndex: record.click_index,
    clickPositions: record.click_positions,
    reward: record.reward,
  });
}

export function serializeLog(log: SimulationLog, metadata: LogMetadata = {}): LogRecord {
  return {
    metadata,
    optimal_reward: log.optimalReward,
    interactions: log.interactions.map((interaction, index) =>
      interactionToRecord(index + 1, interaction),
    ),
  };
}

/**
 * Validates a parsed log document and rebuilds the log it describes.
 * @param source names the document in error messages, usually its path
 */
export function deserializeLog(data: unknown, source = '<memory>'): LoadedLog {
  const parsed = logRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new LogFormatError(source, issues, parsed.error);
  }
  const { metadata, optimal_reward, interactions } = parsed.data;
  return {
    log: new SimulationLog(interactions.map(recordToInteraction), optimal_reward),
    metadata,
  };
}

export function writeLog(path: string, log: SimulationLog, metadata: LogMetadata = {}): void {
  fs.writeFileSync(path, JSON.stringify(serializeLog(log, metadata), null, 2), 'utf-8');
}

export function loadLog(path: string): LoadedLog {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LogFormatError(path, message, error);
  }
  return deserializeLog(data, path);
}
