import * as fs from 'fs';
import * as path from 'path';

import { z } from 'zod';

import { SCENARIO_FILE_EXTENSION } from './constants';
import { InvalidConfigurationError, ScenarioNotFoundError } from './errors';
import { Document } from './types';
import { formatIssues } from './validation';

export const SCENARIO_DIR = path.resolve(__dirname, '..', 'scenarios');

const probability = z.number().min(0).max(1);

const scenarioSchema = z.object({
  description: z.string().optional(),
  documents: z
    .array(z.object({ id: z.string().min(1), attraction: probability }))
    .min(1, 'a scenario needs at least one document'),
  position_biases: z.array(probability).optional(),
  satisfaction: z.record(probability).optional(),
});

export type ScenarioFile = z.infer<typeof scenarioSchema>;

export interface Scenario {
  name: string;
  description?: string;
  documents: Document[];
  positionBiases?: number[];
  satisfaction?: Record<string, number>;
}

export function listScenarios(scenarioDir = SCENARIO_DIR): string[] {
  return fs
    .readdirSync(scenarioDir)
    .filter((fileName) => fileName.endsWith(SCENARIO_FILE_EXTENSION))
    .map((fileName) => fileName.slice(0, -SCENARIO_FILE_EXTENSION.length))
    .sort();
}

export function loadScenario(name: string, scenarioDir = SCENARIO_DIR): Scenario {
  const filePath = path.join(scenarioDir, `${name}${SCENARIO_FILE_EXTENSION}`);
  if (!fs.existsSync(filePath)) {
    throw new ScenarioNotFoundError(name);
  }
  return loadScenarioFile(filePath, name);
}

export function loadScenarioFile(
  filePath: string,
  name = path.basename(filePath, SCENARIO_FILE_EXTENSION),
): Scenario {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError(`Scenario file '${filePath}' is not valid JSON: ${message}`);
  }
  return parseScenario(data, name);
}

export function parseScenario(data: unknown, name: string): Scenario {
  const parsed = scenarioSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidConfigurationError(`Scenario '${name}' is invalid: ${issues}`);
  }
  const { description, documents, position_biases, satisfaction } = parsed.data;
  return {
    name,
    description,
    documents: documents.map(({ id, attraction }) => new Document(id, attraction)),
    positionBiases: position_biases,
    satisfaction,
  };
}
