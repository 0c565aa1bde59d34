import { times } from 'lodash';
import { z } from 'zod';

import {
  DEFAULT_ALGORITHM,
  DEFAULT_ALPHA_PRIOR,
  DEFAULT_BETA_PRIOR,
  DEFAULT_CLICK_MODEL,
  DEFAULT_DOCUMENT_SPECS,
  DEFAULT_EPSILON,
  DEFAULT_SATISFACTION,
  DEFAULT_SEED,
  DEFAULT_SLATE_SIZE,
  DEFAULT_SOFTMAX_TEMPERATURE,
  DEFAULT_STEPS,
  DEFAULT_UCB_CONFIDENCE,
} from './constants';
import { InvalidConfigurationError } from './errors';
import { clickModels, Document, policyAlgorithms } from './types';
import { formatIssues } from './validation';

// Hyperparameter ranges are checked by the environment and policy constructors.
export const simulationConfigSchema = z.object({
  algo: z.enum(policyAlgorithms).default(DEFAULT_ALGORITHM),
  model: z.enum(clickModels).default(DEFAULT_CLICK_MODEL),
  steps: z.number().int().min(1).default(DEFAULT_STEPS),
  slateSize: z.number().int().min(1).default(DEFAULT_SLATE_SIZE),
  epsilon: z.number().default(DEFAULT_EPSILON),
  alphaPrior: z.number().default(DEFAULT_ALPHA_PRIOR),
  betaPrior: z.number().default(DEFAULT_BETA_PRIOR),
  ucbConfidence: z.number().default(DEFAULT_UCB_CONFIDENCE),
  temperature: z.number().default(DEFAULT_SOFTMAX_TEMPERATURE),
  seed: z.number().int().default(DEFAULT_SEED),
  positionBiases: z.array(z.number()).optional(),
  docSatisfaction: z.record(z.number()).default({}),
  defaultSatisfaction: z.number().default(DEFAULT_SATISFACTION),
});

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

/**
 * Validates a partial configuration and fills every missing field from the defaults. Untyped
 * records are accepted so overrides parsed from text are checked the same way.
 */
export function resolveConfig(
  input: SimulationConfigInput | Record<string, unknown> = {},
): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(`Invalid simulation configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Examination probability 1 / (rank + 1) for each slot. */
export function defaultPositionBiases(slateSize: number): number[] {
  return times(slateSize, (index) => 1 / (index + 1));
}

function splitSpec(spec: string): [string, number] {
  const separator = spec.indexOf('=');
  if (separator < 0) {
    throw new InvalidConfigurationError(`Invalid specification '${spec}'. Expected 'id=prob'.`);
  }
  const name = spec.slice(0, separator).trim();
  const rawProbability = spec.slice(separator + 1).trim();
  if (!name) {
    throw new InvalidConfigurationError(`Document id missing in specification '${spec}'.`);
  }
  const probability = Number(rawProbability);
  if (!rawProbability || Number.isNaN(probability)) {
    throw new InvalidConfigurationError(`Invalid probability '${rawProbability}' in '${spec}'.`);
  }
  return [name, probability];
}

/**
 * Parses `id=probability` specifications, falling back to the built-in catalogue when none are
 * given.
 */
export function parseDocumentSpecs(specs: readonly string[] = []): Document[] {
  if (!specs.length) {
    return DEFAULT_DOCUMENT_SPECS.map(([docId, attraction]) => new Document(docId, attraction));
  }
  return specs.map((spec) => {
    const [docId, attraction] = splitSpec(spec);
    return new Document(docId, attraction);
  });
}

export function parseSatisfactionSpecs(specs: readonly string[] = []): Record<string, number> {
  return Object.fromEntries(specs.map(splitSpec));
}
