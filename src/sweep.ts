import * as fs from 'fs';
import * as path from 'path';

import { logger, loggerPrefix } from './application-logger';
import { buildSummary, LogSummary, sortSummaries, SummarySortKey } from './compare';
import { resolveConfig, SimulationConfig } from './config';
import { InvalidConfigurationError } from './errors';
import { runSimulation } from './factory';
import { writeLog } from './log-codec';
import { SimulationLog } from './simulator/simulation-log';
import { Document } from './types';

type OverrideKind = 'string' | 'float' | 'int';

interface OverrideField {
  field: keyof SimulationConfig;
  kind: OverrideKind;
}

const RUN_OVERRIDES = new Map<string, OverrideField>([
  ['algo', { field: 'algo', kind: 'string' }],
  ['model', { field: 'model', kind: 'string' }],
  ['epsilon', { field: 'epsilon', kind: 'float' }],
  ['alpha_prior', { field: 'alphaPrior', kind: 'float' }],
  ['beta_prior', { field: 'betaPrior', kind: 'float' }],
  ['ucb_confidence', { field: 'ucbConfidence', kind: 'float' }],
  ['temperature', { field: 'temperature', kind: 'float' }],
  ['seed', { field: 'seed', kind: 'int' }],
  ['steps', { field: 'steps', kind: 'int' }],
  ['slate_size', { field: 'slateSize', kind: 'int' }],
]);

export interface RunSpec {
  label: string;
  overrides: Record<string, string>;
}

export interface SweepOptions {
  base: SimulationConfig;
  documents: readonly Document[];
  runSpecs: readonly string[];
  outputDir: string;
  summaryJson?: string;
  sortBy?: SummarySortKey;
  descending?: boolean;
}

export interface SweepRun {
  label: string;
  config: SimulationConfig;
  log: SimulationLog;
  logPath: string;
}

export interface SweepResult {
  runs: SweepRun[];
  summaries: LogSummary[];
}

/**
 * Parses `label:key=value,key=value`. Empty tokens are skipped.
 */
export function parseRunSpec(spec: string): RunSpec {
  const separator = spec.indexOf(':');
  if (separator < 0) {
    throw new InvalidConfigurationError(
      `Run spec '${spec}' is missing label prefix (label:key=value,...).`,
    );
  }
  const label = spec.slice(0, separator).trim();
  if (!label) {
    throw new InvalidConfigurationError('Run label cannot be empty.');
  }
  // the label names the run's log file inside the output directory
  if (/[\\/]/.test(label) || label === '.' || label === '..') {
    throw new InvalidConfigurationError(`Run label '${label}' cannot be used as a file name.`);
  }
  const overrides: Record<string, string> = {};
  spec
    .slice(separator + 1)
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length)
    .forEach((token) => {
      const equals = token.indexOf('=');
      if (equals < 0) {
        throw new InvalidConfigurationError(
          `Invalid token '${token}' in run spec '${spec}'. Expected key=value.`,
        );
      }
      const key = token.slice(0, equals).trim();
      if (!key) {
        throw new InvalidConfigurationError(`Missing key in run token '${token}'.`);
      }
      overrides[key] = token.slice(equals + 1).trim();
    });
  return { label, overrides };
}

function castOverride(key: string, rawValue: string, kind: OverrideKind): string | number {
  if (kind === 'string') {
    return rawValue;
  }
  const value = Number(rawValue);
  if (!rawValue || Number.isNaN(value) || (kind === 'int' && !Number.isInteger(value))) {
    throw new InvalidConfigurationError(`Failed to parse override '${key}=${rawValue}'.`);
  }
  return value;
}

export function applyRunOverrides(
  base: SimulationConfig,
  overrides: Record<string, string>,
): SimulationConfig {
  const patched: Record<string, unknown> = { ...base };
  Object.entries(overrides).forEach(([key, rawValue]) => {
    const override = RUN_OVERRIDES.get(key);
    if (!override) {
      throw new InvalidConfigurationError(`Unsupported override '${key}'.`);
    }
    patched[override.field] = castOverride(key, rawValue, override.kind);
  });
  return resolveConfig(patched);
}

export function runSweep(options: SweepOptions): SweepResult {
  const specs = options.runSpecs.map(parseRunSpec);
  if (!specs.length) {
    throw new InvalidConfigurationError('At least one run specification is required.');
  }
  const seenLabels = new Set<string>();
  specs.forEach(({ label }) => {
    if (seenLabels.has(label)) {
      throw new InvalidConfigurationError(`Duplicate run label '${label}'.`);
    }
    seenLabels.add(label);
  });
  const configs = specs.map(({ label, overrides }) => ({
    label,
    overrides,
    config: applyRunOverrides(options.base, overrides),
  }));

  fs.mkdirSync(options.outputDir, { recursive: true });

  const runs: SweepRun[] = [];
  const summaries: LogSummary[] = [];
  configs.forEach(({ label, overrides, config }) => {
    const { environment, log } = runSimulation(config, options.documents);
    const metadata = {
      label,
      algo: config.algo,
      model: config.model,
      steps: config.steps,
      seed: config.seed,
      doc_ids: environment.docIds(),
      overrides,
    };
    const logPath = path.join(options.outputDir, `${label}.json`);
    writeLog(logPath, log, metadata);
    logger.info(`${loggerPrefix} Sweep run '${label}' written to ${logPath}`);

    runs.push({ label, config, log, logPath });
    summaries.push(buildSummary(logPath, log, metadata));
  });

  const sorted = sortSummaries(summaries, options.sortBy ?? 'ctr', options.descending ?? false);
  if (options.summaryJson) {
    fs.writeFileSync(options.summaryJson, JSON.stringify(sorted, null, 2), 'utf-8');
  }
  return { runs, summaries: sorted };
}
