#!/usr/bin/env node
import * as fs from 'fs';

import yargs, { Argv } from 'yargs';

import { logger, loggerPrefix } from '../application-logger';
import { docDistributionData, learningCurveData, regretCurveData } from '../chart-data';
import {
  LogSummary,
  sortSummaries,
  summariesToTable,
  summarizeLog,
  SummarySortKey,
  summarySortKeys,
} from '../compare';
import {
  parseDocumentSpecs,
  parseSatisfactionSpecs,
  resolveConfig,
  SimulationConfig,
} from '../config';
import { DEFAULT_SWEEP_OUTPUT_DIR } from '../constants';
import { InvalidConfigurationError, RankBanditError } from '../errors';
import { runSimulation } from '../factory';
import { writeLog } from '../log-codec';
import { listScenarios, loadScenario } from '../scenario-loader';
import { SimulationSummary } from '../simulator/simulation-log';
import { runSweep } from '../sweep';
import { clickModels, Document, policyAlgorithms } from '../types';

interface SimulationArgs {
  algo?: string;
  model?: string;
  steps?: number;
  'slate-size'?: number;
  seed?: number;
  epsilon?: number;
  'alpha-prior'?: number;
  'beta-prior'?: number;
  'ucb-confidence'?: number;
  temperature?: number;
  'position-bias'?: number[];
  doc?: string[];
  scenario?: string;
  'doc-satisfaction'?: string[];
  'default-satisfaction'?: number;
}

interface RankingArgs {
  'sort-by'?: string;
  descending?: boolean;
}

interface RunArgs extends SimulationArgs {
  'log-json'?: string;
  'chart-json'?: string;
}

interface SweepArgs extends SimulationArgs, RankingArgs {
  run?: string[];
  'output-dir'?: string;
  'summary-json'?: string;
  'chart-json'?: string;
}

interface CompareArgs extends RankingArgs {
  logs?: string[];
  'out-json'?: string;
  'chart-json'?: string;
}

function simulationOptions<T>(argv: Argv<T>) {
  return argv
    .option('algo', { type: 'string', choices: policyAlgorithms, describe: 'ranking policy' })
    .option('model', { type: 'string', choices: clickModels, describe: 'click model' })
    .option('steps', { type: 'number', describe: 'number of rounds' })
    .option('slate-size', { type: 'number', describe: 'documents shown per round' })
    .option('seed', { type: 'number', describe: 'environment seed; the policy uses seed + 1' })
    .option('epsilon', { type: 'number', describe: 'epsilon-greedy exploration rate' })
    .option('alpha-prior', { type: 'number', describe: 'Thompson sampling alpha prior' })
    .option('beta-prior', { type: 'number', describe: 'Thompson sampling beta prior' })
    .option('ucb-confidence', { type: 'number', describe: 'UCB1 confidence multiplier' })
    .option('temperature', { type: 'number', describe: 'softmax temperature' })
    .option('position-bias', {
      type: 'number',
      array: true,
      describe: 'examination probability per rank (position model)',
    })
    .option('doc', { type: 'string', array: true, describe: 'document as id=attraction' })
    .option('scenario', { type: 'string', describe: 'bundled scenario name' })
    .option('doc-satisfaction', {
      type: 'string',
      array: true,
      describe: 'satisfaction as id=prob (dependent model)',
    })
    .option('default-satisfaction', {
      type: 'number',
      describe: 'satisfaction for documents without an override',
    });
}

function rankingOptions<T>(argv: Argv<T>) {
  return argv
    .option('sort-by', {
      type: 'string',
      choices: summarySortKeys,
      default: 'ctr',
      describe: 'summary sort key',
    })
    .option('descending', { type: 'boolean', default: false, describe: 'sort descending' });
}

function checkedNumber(name: string, value: number | undefined): number | undefined {
  if (value !== undefined && Number.isNaN(value)) {
    throw new InvalidConfigurationError(`--${name} expects a number.`);
  }
  return value;
}

function isSortKey(value: string): value is SummarySortKey {
  return summarySortKeys.some((key) => key === value);
}

function sortKeyFlag(raw: string | undefined): SummarySortKey {
  if (raw === undefined) {
    return 'ctr';
  }
  if (!isSortKey(raw)) {
    throw new InvalidConfigurationError(
      `--sort-by must be one of ${summarySortKeys.join(', ')}, got '${raw}'.`,
    );
  }
  return raw;
}

interface Workload {
  config: SimulationConfig;
  documents: Document[];
}

function buildWorkload(args: SimulationArgs): Workload {
  const scenario = args.scenario === undefined ? null : loadScenario(args.scenario);
  if (scenario && args.doc?.length) {
    throw new InvalidConfigurationError('--scenario and --doc cannot be combined.');
  }
  const documents = scenario ? scenario.documents : parseDocumentSpecs(args.doc);
  const positionBiases = args['position-bias']?.map((bias) => {
    if (Number.isNaN(bias)) {
      throw new InvalidConfigurationError('--position-bias expects numbers.');
    }
    return bias;
  });
  const docSatisfaction = args['doc-satisfaction']?.length
    ? parseSatisfactionSpecs(args['doc-satisfaction'])
    : scenario?.satisfaction;

  const config = resolveConfig({
    algo: args.algo,
    model: args.model,
    steps: checkedNumber('steps', args.steps),
    slateSize: checkedNumber('slate-size', args['slate-size']),
    seed: checkedNumber('seed', args.seed),
    epsilon: checkedNumber('epsilon', args.epsilon),
    alphaPrior: checkedNumber('alpha-prior', args['alpha-prior']),
    betaPrior: checkedNumber('beta-prior', args['beta-prior']),
    ucbConfidence: checkedNumber('ucb-confidence', args['ucb-confidence']),
    temperature: checkedNumber('temperature', args.temperature),
    positionBiases: positionBiases?.length ? positionBiases : scenario?.positionBiases,
    docSatisfaction,
    defaultSatisfaction: checkedNumber('default-satisfaction', args['default-satisfaction']),
  });
  return { config, documents };
}

function formatSummary(summary: SimulationSummary, docIds: readonly string[]): string[] {
  const lines = [
    `Rounds       : ${summary.rounds}`,
    `Total reward : ${summary.totalReward.toFixed(0)}`,
    `CTR          : ${summary.ctr.toFixed(4)}`,
  ];
  if (summary.cumulativeRegret !== null && summary.optimalReward !== null) {
    lines.push(`Optimal      : ${summary.optimalReward.toFixed(4)}`);
    lines.push(`Regret       : ${summary.cumulativeRegret.toFixed(2)}`);
  }
  lines.push('Seen counts  :');
  docIds.forEach((docId) => lines.push(`  ${docId.padStart(8)} -> ${summary.seenCounts[docId] ?? 0}`));
  lines.push('Click counts :');
  docIds.forEach((docId) => lines.push(`  ${docId.padStart(8)} -> ${summary.clickCounts[docId] ?? 0}`));
  return lines;
}

function writeJson(path: string, payload: unknown) {
  fs.writeFileSync(path, JSON.stringify(payload, null, 2), 'utf-8');
}

function runCommand(args: RunArgs) {
  const { config, documents } = buildWorkload(args);
  const { environment, log } = runSimulation(config, documents);
  const docIds = environment.docIds();
  formatSummary(log.summary(), docIds).forEach((line) => console.log(line));

  const logPath = args['log-json'];
  if (logPath) {
    writeLog(logPath, log, {
      algo: config.algo,
      model: config.model,
      steps: config.steps,
      seed: config.seed,
      doc_ids: docIds,
      scenario: args.scenario ?? null,
    });
    logger.info(`${loggerPrefix} Log written to ${logPath}`);
  }
  const chartPath = args['chart-json'];
  if (chartPath) {
    writeJson(chartPath, {
      learning: learningCurveData(log),
      regret: log.optimalReward === null ? null : regretCurveData(log),
      distribution: docDistributionData(log, docIds),
    });
  }
}

function sweepCommand(args: SweepArgs) {
  const { config, documents } = buildWorkload(args);
  const { runs, summaries } = runSweep({
    base: config,
    documents,
    runSpecs: args.run ?? [],
    outputDir: args['output-dir'] ?? DEFAULT_SWEEP_OUTPUT_DIR,
    summaryJson: args['summary-json'],
    sortBy: sortKeyFlag(args['sort-by']),
    descending: args.descending ?? false,
  });
  console.log(summariesToTable(summaries));

  const chartPath = args['chart-json'];
  if (chartPath) {
    writeJson(
      chartPath,
      Object.fromEntries(runs.map(({ label, log }) => [label, learningCurveData(log)])),
    );
  }
}

function compareCommand(args: CompareArgs) {
  const logPaths = args.logs ?? [];
  if (!logPaths.length) {
    throw new InvalidConfigurationError('compare needs at least one log path.');
  }
  const loaded = logPaths.map(summarizeLog);
  const summaries: LogSummary[] = sortSummaries(
    loaded.map(({ summary }) => summary),
    sortKeyFlag(args['sort-by']),
    args.descending ?? false,
  );
  console.log(summariesToTable(summaries));

  const outPath = args['out-json'];
  if (outPath) {
    writeJson(outPath, summaries);
  }
  const chartPath = args['chart-json'];
  if (chartPath) {
    writeJson(
      chartPath,
      Object.fromEntries(loaded.map(({ summary, log }) => [summary.label, learningCurveData(log)])),
    );
  }
}

function scenariosCommand() {
  listScenarios().forEach((name) => {
    const { description, documents } = loadScenario(name);
    const line = `${name.padEnd(20)} ${String(documents.length).padStart(3)} docs  ${description ?? ''}`;
    console.log(line.trimEnd());
  });
}

export function buildParser(argv: readonly string[]) {
  return yargs(argv)
    .scriptName('rank-bandit-lab')
    .usage('Usage: $0 <command> [options]')
    .command(
      'run',
      'Run a single simulation and print its summary',
      (command) =>
        simulationOptions(command)
          .option('log-json', { type: 'string', describe: 'write the interaction log here' })
          .option('chart-json', { type: 'string', describe: 'write chart series here' }),
      (args) => runCommand(args),
    )
    .command(
      'sweep',
      'Run several labelled configurations',
      (command) =>
        rankingOptions(simulationOptions(command))
          .option('run', {
            type: 'string',
            array: true,
            describe: 'run spec as label:key=value,...',
          })
          .option('output-dir', {
            type: 'string',
            default: DEFAULT_SWEEP_OUTPUT_DIR,
            describe: 'directory for per-run logs',
          })
          .option('summary-json', { type: 'string', describe: 'write the sorted summaries here' })
          .option('chart-json', { type: 'string', describe: 'write learning curves here' }),
      (args) => sweepCommand(args),
    )
    .command(
      'compare [logs..]',
      'Summarize and rank existing JSON logs',
      (command) =>
        rankingOptions(command)
          .positional('logs', { type: 'string', array: true, describe: 'log files to compare' })
          .option('out-json', { type: 'string', describe: 'write the sorted summaries here' })
          .option('chart-json', { type: 'string', describe: 'write learning curves here' }),
      (args) => compareCommand(args),
    )
    .command('scenarios', 'List bundled scenarios', {}, () => scenariosCommand())
    .demandCommand(1, 'A command is required.')
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      if (error instanceof RankBanditError) {
        throw error;
      }
      throw new InvalidConfigurationError(message || String(error));
    });
}

/**
 * Entry point shared by the binary and the tests.
 * @returns the process exit code
 */
export function main(argv: readonly string[]): number {
  try {
    buildParser(argv).parseSync();
    return 0;
  } catch (error) {
    if (error instanceof RankBanditError) {
      console.error(`error: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
