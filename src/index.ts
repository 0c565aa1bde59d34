import { logger as applicationLogger } from './application-logger';
import {
  DocDistributionData,
  docDistributionData,
  LearningCurveData,
  learningCurveData,
  RegretCurveData,
  regretCurveData,
} from './chart-data';
import {
  buildSummary,
  LogSummary,
  sortSummaries,
  summariesToTable,
  summarizeLog,
  SummarySortKey,
} from './compare';
import {
  defaultPositionBiases,
  parseDocumentSpecs,
  parseSatisfactionSpecs,
  resolveConfig,
  SimulationConfig,
  SimulationConfigInput,
} from './config';
import * as constants from './constants';
import { CascadeEnvironment } from './environment/cascade.environment';
import {
  ClickModelEnvironment,
  hasOptimalRewardOracle,
  IClickModelEnvironment,
  IOptimalRewardOracle,
} from './environment/click-model-environment';
import {
  DependentClickEnvironment,
  DependentClickOptions,
} from './environment/dependent-click.environment';
import { PositionBasedEnvironment } from './environment/position-based.environment';
import {
  InsufficientSlateError,
  InvalidConfigurationError,
  InvalidProbabilityError,
  InvalidRoundCountError,
  InvalidSlateError,
  LogFormatError,
  RankBanditError,
  ScenarioNotFoundError,
  UnknownDocumentError,
} from './errors';
import { createEnvironment, createPolicy, runSimulation, SimulationRun } from './factory';
import {
  deserializeLog,
  LoadedLog,
  loadLog,
  LogMetadata,
  LogRecord,
  serializeLog,
  writeLog,
} from './log-codec';
import { BetaPosterior, ClickStatistics, RunningMean } from './policy/arm-statistics';
import { EpsilonGreedyOptions, EpsilonGreedyRanking } from './policy/epsilon-greedy.policy';
import { IRankingPolicy, RankingPolicy } from './policy/ranking-policy';
import { SoftmaxOptions, SoftmaxRanking } from './policy/softmax.policy';
import {
  ThompsonSamplingOptions,
  ThompsonSamplingRanking,
} from './policy/thompson-sampling.policy';
import { UCB1Options, UCB1Ranking } from './policy/ucb1.policy';
import { Rng, Seed } from './random';
import { listScenarios, loadScenario, loadScenarioFile, Scenario } from './scenario-loader';
import { BanditSimulator, SimulatorState } from './simulator/bandit-simulator';
import { RoundMetrics, SimulationLog, SimulationSummary } from './simulator/simulation-log';
import { normalizeSlate } from './slate';
import { applyRunOverrides, parseRunSpec, runSweep, SweepOptions, SweepResult } from './sweep';
import {
  ClickModel,
  clickedDocId,
  clickedDocIds,
  Document,
  Interaction,
  PolicyAlgorithm,
} from './types';

export {
  applicationLogger,
  constants,

  // Documents and interactions
  Document,
  Interaction,
  ClickModel,
  PolicyAlgorithm,
  clickedDocId,
  clickedDocIds,
  normalizeSlate,
  Rng,
  Seed,

  // Environments
  IClickModelEnvironment,
  IOptimalRewardOracle,
  ClickModelEnvironment,
  CascadeEnvironment,
  PositionBasedEnvironment,
  DependentClickEnvironment,
  DependentClickOptions,
  hasOptimalRewardOracle,

  // Policies
  IRankingPolicy,
  RankingPolicy,
  EpsilonGreedyRanking,
  EpsilonGreedyOptions,
  ThompsonSamplingRanking,
  ThompsonSamplingOptions,
  UCB1Ranking,
  UCB1Options,
  SoftmaxRanking,
  SoftmaxOptions,
  ClickStatistics,
  BetaPosterior,
  RunningMean,

  // Simulation
  BanditSimulator,
  SimulatorState,
  SimulationLog,
  SimulationSummary,
  RoundMetrics,
  SimulationConfig,
  SimulationConfigInput,
  SimulationRun,
  resolveConfig,
  defaultPositionBiases,
  parseDocumentSpecs,
  parseSatisfactionSpecs,
  createEnvironment,
  createPolicy,
  runSimulation,

  // Logs, scenarios and comparisons
  LogMetadata,
  LogRecord,
  LoadedLog,
  serializeLog,
  deserializeLog,
  writeLog,
  loadLog,
  Scenario,
  listScenarios,
  loadScenario,
  loadScenarioFile,
  LogSummary,
  SummarySortKey,
  buildSummary,
  summarizeLog,
  sortSummaries,
  summariesToTable,
  SweepOptions,
  SweepResult,
  parseRunSpec,
  applyRunOverrides,
  runSweep,
  LearningCurveData,
  RegretCurveData,
  DocDistributionData,
  learningCurveData,
  regretCurveData,
  docDistributionData,

  // Errors
  RankBanditError,
  InvalidConfigurationError,
  InvalidProbabilityError,
  InvalidSlateError,
  InsufficientSlateError,
  UnknownDocumentError,
  InvalidRoundCountError,
  LogFormatError,
  ScenarioNotFoundError,
};
