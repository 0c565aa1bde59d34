export const DEFAULT_ALGORITHM = 'epsilon';
export const DEFAULT_CLICK_MODEL = 'cascade';
export const DEFAULT_STEPS = 2000;
export const DEFAULT_SLATE_SIZE = 3;
export const DEFAULT_SEED = 7;
// policies draw from their own stream, offset from the environment's seed
export const POLICY_SEED_OFFSET = 1;

export const DEFAULT_EPSILON = 0.1;
export const DEFAULT_PRIOR_SUCCESS = 1.0;
export const DEFAULT_PRIOR_FAILURE = 1.0;
export const DEFAULT_ALPHA_PRIOR = 1.0;
export const DEFAULT_BETA_PRIOR = 1.0;
export const DEFAULT_UCB_CONFIDENCE = 1.0;
export const DEFAULT_SOFTMAX_TEMPERATURE = 0.1;
export const DEFAULT_SATISFACTION = 0.5;

export const DEFAULT_DOCUMENT_SPECS: ReadonlyArray<readonly [string, number]> = [
  ['doc-A', 0.45],
  ['doc-B', 0.35],
  ['doc-C', 0.25],
  ['doc-D', 0.15],
  ['doc-E', 0.1],
];

export const DEFAULT_SWEEP_OUTPUT_DIR = 'sweep_logs';
export const SCENARIO_FILE_EXTENSION = '.json';
