export const rankBanditErrorCodes = [
  'INVALID_CONFIGURATION',
  'INVALID_PROBABILITY',
  'INVALID_SLATE',
  'INSUFFICIENT_SLATE',
  'UNKNOWN_DOCUMENT',
  'INVALID_ROUND_COUNT',
  'LOG_FORMAT',
  'SCENARIO_NOT_FOUND',
] as const;

export type RankBanditErrorCode = typeof rankBanditErrorCodes[number];

export class RankBanditError extends Error {
  constructor(public readonly code: RankBanditErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidConfigurationError extends RankBanditError {
  constructor(message: string, code: RankBanditErrorCode = 'INVALID_CONFIGURATION') {
    super(code, message);
  }
}

export class InvalidProbabilityError extends InvalidConfigurationError {
  constructor(public readonly label: string, public readonly value: number) {
    super(`${label} must be in [0, 1], got ${value}.`, 'INVALID_PROBABILITY');
  }
}

export class InvalidSlateError extends RankBanditError {
  constructor(message: string, code: RankBanditErrorCode = 'INVALID_SLATE') {
    super(code, message);
  }
}

export class InsufficientSlateError extends InvalidSlateError {
  constructor(public readonly uniqueCount: number, public readonly slateSize: number) {
    super(
      `Slate has ${uniqueCount} documents but requires ${slateSize}.`,
      'INSUFFICIENT_SLATE',
    );
  }
}

export class UnknownDocumentError extends RankBanditError {
  constructor(public readonly docIds: string[]) {
    super('UNKNOWN_DOCUMENT', `Unknown document ids requested: ${docIds.join(', ')}`);
  }
}

export class InvalidRoundCountError extends RankBanditError {
  constructor(public readonly rounds: number) {
    super('INVALID_ROUND_COUNT', `rounds must be an integer >= 1, got ${rounds}.`);
  }
}

export class LogFormatError extends RankBanditError {
  constructor(public readonly source: string, message: string, cause?: unknown) {
    super('LOG_FORMAT', `Failed to read simulation log '${source}': ${message}`, cause);
  }
}

export class ScenarioNotFoundError extends RankBanditError {
  constructor(public readonly scenario: string) {
    super('SCENARIO_NOT_FOUND', `Scenario '${scenario}' not found.`);
  }
}
