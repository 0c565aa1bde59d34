import pino from 'pino';

export const loggerPrefix = '[rank-bandit-lab]';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return process.env.NODE_ENV === 'production' ? 'warn' : 'info';
}

// Create a Pino logger instance
export const logger = pino({
  level: defaultLevel(),
  base: { name: 'rank-bandit-lab' },
});
