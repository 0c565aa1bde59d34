import { ZodError } from 'zod';

import { InvalidProbabilityError } from './errors';

export function validateProbability(label: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidProbabilityError(label, value);
  }
  return value;
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}
