import { InvalidArgumentError } from 'commander';
import { describeError } from '../errors.js';

/** Parses a whole, positive count given on the command line. */
export function parsePositiveInteger(value: string, flagName: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Option --${flagName} must be a positive whole number, got "${value}".`);
  }
  return parsed;
}

/** Parses a JSON object given on the command line. */
export function parseJsonObject(value: string, flagName: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new InvalidArgumentError(`Option --${flagName} is not valid JSON: ${describeError(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError(`Option --${flagName} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

