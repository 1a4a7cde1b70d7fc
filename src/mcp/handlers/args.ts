import {
  type GroupBy,
  type Interval,
  INTERVALS,
  isGroupBy,
  isInterval,
} from '../../services/market-data.service.js';
import { InvalidArgumentError, MissingArgumentError } from '../../utils/errors.js';

export type ToolArguments = Record<string, unknown>;

function present(args: ToolArguments, key: string): unknown {
  const value = args[key];
  if (value === undefined || value === null) {
    throw new MissingArgumentError(key);
  }
  return value;
}

export function requireString(args: ToolArguments, key: string): string {
  const value = present(args, key);
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(key, 'a string');
  }
  return value;
}

export function requireStringArray(args: ToolArguments, key: string): string[] {
  const value = present(args, key);
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidArgumentError(key, 'an array of strings');
  }
  return value;
}

export function optionalString(args: ToolArguments, key: string, fallback: string): string {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(key, 'a string');
  }
  return value;
}

export function optionalInteger(args: ToolArguments, key: string, fallback: number): number {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidArgumentError(key, 'an integer');
  }
  return value;
}

export function optionalInterval(args: ToolArguments, key: string, fallback: Interval): Interval {
  const value = optionalString(args, key, fallback);
  if (!isInterval(value)) {
    throw new InvalidArgumentError(key, `one of ${INTERVALS.join(', ')}`);
  }
  return value;
}

export function optionalGroupBy(args: ToolArguments, key: string, fallback: GroupBy): GroupBy {
  const value = optionalString(args, key, fallback);
  if (!isGroupBy(value)) {
    throw new InvalidArgumentError(key, 'column or ticker');
  }
  return value;
}
