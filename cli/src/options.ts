import { InvalidArgumentError } from 'commander';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

export function parsePositiveInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return n;
}

export function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

/** Variadic collector that also splits comma separated values. */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map(v => v.trim()).filter(Boolean)];
}

export function collectNumbers(value: string, previous: number[] = []): number[] {
  return [...previous, ...collectList(value).map(parseNumber)];
}
