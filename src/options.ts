import { InvalidArgumentError } from 'commander';

/** commander option parser for integer values such as ports and line numbers. */
export function parseInteger(value: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isInteger(n)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return n;
}
