import { InvalidOptionArgumentError } from 'commander';

/** Commander argument parser accepting only positive integers written in plain digits. */
export const parsePositiveInt =
  (label: string) =>
  (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
      throw new InvalidOptionArgumentError(`${label} must be a positive integer.`);
    }
    return parsed;
  };
