import { UsageError } from '@gamemind/shared';

export function parseIntegerOption(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`Invalid ${flag} "${raw}". Must be an integer >= ${min}.`);
  }
  return value;
}

export function parseNumberOption(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < min) {
    throw new UsageError(`Invalid ${flag} "${raw}". Must be a number >= ${min}.`);
  }
  return value;
}

/**
 * Reads `--state`. Valid JSON is decoded; anything else is kept as a plain string.
 */
export function parseStateOption(raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}
