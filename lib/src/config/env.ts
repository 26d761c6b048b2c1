/**
 * Environment Parsing Helpers
 *
 * Values that fail to parse come back as NaN so the zod schema reporting
 * the problem names the offending field.
 */

export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
}

export function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value.trim());
}

/** Comma-separated list; blank entries dropped */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
