export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

/**
 * JSON-safe view of a computed number: NaN and ±Infinity become null
 */
export function nullable(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}
