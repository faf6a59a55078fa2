/**
 * Descriptive statistics shared by the transform library
 */
import { std } from 'mathjs';

/**
 * Calculate mean of an array
 *
 * @returns Mean value, NaN for an empty array
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Sample (n − 1) standard deviation. Fewer than two values have none.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const result = std([...values], 'unbiased');
  return typeof result === 'number' ? result : NaN;
}

/**
 * Clamp value between min and max
 */
export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const finiteValues = (values: readonly number[]): number[] => values.filter(Number.isFinite);
