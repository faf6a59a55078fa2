import { createHash } from 'crypto';
import type { Observation } from '../shared/types.js';
import { isRecord } from '../shared/guards.js';

const MAX_PARAMS_LENGTH = 200;
const MAX_INLINE_ARRAY = 10;

const isObservation = (value: unknown): value is Observation =>
  isRecord(value) && typeof value.date === 'string' && typeof value.value === 'number';

const isPrimitive = (value: unknown): value is string | number | boolean =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const byName = ([a]: [string, unknown], [b]: [string, unknown]): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Short arrays of primitives are spelled out; anything bigger is summarized
 * by shape, so two same-shaped inputs share a key.
 */
function describeArray(values: readonly unknown[]): string {
  if (values.length > 0 && values.every(isObservation)) {
    return `series[${values.length}:${values[0].date}..${values[values.length - 1].date}]`;
  }
  if (values.length <= MAX_INLINE_ARRAY && values.every(isPrimitive)) {
    return `[${values.map(describe).join(',')}]`;
  }
  return `array[${values.length}]`;
}

function describe(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === null) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return describeArray(value);
  if (value instanceof Map) return `map[${value.size}]`;
  if (isRecord(value)) {
    const fields = Object.entries(value)
      .filter(([, nested]) => nested !== undefined)
      .sort(byName)
      .map(([name, nested]) => `${name}:${describe(nested)}`);
    return `{${fields.join(',')}}`;
  }
  return String(value);
}

/**
 * Deterministic key for an operation and its arguments.
 *
 * Keyword arguments are sorted by name and undefined ones are skipped, so
 * `{ a, b }` and `{ b, a }` agree. Strings are quoted, so `'1'` and `1` or
 * `['a|b']` and `['a', 'b']` never share a key. A long parameter part is replaced by its
 * digest; the operation name stays readable in front for pattern
 * invalidation.
 */
export function cacheKey(
  operation: string,
  args: readonly unknown[] = [],
  kwargs: Readonly<Record<string, unknown>> = {},
): string {
  const parts = args.map(describe);
  for (const [name, value] of Object.entries(kwargs).sort(byName)) {
    if (value === undefined) continue;
    parts.push(`${name}:${describe(value)}`);
  }

  const params = parts.join('|');
  if (params.length === 0) return operation;
  if (params.length > MAX_PARAMS_LENGTH) {
    return `${operation}|#${createHash('sha256').update(params).digest('hex')}`;
  }
  return `${operation}|${params}`;
}
